export { Graph, type GraphOptions } from './graph.js';
export { GraphError, type GraphErrorReason } from './errors.js';
export { extractBlueprint, importBlueprint, type ExtractOptions } from './blueprint.js';
export { copyNode, copyRecursive, moveNode, pickChild, reorderChild, type PickFilter } from './operations.js';
export { monthCalendar, type CalendarDay, type MonthCalendar } from './calendar.js';
export { graphStats, type GraphStats } from './stats.js';
export { compactSnapshot, shouldAutoClean } from './compact.js';
export { deriveState } from './propagation.js';
export { resolveToken } from './resolver.js';
export { traverse } from './traverse.js';
