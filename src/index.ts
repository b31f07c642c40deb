/**
 * trellis: task graphs with derived completion, date nodes and blueprints.
 */

// Types
export { ExitCode, getExitCodeName } from './types/exit-codes.js';
export type {
  BlueprintDoc,
  GraphNode,
  GraphSnapshot,
  Handle,
  NodeContent,
  NodeId,
  NodeKind,
  NodeMetadata,
  TaskState,
  TraversalEntry,
  TraverseOptions,
} from './types/graph.js';
export { TASK_STATES, isDate, isPseudo, isTask } from './types/graph.js';
export type { TrellisConfig, OutputFormat, ConfigSource } from './types/config.js';

// Core
export { TrellisError } from './core/errors.js';
export { formatSuccess, formatError } from './core/output.js';
export { loadConfig, getConfigValue, setConfigValue } from './core/config.js';
export { parseDateInput, parseDateKey } from './core/dates.js';
export { resolveGraphPath } from './core/paths.js';

// Graph engine
export {
  Graph,
  GraphError,
  copyNode,
  copyRecursive,
  extractBlueprint,
  graphStats,
  importBlueprint,
  monthCalendar,
  moveNode,
  pickChild,
  reorderChild,
  type CalendarDay,
  type GraphErrorReason,
  type GraphStats,
  type MonthCalendar,
  type PickFilter,
} from './core/graph/index.js';

// Persistence
export { loadGraph, saveGraph, type LoadedGraph } from './store/graph-store.js';
export { decodeDocument, encodeDocument, type DocumentFormat } from './store/document.js';
export {
  decodeBlueprint,
  encodeBlueprint,
  listBlueprints,
  loadBlueprint,
  removeBlueprint,
  saveBlueprint,
} from './store/blueprint-store.js';
export { DocumentError, BlueprintError } from './store/errors.js';
