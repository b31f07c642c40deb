/**
 * Depth-first traversal with loop detection.
 */

import type { GraphNode, Handle, NodeId, TraversalEntry, TraverseOptions } from '../../types/graph.js';
import { GraphError } from './errors.js';

/** What a traversal reads from a graph. */
export interface TraversalSource {
  resolve(id: NodeId): Handle;
  node(handle: Handle): GraphNode;
}

/**
 * Walk the graph from `starts`, parents before children, children in order.
 *
 * Start handles are at depth 0. Nodes reachable through several parents are
 * emitted once per path. Reaching a handle that is already on the current
 * path throws CycleDetected(start, reentered).
 */
export function traverse(
  source: TraversalSource,
  starts: readonly NodeId[],
  options: TraverseOptions = {},
): TraversalEntry[] {
  const includeArchived = options.includeArchived ?? false;
  const maxDepth = options.maxDepth ?? 0;
  const entries: TraversalEntry[] = [];
  const onPath = new Set<Handle>();

  const walk = (handle: Handle, depth: number, origin: Handle): void => {
    if (maxDepth !== 0 && depth >= maxDepth) return;
    if (onPath.has(handle)) {
      throw GraphError.cycleDetected(origin, handle);
    }

    const node = source.node(handle);
    if (!includeArchived && node.metadata.archived) return;
    entries.push({ node, depth });

    onPath.add(handle);
    for (const child of node.metadata.children) {
      walk(child, depth + 1, origin);
    }
    onPath.delete(handle);
  };

  for (const start of starts) {
    const handle = source.resolve(start);
    walk(handle, 0, handle);
  }
  return entries;
}
