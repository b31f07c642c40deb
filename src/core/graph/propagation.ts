/**
 * Completion-state propagation.
 *
 * Downward: an explicit state is pushed to every task descendant, leaving
 * pseudo and date subtrees untouched. Upward: each parent's state is derived
 * from its counted (non-pseudo) children, then its own parents are derived
 * again, once per path that reaches them.
 *
 * Every loop iterates a copy of the edge list it walks, so the nodes it
 * mutates along the way never alias the list being iterated.
 */

import type { GraphNode, Handle, TaskState } from '../../types/graph.js';
import { isPseudo, isTask } from '../../types/graph.js';

/** Mutable access to live nodes by handle. */
export interface NodeArena {
  get(handle: Handle): GraphNode;
}

/**
 * Derive a node's completion state from its children.
 *
 * Pseudo children are excluded from both sides of the ratio.
 */
export function deriveState(arena: NodeArena, node: GraphNode): TaskState {
  let counted = 0;
  let done = 0;
  let progressed = false;

  for (const handle of node.metadata.children) {
    const child = arena.get(handle);
    if (isPseudo(child.content)) continue;
    counted++;
    if (isTask(child.content)) {
      if (child.content.state === 'done') {
        done++;
        progressed = true;
      } else if (child.content.state === 'partial') {
        progressed = true;
      }
    }
  }

  if (done > 0 && done === counted) return 'done';
  if (progressed) return 'partial';
  return 'none';
}

/**
 * Recompute each handle from its children, then recurse into its parents.
 *
 * A pseudo node is never recomputed and stops the ascent. Handles already on
 * the current path are skipped, which keeps a hand-made cycle finite.
 */
export function propagateUp(
  arena: NodeArena,
  handles: readonly Handle[],
  path: Set<Handle> = new Set(),
): void {
  for (const handle of handles) {
    if (path.has(handle)) continue;

    const node = arena.get(handle);
    if (isPseudo(node.content)) continue;
    if (isTask(node.content)) {
      node.content = { kind: 'task', state: deriveState(arena, node) };
    }

    const parents = [...node.metadata.parents];
    path.add(handle);
    propagateUp(arena, parents, path);
    path.delete(handle);
  }
}

/**
 * Set `state` on every task reachable below `handles`, recomputing the
 * parents of each node it touches.
 */
export function propagateDown(
  arena: NodeArena,
  handles: readonly Handle[],
  state: TaskState,
  path: Set<Handle> = new Set(),
): void {
  for (const handle of handles) {
    if (path.has(handle)) continue;

    const node = arena.get(handle);
    if (!isTask(node.content)) continue;
    node.content = { kind: 'task', state };

    const children = [...node.metadata.children];
    path.add(handle);
    propagateDown(arena, children, state, path);
    path.delete(handle);

    propagateUp(arena, [...node.metadata.parents]);
  }
}
