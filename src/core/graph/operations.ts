/**
 * Composite graph operations built on the Graph primitives:
 * copying nodes and subtrees, moving, reordering and picking children.
 */

import type { Handle, NodeContent, NodeId } from '../../types/graph.js';
import { isPseudo, isTask } from '../../types/graph.js';
import { TrellisError } from '../errors.js';
import { getLogger } from '../logger.js';
import { ExitCode } from '../../types/exit-codes.js';
import { GraphError } from './errors.js';
import type { Graph } from './graph.js';

interface CopyPlan {
  title: string;
  content: NodeContent;
  children: CopyPlan[];
}

/**
 * Read the subtree below `handle` into a plain tree before anything is
 * written, so a copy placed inside its own source is never walked.
 */
function planCopy(graph: Graph, handle: Handle, origin: Handle, path: Set<Handle>): CopyPlan {
  if (path.has(handle)) {
    throw GraphError.cycleDetected(origin, handle);
  }
  const node = graph.node(handle);
  path.add(handle);
  const children = node.metadata.children.map((child) => planCopy(graph, child, origin, path));
  path.delete(handle);
  return { title: node.title, content: node.content, children };
}

/** A plan node whose state is its own rather than derived from children. */
function holdsOwnState(plan: CopyPlan): boolean {
  return plan.children.every((child) => isPseudo(child.content));
}

function materialize(graph: Graph, plan: CopyPlan, parent: Handle): Handle {
  const copy = graph.insertChild(plan.title, parent, isPseudo(plan.content));
  for (const child of plan.children) {
    materialize(graph, child, copy);
  }
  if (isTask(plan.content) && holdsOwnState(plan) && plan.content.state !== 'none') {
    graph.setState(copy, plan.content.state);
  }
  return copy;
}

/**
 * Copy one node (title, pseudo flag and task state) as a new child of `to`.
 * A date node is copied as a task.
 */
export function copyNode(graph: Graph, from: NodeId, to: NodeId): Handle {
  const source = graph.node(graph.resolve(from));
  const parent = graph.resolve(to);
  const copy = graph.insertChild(source.title, parent, isPseudo(source.content));
  if (isTask(source.content) && source.content.state !== 'none') {
    graph.setState(copy, source.content.state);
  }
  getLogger('graph').debug({ from: source.metadata.index, to: parent, copy }, 'copied node');
  return copy;
}

/**
 * Copy a node and its whole subtree under `to`. A node reached through
 * several parents is copied once per path. Leaf task states are restored and
 * the states above them are recomputed.
 */
export function copyRecursive(graph: Graph, from: NodeId, to: NodeId): Handle {
  const source = graph.resolve(from);
  const parent = graph.resolve(to);
  const plan = planCopy(graph, source, source, new Set());
  const copy = materialize(graph, plan, parent);
  getLogger('graph').debug({ from: source, to: parent, copy }, 'copied subtree');
  return copy;
}

/**
 * Detach `nodeId` from all of its parents and attach it under `parentId`.
 * Moving a node below itself is rejected as a cycle.
 */
export function moveNode(graph: Graph, nodeId: NodeId, parentId: NodeId): void {
  const node = graph.resolve(nodeId);
  const parent = graph.resolve(parentId);
  const below = graph.traverse([node], { includeArchived: true });
  if (below.some((entry) => entry.node.metadata.index === parent)) {
    throw GraphError.cycleDetected(node, parent);
  }
  graph.cleanParents(node);
  graph.link(parent, node);
}

/**
 * Shift a child `delta` places within its parent's child list (negative is
 * up). Returns the new position.
 */
export function reorderChild(graph: Graph, child: NodeId, parent: NodeId, delta: number): number {
  return graph.reorderChild(child, parent, delta);
}

/** Which children `pickChild` chooses among. */
export type PickFilter = 'any' | 'done' | 'open';

/**
 * Pick one child of `parentId` at random. `done` keeps only finished tasks
 * and `open` only unfinished ones; pseudo and date children pass either
 * filter. `random` returns a number in [0, 1).
 */
export function pickChild(
  graph: Graph,
  parentId: NodeId,
  filter: PickFilter = 'any',
  random: () => number = Math.random,
): Handle {
  const parent = graph.resolve(parentId);
  const candidates = graph.children(parent).filter((child) => {
    const { content } = graph.node(child);
    if (filter === 'any' || content.kind !== 'task') return true;
    return (content.state === 'done') === (filter === 'done');
  });
  const picked = candidates[Math.floor(random() * candidates.length)];
  if (picked === undefined) {
    throw new TrellisError(ExitCode.NOT_FOUND, `Node ${parent} has no children to pick from`, {
      fix: filter === 'any' ? undefined : 'Drop --checked/--unchecked to pick among all children.',
    });
  }
  return picked;
}
