/**
 * Task graph data model.
 *
 * Nodes live in a slot array and are addressed by their integer handle.
 * A removed node leaves a `null` tombstone until the graph is compacted.
 */

/** Stable integer address of a node (its slot in the graph). */
export type Handle = number;

/** A handle, or a user token (alias, date, numeric string) to resolve. */
export type NodeId = Handle | string;

/** Completion state of a task node. */
export type TaskState = 'none' | 'partial' | 'done';

export const TASK_STATES: readonly TaskState[] = ['none', 'partial', 'done'];

/**
 * Per-kind node payload. Only task nodes carry a completion state,
 * so a date or pseudo node with a state cannot be expressed.
 */
export type NodeContent =
  | { kind: 'task'; state: TaskState }
  | { kind: 'date'; date: string }
  | { kind: 'pseudo' };

export type NodeKind = NodeContent['kind'];

export interface NodeMetadata {
  archived: boolean;
  /** Handle of this node; always equal to its slot. */
  index: Handle;
  alias: string | null;
  /** Ordered, duplicate-free parent handles. */
  parents: Handle[];
  /** Ordered, duplicate-free child handles. */
  children: Handle[];
}

export interface GraphNode {
  title: string;
  content: NodeContent;
  metadata: NodeMetadata;
}

/** One step of a traversal: the node and its depth below the start set. */
export interface TraversalEntry {
  node: GraphNode;
  depth: number;
}

export interface TraverseOptions {
  /** Visit archived nodes (and their subtrees). Default: false. */
  includeArchived?: boolean;
  /** Number of levels to emit; 0 means unlimited. Default: 0. */
  maxDepth?: number;
}

/** Plain snapshot of a graph's storage, used by the codec and compactor. */
export interface GraphSnapshot {
  nodes: (GraphNode | null)[];
  roots: Handle[];
  archived: Handle[];
  dates: Map<string, Handle>;
  aliases: Map<string, Handle>;
}

/** Portable, re-indexed export of a reachable subtree. */
export interface BlueprintDoc {
  /** Document version of the writer. */
  version: number;
  /** Title of the blueprint's root node. */
  title: string;
  author: string | null;
  /** Nodes with 0-based handles; node 0 is the parent-free root. */
  nodes: GraphNode[];
}

export function isTask(content: NodeContent): content is { kind: 'task'; state: TaskState } {
  return content.kind === 'task';
}

export function isPseudo(content: NodeContent): content is { kind: 'pseudo' } {
  return content.kind === 'pseudo';
}

export function isDate(content: NodeContent): content is { kind: 'date'; date: string } {
  return content.kind === 'date';
}

/** Deep copy of a node; edge lists and content are not shared with the source. */
export function cloneNode(node: GraphNode): GraphNode {
  return {
    title: node.title,
    content: { ...node.content },
    metadata: {
      ...node.metadata,
      parents: [...node.metadata.parents],
      children: [...node.metadata.children],
    },
  };
}
