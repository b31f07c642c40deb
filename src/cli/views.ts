/**
 * Plain, serializable views of graph nodes for command output.
 */

import type { GraphNode, Handle, NodeKind, TaskState, TraversalEntry } from '../types/graph.js';

export interface NodeView {
  handle: Handle;
  title: string;
  kind: NodeKind;
  state: TaskState | null;
  date: string | null;
  alias: string | null;
  archived: boolean;
  parents: Handle[];
  children: Handle[];
}

export interface TreeLine {
  depth: number;
  node: NodeView;
}

export function toNodeView(node: GraphNode): NodeView {
  return {
    handle: node.metadata.index,
    title: node.title,
    kind: node.content.kind,
    state: node.content.kind === 'task' ? node.content.state : null,
    date: node.content.kind === 'date' ? node.content.date : null,
    alias: node.metadata.alias,
    archived: node.metadata.archived,
    parents: [...node.metadata.parents],
    children: [...node.metadata.children],
  };
}

export function toTreeLines(entries: readonly TraversalEntry[]): TreeLine[] {
  return entries.map((entry) => ({ depth: entry.depth, node: toNodeView(entry.node) }));
}
