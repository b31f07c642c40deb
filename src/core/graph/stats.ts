/**
 * Graph statistics.
 */

import type { GraphNode, NodeId } from '../../types/graph.js';
import type { Graph } from './graph.js';

export interface GraphStats {
  nodes: number;
  roots: number;
  dates: number;
  aliases: number;
  archived: number;
  tombstones: number;
  done: number;
  partial: number;
  none: number;
  pseudo: number;
}

function tally(nodes: readonly GraphNode[]): Pick<GraphStats, 'done' | 'partial' | 'none' | 'pseudo'> {
  const counts = { done: 0, partial: 0, none: 0, pseudo: 0 };
  for (const node of nodes) {
    if (node.content.kind === 'pseudo') counts.pseudo++;
    else if (node.content.kind === 'task') counts[node.content.state]++;
  }
  return counts;
}

/**
 * Counts for the whole graph, or for the subtree below `id` (each node once,
 * archived nodes included).
 */
export function graphStats(graph: Graph, id?: NodeId): GraphStats {
  if (id === undefined) {
    const live = graph.slots.filter((node): node is GraphNode => node !== null);
    return {
      nodes: live.length,
      roots: graph.roots.length,
      dates: graph.dates.size,
      aliases: graph.aliases.size,
      archived: graph.archived.length,
      tombstones: graph.tombstoneCount,
      ...tally(live),
    };
  }

  const seen = new Map<number, GraphNode>();
  for (const entry of graph.traverse([id], { includeArchived: true })) {
    seen.set(entry.node.metadata.index, entry.node);
  }
  const nodes = [...seen.values()];
  return {
    nodes: nodes.length,
    roots: 1,
    dates: nodes.filter((node) => node.content.kind === 'date').length,
    aliases: nodes.filter((node) => node.metadata.alias !== null).length,
    archived: nodes.filter((node) => node.metadata.archived).length,
    tombstones: 0,
    ...tally(nodes),
  };
}
