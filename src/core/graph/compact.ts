/**
 * Graph compaction.
 *
 * Rebuilds the derived registries (aliases, dates, archived, roots) from
 * each live node's own fields, drops edges into tombstones, and renumbers
 * the surviving nodes densely in their original slot order.
 */

import type { GraphNode, GraphSnapshot, Handle } from '../../types/graph.js';
import { cloneNode, isDate } from '../../types/graph.js';
import { invariant } from '../errors.js';

/**
 * Map old handles to new ones. Tombstones map to undefined.
 *
 * [a, null, b, c, null, d] -> [0, -, 1, 2, -, 3]
 */
export function denseRemap(nodes: readonly (GraphNode | null)[]): (Handle | undefined)[] {
  const remap: (Handle | undefined)[] = [];
  let next = 0;
  for (const node of nodes) {
    remap.push(node ? next++ : undefined);
  }
  return remap;
}

/**
 * Produce a compacted copy of a graph snapshot. The input is left untouched.
 */
export function compactSnapshot(snapshot: GraphSnapshot): GraphSnapshot {
  const source = snapshot.nodes;
  const isLive = (handle: Handle): boolean => source[handle] != null;

  // Working copies with dangling edges removed
  const nodes: (GraphNode | null)[] = source.map((node) => {
    if (!node) return null;
    const copy = cloneNode(node);
    copy.metadata.parents = copy.metadata.parents.filter(isLive);
    copy.metadata.children = copy.metadata.children.filter(isLive);
    return copy;
  });

  // Registries from node-local truth; a later slot claiming the same key wins
  const aliases = new Map<string, Handle>();
  const dates = new Map<string, Handle>();
  const archived: Handle[] = [];
  nodes.forEach((node, slot) => {
    if (!node) return;
    const alias = node.metadata.alias;
    if (alias !== null) {
      const previous = aliases.get(alias);
      const previousNode = previous === undefined ? null : nodes[previous];
      if (previousNode) previousNode.metadata.alias = null;
      aliases.set(alias, slot);
    }
    if (isDate(node.content)) {
      dates.set(node.content.date, slot);
    }
    if (node.metadata.archived) {
      archived.push(slot);
    }
  });

  const dateHandles = new Set(dates.values());
  const roots: Handle[] = [];
  nodes.forEach((node, slot) => {
    if (node && node.metadata.parents.length === 0 && !dateHandles.has(slot)) {
      roots.push(slot);
    }
  });

  const remap = denseRemap(nodes);
  const at = (handle: Handle): Handle => {
    const mapped = remap[handle];
    invariant(mapped !== undefined, `handle ${handle} survived compaction without a slot`);
    return mapped;
  };

  const compacted: GraphNode[] = [];
  nodes.forEach((node, slot) => {
    if (!node) return;
    node.metadata.index = at(slot);
    node.metadata.parents = node.metadata.parents.map(at);
    node.metadata.children = node.metadata.children.map(at);
    compacted.push(node);
  });

  return {
    nodes: compacted,
    roots: roots.map(at),
    archived: archived.map(at),
    dates: new Map([...dates].map(([key, handle]) => [key, at(handle)])),
    aliases: new Map([...aliases].map(([key, handle]) => [key, at(handle)])),
  };
}

/**
 * Whether tombstones exceed `thresholdPercent` of all slots.
 */
export function shouldAutoClean(
  graph: { readonly slotCount: number; readonly tombstoneCount: number },
  thresholdPercent: number,
): boolean {
  if (graph.slotCount === 0) return false;
  return (graph.tombstoneCount / graph.slotCount) * 100 > thresholdPercent;
}
