/**
 * Blueprints: portable copies of a subtree.
 *
 * Extraction discovers the nodes reachable from a root in pre-order and
 * renumbers them 0..n-1, dropping edges that leave the set. Import does the
 * reverse, creating the shape under a parent of another graph.
 */

import type { BlueprintDoc, GraphNode, Handle, NodeId } from '../../types/graph.js';
import { isPseudo } from '../../types/graph.js';
import { DOCUMENT_VERSION } from '../constants.js';
import { invariant } from '../errors.js';
import { getLogger } from '../logger.js';
import { GraphError } from './errors.js';
import type { Graph } from './graph.js';

export interface ExtractOptions {
  author?: string | null;
}

/**
 * Copy the subgraph reachable from `rootId` into a blueprint document.
 *
 * Every node appears once even when several parents share it. Aliases are
 * dropped, since they are only unique within their source graph.
 */
export function extractBlueprint(graph: Graph, rootId: NodeId, options: ExtractOptions = {}): BlueprintDoc {
  const root = graph.resolve(rootId);

  const order: Handle[] = [];
  const remap = new Map<Handle, Handle>();
  const discover = (handle: Handle): void => {
    if (remap.has(handle)) return;
    remap.set(handle, order.length);
    order.push(handle);
    for (const child of graph.node(handle).metadata.children) {
      discover(child);
    }
  };
  discover(root);

  const inSet = (handle: Handle): boolean => remap.has(handle);
  const at = (handle: Handle): Handle => {
    const mapped = remap.get(handle);
    invariant(mapped !== undefined, `handle ${handle} is outside the blueprint`);
    return mapped;
  };

  const nodes = order.map((handle): GraphNode => {
    const node = graph.node(handle);
    return {
      title: node.title,
      content: node.content,
      metadata: {
        archived: node.metadata.archived,
        index: at(handle),
        alias: null,
        parents: handle === root ? [] : node.metadata.parents.filter(inSet).map(at),
        children: node.metadata.children.filter(inSet).map(at),
      },
    };
  });

  getLogger('graph').debug({ root, size: nodes.length }, 'extracted blueprint');
  return {
    version: DOCUMENT_VERSION,
    title: graph.node(root).title,
    author: options.author ?? null,
    nodes,
  };
}

/**
 * Describe the first edge of a blueprint that points outside its node
 * list, or return null when every index is in range.
 */
export function findBlueprintRangeError(
  nodes: readonly { metadata: { parents: readonly number[]; children: readonly number[] } }[],
): string | null {
  const inRange = (index: number): boolean => Number.isInteger(index) && index >= 0 && index < nodes.length;
  for (const [slot, node] of nodes.entries()) {
    const parent = node.metadata.parents.find((index) => !inRange(index));
    if (parent !== undefined) return `node ${slot} has parent ${parent} outside the blueprint`;
    const child = node.metadata.children.find((index) => !inRange(index));
    if (child !== undefined) return `node ${slot} has child ${child} outside the blueprint`;
  }
  return null;
}

/**
 * Create the blueprint's nodes under `targetParentId`, or as a new root when
 * it is null. Returns the handle of the blueprint root's copy.
 *
 * Task states start at `none` and date nodes come back as tasks under their
 * own titles. An index outside the blueprint fails before anything is
 * inserted. A node shared by several blueprint parents is created once and
 * linked from each of them.
 */
export function importBlueprint(graph: Graph, doc: BlueprintDoc, targetParentId: NodeId | null): Handle {
  const first = doc.nodes[0];
  if (!first) {
    throw GraphError.invalidHandle(0);
  }
  const problem = findBlueprintRangeError(doc.nodes);
  if (problem !== null) {
    throw new GraphError('InvalidHandle', doc.nodes.length, `Invalid blueprint: ${problem}`);
  }
  const target = targetParentId === null ? null : graph.resolve(targetParentId);

  const blueprintNode = (handle: Handle): GraphNode => {
    const node = doc.nodes[handle];
    if (!node) {
      throw GraphError.invalidHandle(handle);
    }
    return node;
  };

  const created = new Map<Handle, Handle>();
  const build = (handle: Handle, parent: Handle): void => {
    const existing = created.get(handle);
    if (existing !== undefined) {
      graph.link(parent, existing);
      return;
    }
    const node = blueprintNode(handle);
    const copy = graph.insertChild(node.title, parent, isPseudo(node.content));
    created.set(handle, copy);
    for (const child of node.metadata.children) {
      build(child, copy);
    }
  };

  const rootCopy = target === null
    ? graph.insertRoot(first.title, isPseudo(first.content))
    : graph.insertChild(first.title, target, isPseudo(first.content));
  created.set(0, rootCopy);
  for (const child of first.metadata.children) {
    build(child, rootCopy);
  }

  getLogger('graph').debug({ root: rootCopy, size: created.size }, 'imported blueprint');
  return rootCopy;
}

