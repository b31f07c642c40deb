/**
 * Tolerant decoding of graph documents, including older on-disk versions.
 *
 * Each supported version has a decoder that maps its node shape onto the
 * current model with missing fields defaulted. The result then goes through
 * one reconciliation pass that drops references to absent nodes and brings
 * the registries back in line with the nodes.
 *
 *   version 1-3: flat nodes, `message` + `state` (none|partial|complete|pseudo),
 *                a node is a date iff the `dates` table points at it
 *   version 4:   flat nodes, `message` + `type` + `state` + `archived`
 *   version 5:   nested nodes, `title` + `type` + `metadata`
 */

import type { GraphNode, GraphSnapshot, Handle, NodeContent, TaskState } from '../types/graph.js';
import { isDate } from '../types/graph.js';
import { parseDateKey } from '../core/dates.js';
import { DocumentError } from './errors.js';

type Fields = Record<string, unknown>;

/** Decoded but not yet reconciled graph. */
interface RawGraph {
  nodes: (GraphNode | null)[];
  roots: Handle[];
  archived: Handle[];
  dates: Map<string, Handle>;
  aliases: Map<string, Handle>;
}

type VersionDecoder = (graph: Fields) => RawGraph;

// ---------------------------------------------------------------------------
// Field readers
// ---------------------------------------------------------------------------

function asFields(value: unknown): Fields {
  if (typeof value === 'object' && value !== null && !Array.isArray(value)) {
    return Object.fromEntries(Object.entries(value));
  }
  return {};
}

function asList(value: unknown): unknown[] {
  return Array.isArray(value) ? value : [];
}

function asHandle(value: unknown): Handle | null {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : null;
}

function asHandles(value: unknown): Handle[] {
  const handles: Handle[] = [];
  for (const item of asList(value)) {
    const handle = asHandle(item);
    if (handle !== null && !handles.includes(handle)) handles.push(handle);
  }
  return handles;
}

function asText(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  return null;
}

function asKeyword(value: unknown): string | null {
  return typeof value === 'string' ? value.trim().toLowerCase() : null;
}

function asHandleTable(value: unknown): Map<string, Handle> {
  const table = new Map<string, Handle>();
  for (const [key, raw] of Object.entries(asFields(value))) {
    const handle = asHandle(raw);
    if (handle !== null) table.set(key, handle);
  }
  return table;
}

function asTaskState(value: unknown): TaskState {
  const keyword = asKeyword(value);
  if (keyword === 'done' || keyword === 'complete') return 'done';
  if (keyword === 'partial') return 'partial';
  return 'none';
}

function dateKeyOf(candidate: string): string | null {
  try {
    return parseDateKey(candidate.trim());
  } catch {
    return null;
  }
}

/** Invert a date table: handle -> date key. */
function dateByHandle(dates: ReadonlyMap<string, Handle>): Map<Handle, string> {
  const inverse = new Map<Handle, string>();
  for (const [key, handle] of dates) {
    const canonical = dateKeyOf(key);
    if (canonical !== null) inverse.set(handle, canonical);
  }
  return inverse;
}

function buildNode(title: string, content: NodeContent, fields: Fields, slot: Handle, archived: boolean): GraphNode {
  return {
    title,
    content,
    metadata: {
      archived,
      index: slot,
      alias: asText(fields.alias),
      parents: asHandles(fields.parents),
      children: asHandles(fields.children),
    },
  };
}

// ---------------------------------------------------------------------------
// Version decoders
// ---------------------------------------------------------------------------

const decodeFlatV3: VersionDecoder = (graph) => {
  const dates = asHandleTable(graph.dates);
  const dated = dateByHandle(dates);

  const nodes = asList(graph.nodes).map((entry, slot): GraphNode | null => {
    if (entry === null || entry === undefined) return null;
    const fields = asFields(entry);
    const title = asText(fields.message) ?? '';
    const date = dated.get(slot);
    let content: NodeContent;
    if (date !== undefined) {
      content = { kind: 'date', date };
    } else if (asKeyword(fields.state) === 'pseudo') {
      content = { kind: 'pseudo' };
    } else {
      content = { kind: 'task', state: asTaskState(fields.state) };
    }
    return buildNode(title, content, fields, slot, false);
  });

  return { nodes, roots: asHandles(graph.roots), archived: [], dates, aliases: asHandleTable(graph.aliases) };
};

/** Content for a node typed `task`/`date`/`pseudo` by a v4 or v5 document. */
function typedContent(
  type: string | null,
  state: unknown,
  date: string | null,
): NodeContent {
  if (type === 'pseudo') return { kind: 'pseudo' };
  if (type === 'date' && date !== null) return { kind: 'date', date };
  return { kind: 'task', state: asTaskState(state) };
}

const decodeFlatV4: VersionDecoder = (graph) => {
  const dates = asHandleTable(graph.dates);
  const dated = dateByHandle(dates);

  const nodes = asList(graph.nodes).map((entry, slot): GraphNode | null => {
    if (entry === null || entry === undefined) return null;
    const fields = asFields(entry);
    const title = asText(fields.message) ?? '';
    const date = dated.get(slot) ?? dateKeyOf(title);
    const content = typedContent(asKeyword(fields.type), fields.state, date);
    return buildNode(title, content, fields, slot, fields.archived === true);
  });

  return {
    nodes,
    roots: asHandles(graph.roots),
    archived: asHandles(graph.archived),
    dates,
    aliases: asHandleTable(graph.aliases),
  };
};

const decodeNestedV5: VersionDecoder = (graph) => {
  const dates = asHandleTable(graph.dates);
  const dated = dateByHandle(dates);

  const nodes = asList(graph.nodes).map((entry, slot): GraphNode | null => {
    if (entry === null || entry === undefined) return null;
    const fields = asFields(entry);
    const metadata = asFields(fields.metadata);
    const title = asText(fields.title) ?? '';
    const date = dateKeyOf(asText(fields.date) ?? '') ?? dated.get(slot) ?? dateKeyOf(title);
    const content = typedContent(asKeyword(fields.type), fields.state, date);
    return buildNode(title, content, metadata, slot, metadata.archived === true);
  });

  return {
    nodes,
    roots: asHandles(graph.roots),
    archived: asHandles(graph.archived),
    dates,
    aliases: asHandleTable(graph.aliases),
  };
};

const DECODERS: ReadonlyMap<number, VersionDecoder> = new Map([
  [1, decodeFlatV3],
  [2, decodeFlatV3],
  [3, decodeFlatV3],
  [4, decodeFlatV4],
  [5, decodeNestedV5],
]);

// ---------------------------------------------------------------------------
// Reconciliation
// ---------------------------------------------------------------------------

/**
 * Bring a decoded graph back in line with the model's invariants.
 *
 * - edges into absent slots are dropped and the remaining edges made mutual
 * - node-local aliases override the alias table; aliases to absent nodes
 *   are dropped and every surviving alias is written back onto its node
 * - dates are keyed by the date nodes themselves
 * - archived and roots are filtered, then completed from the nodes
 */
export function reconcile(raw: RawGraph): GraphSnapshot {
  const { nodes } = raw;
  const live = (handle: Handle): boolean => nodes[handle] != null;
  const liveNodes = (): [Handle, GraphNode][] =>
    nodes.flatMap((node, slot): [Handle, GraphNode][] => (node ? [[slot, node]] : []));

  for (const [, node] of liveNodes()) {
    node.metadata.parents = node.metadata.parents.filter(live);
    node.metadata.children = node.metadata.children.filter(live);
  }
  for (const [slot, node] of liveNodes()) {
    for (const child of node.metadata.children) {
      const childNode = nodes[child];
      if (childNode && !childNode.metadata.parents.includes(slot)) childNode.metadata.parents.push(slot);
    }
    for (const parent of node.metadata.parents) {
      const parentNode = nodes[parent];
      if (parentNode && !parentNode.metadata.children.includes(slot)) parentNode.metadata.children.push(slot);
    }
  }

  // Aliases: the table first, then node-local values on top
  const aliases = new Map([...raw.aliases].filter(([, handle]) => live(handle)));
  for (const [slot, node] of liveNodes()) {
    if (node.metadata.alias !== null) aliases.set(node.metadata.alias, slot);
  }
  for (const [alias, handle] of aliases) {
    const node = nodes[handle];
    if (node) node.metadata.alias = alias;
  }
  for (const [alias, handle] of [...aliases]) {
    if (nodes[handle]?.metadata.alias !== alias) aliases.delete(alias);
  }
  for (const [slot, node] of liveNodes()) {
    const alias = node.metadata.alias;
    if (alias !== null && aliases.get(alias) !== slot) node.metadata.alias = null;
  }

  const dates = new Map<string, Handle>();
  for (const [slot, node] of liveNodes()) {
    if (isDate(node.content) && !dates.has(node.content.date)) dates.set(node.content.date, slot);
  }
  for (const [slot, node] of liveNodes()) {
    if (isDate(node.content) && dates.get(node.content.date) !== slot) {
      node.content = { kind: 'task', state: 'none' };
    }
  }

  const archived = raw.archived.filter(live);
  for (const handle of archived) {
    const node = nodes[handle];
    if (node) node.metadata.archived = true;
  }
  for (const [slot, node] of liveNodes()) {
    if (node.metadata.archived && !archived.includes(slot)) archived.push(slot);
  }

  const isRoot = (handle: Handle): boolean => {
    const node = nodes[handle];
    return node != null && node.metadata.parents.length === 0 && !isDate(node.content);
  };
  const roots = raw.roots.filter((handle, position) => isRoot(handle) && raw.roots.indexOf(handle) === position);
  for (const [slot] of liveNodes()) {
    if (isRoot(slot) && !roots.includes(slot)) roots.push(slot);
  }

  return { nodes, roots, archived, dates, aliases };
}

/**
 * Decode any supported document version into a consistent snapshot.
 *
 * @throws DocumentError when the version is missing or unknown
 */
export function decodeTolerant(document: unknown): { version: number; snapshot: GraphSnapshot } {
  const fields = asFields(document);
  const version = fields.version;
  if (typeof version !== 'number') {
    throw new DocumentError('ParseError', 'Document has no version field');
  }
  const decoder = DECODERS.get(version);
  if (!decoder) {
    throw DocumentError.unsupportedVersion(version);
  }
  return { version, snapshot: reconcile(decoder(asFields(fields.graph))) };
}
