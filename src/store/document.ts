/**
 * Graph document codec.
 *
 * A document is `{ version, graph }`. YAML is the on-disk encoding and JSON
 * is offered for export; since JSON is a subset of YAML, one parser reads
 * both. Current documents are decoded strictly; anything else falls back to
 * the version table in compat.ts.
 */

import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { GraphNode, GraphSnapshot, Handle, TaskState } from '../types/graph.js';
import { DOCUMENT_VERSION } from '../core/constants.js';
import { getLogger } from '../core/logger.js';
import { DocumentError } from './errors.js';
import { decodeTolerant } from './compat.js';
import { documentSchema, type DocumentDoc, type GraphDoc, type NodeDoc } from './schema.js';

export type DocumentFormat = 'yaml' | 'json';

export interface DecodedDocument {
  snapshot: GraphSnapshot;
  /** Version the document was written with. */
  version: number;
  /** True when the strict decoder rejected the document. */
  upgraded: boolean;
}

const STATE_NAMES: Record<TaskState, 'None' | 'Partial' | 'Done'> = {
  none: 'None',
  partial: 'Partial',
  done: 'Done',
};

const STATE_VALUES: Record<'None' | 'Partial' | 'Done', TaskState> = {
  None: 'none',
  Partial: 'partial',
  Done: 'done',
};

export function emptySnapshot(): GraphSnapshot {
  return { nodes: [], roots: [], archived: [], dates: new Map(), aliases: new Map() };
}

// ---------------------------------------------------------------------------
// Encoding
// ---------------------------------------------------------------------------

export function toNodeDoc(node: GraphNode): NodeDoc {
  const metadata = {
    archived: node.metadata.archived,
    index: node.metadata.index,
    alias: node.metadata.alias,
    parents: [...node.metadata.parents],
    children: [...node.metadata.children],
  };
  switch (node.content.kind) {
    case 'task':
      return { title: node.title, type: 'Task', state: STATE_NAMES[node.content.state], metadata };
    case 'date':
      return { title: node.title, type: 'Date', date: node.content.date, metadata };
    case 'pseudo':
      return { title: node.title, type: 'Pseudo', metadata };
  }
}

/** Plain document object of a graph, in the current shape. */
export function toDocument(snapshot: GraphSnapshot): DocumentDoc {
  return {
    version: DOCUMENT_VERSION,
    graph: {
      nodes: snapshot.nodes.map((node) => (node ? toNodeDoc(node) : null)),
      roots: [...snapshot.roots],
      archived: [...snapshot.archived],
      dates: Object.fromEntries(snapshot.dates),
      aliases: Object.fromEntries(snapshot.aliases),
    },
  };
}

/** Serialize a graph in the current document version. */
export function encodeDocument(snapshot: GraphSnapshot, format: DocumentFormat = 'yaml'): string {
  const document = toDocument(snapshot);
  return format === 'json'
    ? JSON.stringify(document, null, 2) + '\n'
    : stringifyYaml(document);
}

// ---------------------------------------------------------------------------
// Decoding
// ---------------------------------------------------------------------------

export function fromNodeDoc(doc: NodeDoc): GraphNode {
  const metadata = {
    ...doc.metadata,
    parents: [...doc.metadata.parents],
    children: [...doc.metadata.children],
  };
  switch (doc.type) {
    case 'Task':
      return { title: doc.title, content: { kind: 'task', state: STATE_VALUES[doc.state] }, metadata };
    case 'Date':
      return { title: doc.title, content: { kind: 'date', date: doc.date }, metadata };
    case 'Pseudo':
      return { title: doc.title, content: { kind: 'pseudo' }, metadata };
  }
}

function hasDuplicates(handles: readonly Handle[]): boolean {
  return new Set(handles).size !== handles.length;
}

/**
 * Describe the first referential inconsistency of a schema-valid graph,
 * or return null when there is none.
 */
export function findInconsistency(graph: GraphDoc): string | null {
  const { nodes } = graph;
  const live = (handle: Handle): boolean => nodes[handle] != null;

  if (hasDuplicates(graph.roots)) return 'roots list a node twice';
  if (hasDuplicates(graph.archived)) return 'archived lists a node twice';

  for (const [slot, node] of nodes.entries()) {
    if (!node) continue;
    if (node.metadata.index !== slot) return `node ${slot} records index ${node.metadata.index}`;
    if (hasDuplicates(node.metadata.parents)) return `node ${slot} lists a parent twice`;
    if (hasDuplicates(node.metadata.children)) return `node ${slot} lists a child twice`;
    for (const parent of node.metadata.parents) {
      if (!nodes[parent]?.metadata.children.includes(slot)) return `edge ${parent}->${slot} is one-sided`;
    }
    for (const child of node.metadata.children) {
      if (!nodes[child]?.metadata.parents.includes(slot)) return `edge ${slot}->${child} is one-sided`;
    }
    if (node.metadata.alias !== null && graph.aliases[node.metadata.alias] !== slot) {
      return `alias '${node.metadata.alias}' of node ${slot} is not registered`;
    }
    if (node.type === 'Date' && graph.dates[node.date] !== slot) {
      return `date ${node.date} of node ${slot} is not registered`;
    }
    const rooted = node.metadata.parents.length === 0 && node.type !== 'Date';
    if (rooted !== graph.roots.includes(slot)) return `roots disagree about node ${slot}`;
    if (node.metadata.archived !== graph.archived.includes(slot)) return `archived disagrees about node ${slot}`;
  }

  for (const handle of [...graph.roots, ...graph.archived]) {
    if (!live(handle)) return `handle ${handle} is not live`;
  }
  for (const [alias, handle] of Object.entries(graph.aliases)) {
    if (nodes[handle]?.metadata.alias !== alias) return `alias '${alias}' points at ${handle}`;
  }
  for (const [date, handle] of Object.entries(graph.dates)) {
    const node = nodes[handle];
    if (node?.type !== 'Date' || node.date !== date) return `date ${date} points at ${handle}`;
  }
  return null;
}

function fromGraphDoc(graph: GraphDoc): GraphSnapshot {
  return {
    nodes: graph.nodes.map((node) => (node ? fromNodeDoc(node) : null)),
    roots: [...graph.roots],
    archived: [...graph.archived],
    dates: new Map(Object.entries(graph.dates)),
    aliases: new Map(Object.entries(graph.aliases)),
  };
}

/**
 * Decode a YAML or JSON document. Empty input is an empty graph.
 *
 * @throws DocumentError on unparseable text or an unsupported version
 */
export function decodeDocument(text: string): DecodedDocument {
  if (text.trim() === '') {
    return { snapshot: emptySnapshot(), version: DOCUMENT_VERSION, upgraded: false };
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new DocumentError('ParseError', 'Graph document is not valid YAML or JSON', { cause: err });
  }
  if (raw === null || raw === undefined) {
    return { snapshot: emptySnapshot(), version: DOCUMENT_VERSION, upgraded: false };
  }

  const strict = documentSchema.safeParse(raw);
  if (strict.success) {
    const problem = findInconsistency(strict.data.graph);
    if (problem === null) {
      return { snapshot: fromGraphDoc(strict.data.graph), version: strict.data.version, upgraded: false };
    }
    getLogger('store').warn({ problem }, 'Graph document is inconsistent; repairing');
  }

  const { version, snapshot } = decodeTolerant(raw);
  if (version !== DOCUMENT_VERSION) {
    getLogger('store').warn({ version }, 'Reading a graph document from an older version');
  }
  return { snapshot, version, upgraded: true };
}
