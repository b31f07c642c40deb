/**
 * Loading and saving the graph document at an explicit path.
 */

import { Graph, type GraphOptions } from '../core/graph/graph.js';
import { getLogger } from '../core/logger.js';
import { decodeDocument, encodeDocument, type DocumentFormat } from './document.js';
import { readStoreFile, writeStoreFile } from './files.js';
import { withLock } from './lock.js';

export interface LoadedGraph {
  graph: Graph;
  /** Version the file was written with. */
  version: number;
  /** True when the file needed the tolerant decoder. */
  upgraded: boolean;
}

/**
 * Load the graph stored at `filePath`. A missing or empty file is an
 * empty graph.
 */
export async function loadGraph(filePath: string, options?: GraphOptions): Promise<LoadedGraph> {
  const text = await readStoreFile(filePath, 'graph');
  if (text === null) {
    getLogger('store').debug({ filePath }, 'No graph file yet; starting empty');
    return { graph: new Graph(undefined, options), version: 0, upgraded: false };
  }

  const decoded = decodeDocument(text);
  const graph = new Graph(decoded.snapshot, options);
  getLogger('store').info({ filePath, nodes: graph.nodeCount, version: decoded.version }, 'Loaded graph');
  return { graph, version: decoded.version, upgraded: decoded.upgraded };
}

/**
 * Write the graph to `filePath` in the current document version, under a
 * file lock.
 */
export async function saveGraph(filePath: string, graph: Graph, format: DocumentFormat = 'yaml'): Promise<void> {
  const text = encodeDocument(graph.snapshot(), format);
  await withLock(filePath, () => writeStoreFile(filePath, text, 'graph'));
  getLogger('store').info({ filePath, nodes: graph.nodeCount }, 'Saved graph');
}
