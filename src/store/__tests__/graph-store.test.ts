import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Graph } from '../../core/graph/graph.js';
import { loadGraph, saveGraph } from '../graph-store.js';

describe('graph store', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'trellis-graph-test-'));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it('starts empty when the file does not exist', async () => {
    const loaded = await loadGraph(join(tempDir, 'graph.yaml'));
    expect(loaded.graph.slotCount).toBe(0);
    expect(loaded.version).toBe(0);
    expect(loaded.upgraded).toBe(false);
  });

  it('saves and loads a graph', async () => {
    const filePath = join(tempDir, '.trellis', 'graph.yaml');
    const graph = new Graph();
    const root = graph.insertRoot('Release');
    graph.insertChild('Tag build', root);
    graph.setAlias(root, 'rel');

    await saveGraph(filePath, graph);

    expect((await readFile(filePath, 'utf8')).startsWith('version: 5\n')).toBe(true);
    const loaded = await loadGraph(filePath);
    expect(loaded.version).toBe(5);
    expect(loaded.upgraded).toBe(false);
    expect(loaded.graph.snapshot()).toEqual(graph.snapshot());
    expect(loaded.graph.resolve('rel')).toBe(root);
  });

  it('passes the clock through to the loaded graph', async () => {
    const filePath = join(tempDir, 'graph.yaml');
    const graph = new Graph();
    graph.insertDate('2024-03-05');
    await saveGraph(filePath, graph);

    const { graph: loaded } = await loadGraph(filePath, { now: () => new Date(2024, 2, 5) });
    expect(loaded.resolve('today')).toBe(0);
  });

  it('reports unreadable files as IO errors', async () => {
    await expect(loadGraph(tempDir)).rejects.toMatchObject({ name: 'DocumentError', reason: 'IOError' });
  });
});
