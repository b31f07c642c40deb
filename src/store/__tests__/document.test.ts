/**
 * Tests for the graph document codec, including older on-disk versions.
 */

import { describe, it, expect } from 'vitest';
import { Graph } from '../../core/graph/graph.js';
import { ExitCode } from '../../types/exit-codes.js';
import { decodeDocument, encodeDocument, emptySnapshot } from '../document.js';
import { DocumentError } from '../errors.js';

/**
 *   0 Trip (trip)
 *   |-- 1 Book [x]
 *   `-- 2 Notes (pseudo)
 *   3 2024-06-01
 */
function tripGraph(): Graph {
  const graph = new Graph();
  const trip = graph.insertRoot('Trip');
  const book = graph.insertChild('Book', trip);
  graph.insertChild('Notes', trip, true);
  graph.insertDate('2024-06-01');
  graph.setAlias(trip, 'trip');
  graph.setState(book, 'done');
  return graph;
}

function decodeFailure(text: string): DocumentError {
  try {
    decodeDocument(text);
  } catch (err) {
    if (err instanceof DocumentError) return err;
    throw err;
  }
  throw new Error('expected a DocumentError');
}

describe('encodeDocument / decodeDocument', () => {
  it('reads back what it writes as YAML', () => {
    const graph = tripGraph();
    graph.remove(graph.insertRoot('Gone'));
    const text = encodeDocument(graph.snapshot());

    expect(text.startsWith('version: 5\n')).toBe(true);
    const decoded = decodeDocument(text);
    expect(decoded.version).toBe(5);
    expect(decoded.upgraded).toBe(false);
    expect(decoded.snapshot).toEqual(graph.snapshot());
  });

  it('reads back what it writes as JSON', () => {
    const graph = tripGraph();
    const text = encodeDocument(graph.snapshot(), 'json');

    expect(text.startsWith('{\n  "version": 5,')).toBe(true);
    expect(text.endsWith('}\n')).toBe(true);
    expect(decodeDocument(text).snapshot).toEqual(graph.snapshot());
  });

  it('writes kinds and states capitalized', () => {
    const text = encodeDocument(tripGraph().snapshot(), 'json');
    expect(text).toContain('"type": "Pseudo"');
    expect(text).toContain('"state": "Done"');
    expect(text).toContain('"date": "2024-06-01"');
  });

  it('treats empty input as an empty graph', () => {
    for (const text of ['', '  \n', 'null\n']) {
      const decoded = decodeDocument(text);
      expect(decoded.snapshot).toEqual(emptySnapshot());
      expect(decoded.upgraded).toBe(false);
    }
  });

  it('rejects text that is not YAML', () => {
    const err = decodeFailure('version: [5\n');
    expect(err.reason).toBe('ParseError');
    expect(err.code).toBe(ExitCode.PARSE_ERROR);
  });

  it('rejects a missing or unknown version', () => {
    expect(decodeFailure('graph: {}\n').code).toBe(ExitCode.PARSE_ERROR);
    expect(decodeFailure('version: 9\ngraph: {}\n').code).toBe(ExitCode.UNSUPPORTED_VERSION);
  });
});

describe('older versions', () => {
  it('loads a flat version 3 document into the same graph', () => {
    const legacy = `
version: 3
graph:
  nodes:
    - message: Trip
      state: complete
      index: 0
      alias: trip
      parents: []
      children: [1, 2]
    - message: Book
      state: complete
      index: 1
      alias: null
      parents: [0]
      children: []
    - message: Notes
      state: pseudo
      index: 2
      alias: null
      parents: [0]
      children: []
    - message: "2024-06-01"
      state: none
      index: 3
      alias: null
      parents: []
      children: []
  roots: [0]
  dates:
    "2024-06-01": 3
  aliases:
    trip: 0
`;
    const decoded = decodeDocument(legacy);
    expect(decoded.version).toBe(3);
    expect(decoded.upgraded).toBe(true);
    expect(decoded.snapshot).toEqual(tripGraph().snapshot());
  });

  it('loads a flat version 4 document with archived nodes and node-local aliases', () => {
    const legacy = `
version: 4
graph:
  nodes:
    - message: Chores
      type: task
      state: partial
      archived: true
      index: 0
      alias: chores
      parents: []
      children: [1, 2]
    - message: Dishes
      type: task
      state: done
      archived: false
      index: 1
      parents: [0]
      children: []
    - message: Laundry
      type: task
      state: none
      index: 2
      parents: [0]
      children: []
  roots: [0]
  archived: [0]
  dates: {}
  aliases: {}
`;
    const { snapshot, version } = decodeDocument(legacy);
    expect(version).toBe(4);
    expect(snapshot.aliases).toEqual(new Map([['chores', 0]]));
    expect(snapshot.archived).toEqual([0]);
    expect(snapshot.nodes.map((node) => node?.content)).toEqual([
      { kind: 'task', state: 'partial' },
      { kind: 'task', state: 'done' },
      { kind: 'task', state: 'none' },
    ]);
    expect(snapshot.nodes[2]?.metadata.archived).toBe(false);
  });

  it('repairs a current document whose edges and tables disagree', () => {
    const node = (title: string, index: number, parents: number[], children: number[]) => ({
      title,
      type: 'Task',
      state: 'None',
      metadata: { archived: false, index, alias: null, parents, children },
    });
    const text = JSON.stringify({
      version: 5,
      graph: {
        nodes: [node('Parent', 0, [], [1]), node('Child', 1, [], [])],
        roots: [0, 1],
        archived: [],
        dates: {},
        aliases: { ghost: 7 },
      },
    });

    const { snapshot, upgraded } = decodeDocument(text);
    expect(upgraded).toBe(true);
    expect(snapshot.nodes[1]?.metadata.parents).toEqual([0]);
    expect(snapshot.roots).toEqual([0]);
    expect(snapshot.aliases.size).toBe(0);
  });

  it('repairs a current document that lists edges and roots twice', () => {
    const text = JSON.stringify({
      version: 5,
      graph: {
        nodes: [
          { title: 'Parent', type: 'Task', state: 'None', metadata: { archived: false, index: 0, alias: null, parents: [], children: [1, 1] } },
          { title: 'Child', type: 'Task', state: 'None', metadata: { archived: false, index: 1, alias: null, parents: [0, 0], children: [] } },
        ],
        roots: [0, 0],
        archived: [],
        dates: {},
        aliases: {},
      },
    });

    const { snapshot, upgraded } = decodeDocument(text);
    expect(upgraded).toBe(true);
    expect(snapshot.nodes[0]?.metadata.children).toEqual([1]);
    expect(snapshot.nodes[1]?.metadata.parents).toEqual([0]);
    expect(snapshot.roots).toEqual([0]);

    const graph = new Graph(snapshot);
    graph.unlink(0, 1);
    expect(graph.roots).toEqual([0, 1]);
  });
});
