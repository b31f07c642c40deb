/**
 * Tests for the Graph node store: insertion, edges, removal, aliases,
 * state propagation, traversal and compaction.
 */

import { describe, it, expect } from 'vitest';
import { Graph } from '../graph.js';
import { GraphError } from '../errors.js';
import { shouldAutoClean } from '../compact.js';

function catchError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (err) {
    return err;
  }
  throw new Error('expected an error');
}

function expectGraphError(fn: () => unknown, reason: GraphError['reason']): GraphError {
  const err = catchError(fn);
  expect(err).toBeInstanceOf(GraphError);
  if (!(err instanceof GraphError)) throw err;
  expect(err.reason).toBe(reason);
  return err;
}

/** Every edge is recorded on both of its ends. */
function expectSymmetric(graph: Graph): void {
  graph.slots.forEach((node, slot) => {
    if (!node) return;
    for (const child of node.metadata.children) {
      expect(graph.slots[child]?.metadata.parents).toContain(slot);
    }
    for (const parent of node.metadata.parents) {
      expect(graph.slots[parent]?.metadata.children).toContain(slot);
    }
  });
}

function stateOf(graph: Graph, handle: number): string {
  const { content } = graph.node(handle);
  return content.kind === 'task' ? content.state : content.kind;
}

describe('insertion', () => {
  it('numbers nodes by slot and lists parentless ones as roots', () => {
    const graph = new Graph();
    const root = graph.insertRoot('Release');
    const child = graph.insertChild('Write notes', root);

    expect([root, child]).toEqual([0, 1]);
    expect(graph.roots).toEqual([0]);
    expect(graph.children(0)).toEqual([1]);
    expect(graph.parents(1)).toEqual([0]);
    expect(graph.node(1).metadata.index).toBe(1);
  });

  it('registers date nodes under their canonical key and not as roots', () => {
    const graph = new Graph();
    const day = graph.insertDate('2024-3-5');

    expect(graph.dates.get('2024-03-05')).toBe(day);
    expect(graph.roots).toEqual([]);
    expect(graph.node(day).title).toBe('2024-03-05');
    expect(graph.insertDate('2024-03-05')).toBe(day);
    expect(graph.slotCount).toBe(1);
  });

  it('rejects malformed dates', () => {
    const graph = new Graph();
    expectGraphError(() => graph.insertDate('someday'), 'MalformedDate');
    expectGraphError(() => graph.insertDate('2023-02-29'), 'MalformedDate');
  });
});

describe('edges', () => {
  it('keeps parent and child lists symmetric across edits', () => {
    const graph = new Graph();
    const a = graph.insertRoot('A');
    const b = graph.insertChild('B', a);
    const c = graph.insertChild('C', b);
    const d = graph.insertRoot('D');

    graph.link(d, c);
    graph.link(a, c);
    graph.unlink(b, c);
    graph.cleanParents(b);
    graph.link(d, b);
    graph.remove(a);

    expectSymmetric(graph);
    expect(graph.parents(c)).toEqual([d]);
    expect(graph.children(d)).toEqual([c, b]);
  });

  it('treats linking an existing edge and unlinking a missing one as no-ops', () => {
    const graph = new Graph();
    const root = graph.insertRoot('R');
    const child = graph.insertChild('C', root);

    graph.link(root, child);
    expect(graph.children(root)).toEqual([child]);

    const other = graph.insertRoot('O');
    graph.unlink(other, child);
    expect(graph.parents(child)).toEqual([root]);
  });

  it('moves nodes in and out of the root list', () => {
    const graph = new Graph();
    const a = graph.insertRoot('A');
    const b = graph.insertRoot('B');
    expect(graph.roots).toEqual([a, b]);

    graph.link(a, b);
    expect(graph.roots).toEqual([a]);

    graph.unlink(a, b);
    expect(graph.roots).toEqual([a, b]);
  });

  it('reorders a child within its parent, clamped to the list', () => {
    const graph = new Graph();
    const root = graph.insertRoot('R');
    const a = graph.insertChild('A', root);
    const b = graph.insertChild('B', root);
    const c = graph.insertChild('C', root);

    expect(graph.reorderChild(c, root, -1)).toBe(1);
    expect(graph.children(root)).toEqual([a, c, b]);

    expect(graph.reorderChild(a, root, -5)).toBe(0);
    expect(graph.children(root)).toEqual([a, c, b]);

    expect(graph.reorderChild(a, root, 10)).toBe(2);
    expect(graph.children(root)).toEqual([c, b, a]);

    expectGraphError(() => graph.reorderChild(root, a, 1), 'InvalidHandle');
  });
});

describe('removal', () => {
  it('tombstones a node and promotes its orphaned children to roots', () => {
    const graph = new Graph();
    const root = graph.insertRoot('R');
    const middle = graph.insertChild('M', root);
    const leaf = graph.insertChild('L', middle);

    graph.remove(middle);

    expect(graph.slots[middle]).toBeNull();
    expect(graph.tombstoneCount).toBe(1);
    expect(graph.roots).toEqual([root, leaf]);
    expect(graph.children(root)).toEqual([]);
    expectGraphError(() => graph.resolve(middle), 'InvalidHandle');
  });

  it('removes everything reachable below a node', () => {
    const graph = new Graph();
    const first = graph.insertRoot('P1');
    const second = graph.insertRoot('P2');
    const shared = graph.insertChild('Shared', first);
    graph.link(second, shared);
    graph.insertChild('Leaf', shared);

    graph.removeRecursive(first);

    expect(graph.nodeCount).toBe(1);
    expect(graph.roots).toEqual([second]);
    expect(graph.children(second)).toEqual([]);
    expectSymmetric(graph);
  });

  it('drops a removed node from the alias and date tables', () => {
    const graph = new Graph();
    const day = graph.insertDate('2024-01-02');
    const task = graph.insertChild('Call', day);
    graph.setAlias(task, 'call');

    graph.removeRecursive(day);

    expect(graph.dates.size).toBe(0);
    expect(graph.aliases.size).toBe(0);
  });
});

describe('aliases', () => {
  it('resolves a trimmed alias and replaces the node\'s previous one', () => {
    const graph = new Graph();
    const root = graph.insertRoot('Release');

    graph.setAlias(root, ' rel ');
    expect(graph.resolve('rel')).toBe(root);

    graph.setAlias(root, 'release');
    expect([...graph.aliases.keys()]).toEqual(['release']);
    expect(graph.node(root).metadata.alias).toBe('release');
  });

  it('rejects empty aliases and unaliasing a node without one', () => {
    const graph = new Graph();
    const root = graph.insertRoot('R');
    expectGraphError(() => graph.setAlias(root, '   '), 'InvalidAlias');
    expectGraphError(() => graph.unsetAlias(root), 'InvalidAlias');

    graph.setAlias(root, 'r');
    graph.unsetAlias(root);
    expect(graph.aliases.size).toBe(0);
    expect(graph.node(root).metadata.alias).toBeNull();
  });

  it('lets a second owner take an alias; clean() clears the first owner', () => {
    const graph = new Graph();
    const a = graph.insertRoot('A');
    const b = graph.insertRoot('B');
    graph.setAlias(a, 'shared');
    graph.setAlias(b, 'shared');

    expect(graph.resolve('shared')).toBe(b);
    expect(graph.node(a).metadata.alias).toBe('shared');

    graph.clean();
    expect(graph.node(a).metadata.alias).toBeNull();
    expect(graph.aliases.get('shared')).toBe(b);
  });
});

describe('state propagation', () => {
  it('derives a parent from its children on insertion and on set', () => {
    const graph = new Graph();
    const root = graph.insertRoot('R');
    const a = graph.insertChild('A', root);
    graph.setState(a, 'done');
    expect(stateOf(graph, root)).toBe('done');

    const b = graph.insertChild('B', root);
    expect(stateOf(graph, root)).toBe('partial');

    graph.setState(b, 'done');
    expect(stateOf(graph, root)).toBe('done');
  });

  it('excludes pseudo children from the completion ratio', () => {
    const graph = new Graph();
    const parent = graph.insertRoot('P');
    const task = graph.insertChild('X', parent);
    const pseudo = graph.insertChild('Y', parent, true);
    graph.setState(task, 'done');
    expect(stateOf(graph, parent)).toBe('done');

    const below = graph.insertChild('Z', pseudo);
    graph.setState(below, 'partial');
    expect(stateOf(graph, parent)).toBe('done');
    expect(stateOf(graph, pseudo)).toBe('pseudo');
    expectGraphError(() => graph.setState(pseudo, 'done'), 'NotTaskNode');
  });

  it('pushes an explicit state down to task descendants', () => {
    const graph = new Graph();
    const root = graph.insertRoot('R');
    const a = graph.insertChild('A', root);
    const b = graph.insertChild('B', a);

    graph.setState(root, 'done');
    expect([stateOf(graph, root), stateOf(graph, a), stateOf(graph, b)]).toEqual(['done', 'done', 'done']);

    graph.setState(b, 'none');
    expect([stateOf(graph, root), stateOf(graph, a)]).toEqual(['none', 'none']);
  });

  it('completes every path above a node shared by two parents', () => {
    const graph = new Graph();
    const root = graph.insertRoot('R');
    const x = graph.insertChild('X', root);
    const y = graph.insertChild('Y', root);
    const shared = graph.insertChild('D', x);
    graph.link(y, shared);

    graph.setState(shared, 'done');
    expect([shared, x, y, root].map((h) => stateOf(graph, h))).toEqual(['done', 'done', 'done', 'done']);

    graph.setState(shared, 'none');
    expect([x, y, root].map((h) => stateOf(graph, h))).toEqual(['none', 'none', 'none']);
  });

  it('leaves tasks below a pseudo child alone when pushing a state down', () => {
    const graph = new Graph();
    const root = graph.insertRoot('R');
    const task = graph.insertChild('A', root);
    const notes = graph.insertChild('Notes', root, true);
    const below = graph.insertChild('Idea', notes);

    graph.setState(root, 'done');
    expect(stateOf(graph, task)).toBe('done');
    expect(stateOf(graph, notes)).toBe('pseudo');
    expect(stateOf(graph, below)).toBe('none');
  });

  it('changes only the node itself without propagation', () => {
    const graph = new Graph();
    const root = graph.insertRoot('R');
    const a = graph.insertChild('A', root);

    graph.setState(root, 'done', false);
    expect(stateOf(graph, root)).toBe('done');
    expect(stateOf(graph, a)).toBe('none');
  });

  it('refuses to set the state of a date node', () => {
    const graph = new Graph();
    const day = graph.insertDate('2024-05-01');
    expectGraphError(() => graph.setState(day, 'done'), 'NotTaskNode');
  });
});

describe('archiving and traversal', () => {
  it('hides archived subtrees unless asked for them', () => {
    const graph = new Graph();
    const root = graph.insertRoot('R');
    const hidden = graph.insertChild('H', root);
    graph.insertChild('Below', hidden);
    const shown = graph.insertChild('S', root);

    graph.setArchived(hidden, true);
    expect(graph.archived).toEqual([hidden]);
    expect(graph.traverse([root]).map((e) => e.node.metadata.index)).toEqual([root, shown]);
    expect(graph.traverse([root], { includeArchived: true })).toHaveLength(4);

    graph.setArchived(hidden, false);
    expect(graph.archived).toEqual([]);
  });

  it('limits traversal depth and visits shared nodes once per path', () => {
    const graph = new Graph();
    const root = graph.insertRoot('R');
    const a = graph.insertChild('A', root);
    const b = graph.insertChild('B', root);
    const shared = graph.insertChild('Shared', a);
    graph.link(b, shared);

    expect(graph.traverse([root], { maxDepth: 1 }).map((e) => e.node.title)).toEqual(['R']);
    expect(graph.traverse([root], { maxDepth: 2 }).map((e) => e.node.title)).toEqual(['R', 'A', 'B']);
    expect(graph.traverse([root]).map((e) => [e.node.title, e.depth])).toEqual([
      ['R', 0],
      ['A', 1],
      ['Shared', 2],
      ['B', 1],
      ['Shared', 2],
    ]);
  });

  it('reports a back edge as a cycle instead of looping', () => {
    const graph = new Graph();
    const ancestor = graph.insertRoot('A');
    const middle = graph.insertChild('M', ancestor);
    const descendant = graph.insertChild('D', middle);
    graph.link(descendant, ancestor);

    const err = expectGraphError(() => graph.traverse([ancestor]), 'CycleDetected');
    expect(err.subject).toEqual([ancestor, ancestor]);
  });
});

describe('compaction', () => {
  function sparseGraph(): Graph {
    const graph = new Graph();
    const root = graph.insertRoot('R');
    graph.insertChild('A', root);
    const gone = graph.insertChild('B', root);
    const c = graph.insertChild('C', root);
    graph.setAlias(c, 'c');
    graph.remove(gone);
    return graph;
  }

  it('renumbers live nodes densely and rewrites edges and aliases', () => {
    const graph = sparseGraph();
    graph.clean();

    expect(graph.slotCount).toBe(3);
    expect(graph.children(0)).toEqual([1, 2]);
    expect(graph.node(2).title).toBe('C');
    expect(graph.node(2).metadata.index).toBe(2);
    expect(graph.resolve('c')).toBe(2);
  });

  it('is idempotent', () => {
    const graph = sparseGraph();
    graph.clean();
    const once = graph.snapshot();
    graph.clean();
    expect(graph.snapshot()).toEqual(once);
  });

  it('triggers auto-clean only past the threshold', () => {
    expect(shouldAutoClean({ slotCount: 4, tombstoneCount: 1 }, 20)).toBe(true);
    expect(shouldAutoClean({ slotCount: 4, tombstoneCount: 1 }, 25)).toBe(false);
    expect(shouldAutoClean({ slotCount: 0, tombstoneCount: 0 }, 0)).toBe(false);
  });
});
