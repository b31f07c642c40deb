/**
 * End-to-end tests of the CLI commands against a graph file in a temp
 * directory. Output is captured from console.log as JSON envelopes.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { createProgram } from '../program.js';

const ENV_KEYS = ['TRELLIS_HOME', 'TRELLIS_BLUEPRINT_DIR'];

describe('trellis commands', () => {
  let tempDir: string;
  let graphPath: string;
  const saved = new Map(ENV_KEYS.map((key) => [key, process.env[key]]));

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), 'trellis-cli-test-'));
    graphPath = join(tempDir, 'graph.yaml');
    process.env['TRELLIS_HOME'] = join(tempDir, 'home');
    process.env['TRELLIS_BLUEPRINT_DIR'] = join(tempDir, 'blueprints');
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(tempDir, { recursive: true, force: true });
    for (const [key, value] of saved) {
      if (value !== undefined) process.env[key] = value;
      else delete process.env[key];
    }
  });

  /** Run one command and return what it printed last. */
  async function runRaw(file: string, args: string[]): Promise<string> {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    try {
      await createProgram().parseAsync(['--file', file, ...args], { from: 'user' });
      return String(log.mock.calls.at(-1)?.[0]);
    } finally {
      log.mockRestore();
    }
  }

  async function run(...args: string[]): Promise<unknown> {
    const text = await runRaw(graphPath, args);
    const envelope: unknown = JSON.parse(text);
    return envelope;
  }

  /**
   *   0 Trip (trip) [~]
   *   |-- 1 Book [x]
   *   `-- 2 Pack [ ]
   */
  async function seed(): Promise<void> {
    await run('add', '--root', 'Trip');
    await run('add', 'Book', '0');
    await run('add', 'Pack', '0');
    await run('alias', '0', 'trip');
    await run('check', '1');
  }

  function treeOf(envelope: unknown): unknown {
    if (typeof envelope !== 'object' || envelope === null || !('result' in envelope)) return undefined;
    const { result } = envelope;
    if (typeof result !== 'object' || result === null || !('lines' in result) || !Array.isArray(result.lines)) {
      return undefined;
    }
    return result.lines.map((line: { depth: number; node: { handle: number; state: string | null } }) => [
      line.depth,
      line.node.handle,
      line.node.state,
    ]);
  }

  it('adds nodes and reports the edges it made', async () => {
    expect(await run('add', '--root', 'Trip')).toMatchObject({
      success: true,
      result: { node: { handle: 0, title: 'Trip', kind: 'task', state: 'none' } },
      message: 'Added root 0',
      _meta: { operation: 'graph.add' },
    });
    expect(await run('add', 'Book', '0')).toMatchObject({
      result: { node: { handle: 1, parents: [0] } },
      message: 'Linked 1 under 0',
    });
    expect(await run('add', '--date', '2024-7-1')).toMatchObject({
      result: { node: { handle: 2, kind: 'date', date: '2024-07-01' } },
      message: 'Added date 2024-07-01 as 2',
    });
  });

  it('lists the graph to the requested depth', async () => {
    await seed();
    expect(treeOf(await run('ls'))).toEqual([[0, 0, 'partial']]);
    expect(treeOf(await run('ls', '-d', '2'))).toEqual([
      [0, 0, 'partial'],
      [1, 1, 'done'],
      [1, 2, 'none'],
    ]);
    expect(treeOf(await run('ls', 'trip'))).toEqual([
      [0, 0, 'partial'],
      [1, 1, 'done'],
      [1, 2, 'none'],
    ]);
  });

  it('renders a tree for --human', async () => {
    await seed();
    expect(await runRaw(graphPath, ['--human', 'ls', '-r'])).toBe(
      '[~] 0: Trip (trip)\n +-- [x] 1: Book\n +-- [ ] 2: Pack',
    );
  });

  it('prints an error envelope and exits with the error code', async () => {
    await seed();
    const errors = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit:${String(code)}`);
    });

    await expect(run('rm', '9')).rejects.toThrow('exit:10');

    const envelope: unknown = JSON.parse(String(errors.mock.calls[0]?.[0]));
    expect(envelope).toMatchObject({
      success: false,
      error: { code: 10, name: 'INVALID_HANDLE' },
      _meta: { operation: 'graph.remove' },
    });
  });

  it('removes nodes, then compacts the graph', async () => {
    await seed();
    expect(await run('rm', '2')).toMatchObject({ result: { removed: [2], recursive: false } });
    // Book is the only child left, so Trip is done
    expect(await run('stats')).toMatchObject({ result: { nodes: 2, tombstones: 1, done: 2, partial: 0, none: 0 } });
    expect(await run('clean')).toMatchObject({
      result: { before: 3, after: 2 },
      message: 'Compacted 3 slots to 2',
    });
  });

  it('moves and reorders children', async () => {
    await seed();
    await run('add', 'Tickets', 'trip');
    expect(await run('ord', '3', 'up', '2')).toMatchObject({ result: { node: 3, parent: 0, position: 0, children: [3, 1, 2] } });
    await run('add', '--root', 'Later');
    expect(await run('mv', '1', '2', '4')).toMatchObject({ result: { parent: 4, moved: [1, 2] } });
    expect(treeOf(await run('ls', 'trip'))).toEqual([[0, 0, 'none'], [1, 3, 'none']]);
  });

  it('copies a day onto a new date', async () => {
    await run('add', '--date', '2024-06-01');
    await run('add', 'Pack', '2024-06-01');
    await run('check', '1');

    expect(await run('cp', '-r', '2024-06-01', '2024-06-02')).toMatchObject({ result: { target: 2, copies: [3] } });
    expect(treeOf(await run('ls', '2024-06-02'))).toEqual([[0, 2, null], [1, 3, 'done']]);
  });

  it('saves a subtree as a blueprint and inserts it again', async () => {
    await seed();
    expect(await run('bp', 'save', 'trip', 'trip-plan', '-a', 'test-author')).toMatchObject({
      result: { name: 'trip-plan', path: join(tempDir, 'blueprints', 'trip-plan.yaml'), nodes: 3, removed: true },
    });
    expect(treeOf(await run('ls'))).toEqual([]);
    expect(await run('bp', 'ls')).toMatchObject({
      result: { blueprints: [{ name: 'trip-plan', title: 'Trip', author: 'test-author', size: 3 }] },
    });

    expect(await run('bp', 'ins', 'trip-plan', '--root', 'Trip again')).toMatchObject({
      result: { name: 'trip-plan', root: 3, nodes: 3 },
    });
    expect(await run('ls', '3', '-d', '1')).toMatchObject({
      result: { lines: [{ node: { title: 'Trip again' } }, { node: { title: 'Book', state: 'none' } }, { node: { title: 'Pack' } }] },
    });
  });

  it('picks a random child among the requested states', async () => {
    await seed();
    expect(await run('rand', 'trip', '--unchecked')).toMatchObject({
      result: { node: { handle: 2, title: 'Pack' } },
      _meta: { operation: 'graph.pick' },
    });
    expect(await run('rand', 'trip', '-c')).toMatchObject({ result: { node: { handle: 1, title: 'Book' } } });

    vi.spyOn(console, 'error').mockImplementation(() => undefined);
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`exit:${String(code)}`);
    });
    await expect(run('rand', '1')).rejects.toThrow('exit:4');
    await expect(run('rand', 'trip', '-c', '-u')).rejects.toThrow('exit:2');
  });

  it('shows a month calendar of date nodes', async () => {
    await run('add', '--date', '2024-06-03');
    await run('add', 'Pack', '2024-06-03');

    expect(await run('cal', '2024-06-20')).toMatchObject({
      result: { year: 2024, month: 6, firstWeekday: 5 },
      _meta: { operation: 'graph.calendar' },
    });
    expect(await runRaw(graphPath, ['--human', 'cal', '2024-06-20'])).toBe([
      'June 2024',
      'Mo  Tu  We  Th  Fr  Sa  Su',
      '                     1   2',
      ' 3*  4   5   6   7   8   9',
      '10  11  12  13  14  15  16',
      '17  18  19  20  21  22  23',
      '24  25  26  27  28  29  30',
      '',
      '2024-06-03  0: 0/1 done',
    ].join('\n'));
  });

  it('edits a saved blueprint with a graph command', async () => {
    await seed();
    await run('bp', 'save', 'trip', 'plan');

    expect(await run('bp', 'edit', 'plan', '--', 'add', 'Tickets', '0')).toMatchObject({
      result: { node: { handle: 3, title: 'Tickets', parents: [0] } },
      message: 'Linked 3 under 0',
    });
    expect(treeOf(await run('bp', 'edit', 'plan', 'ls', '0', '-d', '1'))).toEqual([
      [0, 0, 'none'],
      [1, 1, 'none'],
      [1, 2, 'none'],
      [1, 3, 'none'],
    ]);
    expect(await run('bp', 'ls')).toMatchObject({
      result: { blueprints: [{ name: 'plan', title: 'Trip', size: 4 }] },
    });
    // The graph the command was run from is left alone
    expect(treeOf(await run('ls'))).toEqual([]);
  });

  it('exports a graph and imports it elsewhere', async () => {
    await seed();
    const exportPath = join(tempDir, 'backup.json');
    expect(await run('export', exportPath, '-f', 'json')).toMatchObject({ result: { path: exportPath, format: 'json' } });
    expect(JSON.parse(await readFile(exportPath, 'utf8'))).toMatchObject({ version: 5 });

    const otherGraph = join(tempDir, 'other.yaml');
    const imported: unknown = JSON.parse(await runRaw(otherGraph, ['import', exportPath]));
    expect(imported).toMatchObject({ result: { nodes: 3, replaced: 0 } });
    expect(treeOf(JSON.parse(await runRaw(otherGraph, ['ls', 'trip'])))).toEqual([
      [0, 0, 'partial'],
      [1, 1, 'done'],
      [1, 2, 'none'],
    ]);
  });

  it('sets and reads configuration', async () => {
    expect(await run('config', 'set', 'output.showConnections', 'false', '--global')).toMatchObject({
      result: { key: 'output.showConnections', value: false, scope: 'global' },
    });
    expect(await run('config', 'get', 'output.showConnections')).toMatchObject({
      result: { key: 'output.showConnections', value: false, source: 'global' },
    });
    const added = await run('add', '--root', 'Quiet');
    expect(added).not.toHaveProperty('message');
  });
});
