/**
 * CLI listing commands: ls, lsd, lsa.
 */

import { Command } from 'commander';
import { TrellisError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { cliOutput, exitWithError } from '../renderers/index.js';
import { renderTree } from '../renderers/graph.js';
import { withGraph } from '../runtime.js';
import { toTreeLines } from '../views.js';

interface ListOptions {
  depth: string;
  recurse?: boolean;
  archived?: boolean;
}

function parseDepth(value: string): number {
  const depth = Number(value);
  if (!Number.isInteger(depth) || depth < 0) {
    throw new TrellisError(ExitCode.INVALID_INPUT, `Depth must be a non-negative integer, got '${value}'`);
  }
  return depth;
}

/**
 * Register ls.
 *
 * Without an id the roots are listed `--depth` levels deep; with one, the
 * node itself and `--depth` levels below it. `--recurse` lists everything.
 */
export function registerListCommand(program: Command): void {
  program
    .command('ls [id]')
    .description('List the graph, or the subtree below a node')
    .option('-d, --depth <n>', 'Levels to show', '1')
    .option('-r, --recurse', 'Show every level')
    .option('-a, --archived', 'Include archived nodes')
    .action(async (id: string | undefined, opts: ListOptions, command: Command) => {
      try {
        const depth = parseDepth(opts.depth);
        const data = await withGraph(command, { mutates: false }, ({ graph }) => {
          const includeArchived = opts.archived ?? false;
          const entries = id === undefined
            ? graph.traverse(graph.roots, { includeArchived, maxDepth: opts.recurse ? 0 : depth })
            : graph.traverse([id], { includeArchived, maxDepth: opts.recurse ? 0 : depth + 1 });
          return { lines: toTreeLines(entries) };
        });
        cliOutput(data, { command: 'ls', operation: 'graph.list', render: renderTree });
      } catch (err) {
        exitWithError(err, 'graph.list');
      }
    });
}

export function registerListDatesCommand(program: Command): void {
  program
    .command('lsd')
    .description('List date nodes in calendar order')
    .action(async (_opts: unknown, command: Command) => {
      try {
        const data = await withGraph(command, { mutates: false }, ({ graph }) => {
          const dates = [...graph.dates]
            .filter(([, handle]) => graph.isLive(handle))
            .sort(([a], [b]) => a.localeCompare(b))
            .map(([, handle]) => handle);
          return { lines: toTreeLines(graph.traverse(dates, { maxDepth: 1 })) };
        });
        cliOutput(data, { command: 'lsd', operation: 'graph.listDates', render: renderTree });
      } catch (err) {
        exitWithError(err, 'graph.listDates');
      }
    });
}

export function registerListArchivedCommand(program: Command): void {
  program
    .command('lsa')
    .description('List archived nodes')
    .action(async (_opts: unknown, command: Command) => {
      try {
        const data = await withGraph(command, { mutates: false }, ({ graph }) => ({
          lines: toTreeLines(graph.traverse(graph.archived, { includeArchived: true, maxDepth: 1 })),
        }));
        cliOutput(data, { command: 'lsa', operation: 'graph.listArchived', render: renderTree });
      } catch (err) {
        exitWithError(err, 'graph.listArchived');
      }
    });
}
