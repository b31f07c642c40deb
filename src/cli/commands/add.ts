/**
 * CLI add and rename commands.
 */

import { Command } from 'commander';
import { TrellisError } from '../../core/errors.js';
import { parseDateInput } from '../../core/dates.js';
import { ExitCode } from '../../types/exit-codes.js';
import { cliOutput, exitWithError } from '../renderers/index.js';
import { renderNode } from '../renderers/graph.js';
import { connectionMessage, withGraph } from '../runtime.js';
import { toNodeView } from '../views.js';

interface AddOptions {
  parent?: string;
  root?: boolean;
  date?: string;
  pseudo?: boolean;
}

/**
 * Register the add command.
 *
 *   trellis add "Write report" 4      child of node 4
 *   trellis add "Errands" --root      new root
 *   trellis add --date tomorrow       date node
 */
export function registerAddCommand(program: Command): void {
  program
    .command('add [title] [parent]')
    .description('Add a node under a parent, as a root, or as a date')
    .option('-p, --parent <id>', 'Parent node (handle, alias or date)')
    .option('-r, --root', 'Add as a root node')
    .option('-d, --date <date>', 'Add a date node (YYYY-MM-DD, today, tomorrow, yesterday or a month name)')
    .option('-u, --pseudo', 'Pseudo node: never counts towards its parents\' completion')
    .action(async (title: string | undefined, parentArg: string | undefined, opts: AddOptions, command: Command) => {
      try {
        const parent = opts.parent ?? parentArg;
        if (opts.root && (opts.date !== undefined || parent !== undefined)) {
          throw new TrellisError(ExitCode.INVALID_INPUT, '--root cannot be combined with a parent or --date');
        }
        if (opts.date !== undefined && parent !== undefined) {
          throw new TrellisError(ExitCode.INVALID_INPUT, '--date cannot be combined with a parent');
        }
        if (opts.date === undefined && !title) {
          throw new TrellisError(ExitCode.INVALID_INPUT, 'A title is required');
        }
        if (!opts.root && opts.date === undefined && parent === undefined) {
          throw new TrellisError(ExitCode.INVALID_INPUT, 'A parent is required', {
            fix: 'Pass a parent id, or --root to add a root node.',
          });
        }

        const result = await withGraph(command, { mutates: true }, (ctx) => {
          const { graph } = ctx;
          let handle: number;
          let message: string | undefined;
          if (opts.date !== undefined) {
            const key = parseDateInput(opts.date, new Date());
            handle = graph.insertDate(key, title || undefined);
            message = connectionMessage(ctx, `Added date ${key} as ${handle}`);
          } else if (parent === undefined) {
            handle = graph.insertRoot(title ?? '', opts.pseudo ?? false);
            message = connectionMessage(ctx, `Added root ${handle}`);
          } else {
            handle = graph.insertChild(title ?? '', parent, opts.pseudo ?? false);
            message = connectionMessage(ctx, `Linked ${handle} under ${graph.parents(handle).join(', ')}`);
          }
          return { data: { node: toNodeView(graph.node(handle)) }, message };
        });

        cliOutput(result.data, { command: 'add', operation: 'graph.add', message: result.message, render: renderNode });
      } catch (err) {
        exitWithError(err, 'graph.add');
      }
    });
}

/**
 * Register the rename command.
 */
export function registerRenameCommand(program: Command): void {
  program
    .command('rename <id> <title>')
    .description('Change a node\'s title')
    .action(async (id: string, title: string, _opts: unknown, command: Command) => {
      try {
        const data = await withGraph(command, { mutates: true }, ({ graph }) => {
          graph.rename(id, title);
          return { node: toNodeView(graph.node(graph.resolve(id))) };
        });
        cliOutput(data, { command: 'rename', operation: 'graph.rename', render: renderNode });
      } catch (err) {
        exitWithError(err, 'graph.rename');
      }
    });
}
