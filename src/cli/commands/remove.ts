/**
 * CLI rm command.
 */

import { Command } from 'commander';
import { cliOutput, exitWithError } from '../renderers/index.js';
import { connectionMessage, withGraph } from '../runtime.js';

/**
 * Register the rm command.
 */
export function registerRemoveCommand(program: Command): void {
  program
    .command('rm <ids...>')
    .description('Remove nodes; their children become roots unless --recursive')
    .option('-r, --recursive', 'Also remove everything below each node')
    .action(async (ids: string[], opts: { recursive?: boolean }, command: Command) => {
      try {
        const result = await withGraph(command, { mutates: true }, (ctx) => {
          const { graph } = ctx;
          const removed: number[] = [];
          for (const id of ids) {
            const handle = graph.resolve(id);
            if (opts.recursive) {
              graph.removeRecursive(handle);
            } else {
              graph.remove(handle);
            }
            removed.push(handle);
          }
          const what = opts.recursive ? 'subtree of' : 'node';
          return {
            data: { removed, recursive: opts.recursive ?? false },
            message: connectionMessage(ctx, removed.map((h) => `Removed ${what} ${h}`).join('\n')),
          };
        });
        cliOutput(result.data, { command: 'rm', operation: 'graph.remove', message: result.message });
      } catch (err) {
        exitWithError(err, 'graph.remove');
      }
    });
}
