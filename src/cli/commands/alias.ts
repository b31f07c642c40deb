/**
 * CLI alias commands: alias, unalias, aliases.
 */

import { Command } from 'commander';
import { cliOutput, exitWithError } from '../renderers/index.js';
import { renderAliases, renderNode } from '../renderers/graph.js';
import { withGraph } from '../runtime.js';
import { toNodeView } from '../views.js';

export function registerAliasCommands(program: Command): void {
  program
    .command('alias <id> <alias>')
    .description('Give a node an alias')
    .action(async (id: string, alias: string, _opts: unknown, command: Command) => {
      try {
        const data = await withGraph(command, { mutates: true }, ({ graph }) => {
          const handle = graph.resolve(id);
          graph.setAlias(handle, alias);
          return { node: toNodeView(graph.node(handle)) };
        });
        cliOutput(data, { command: 'alias', operation: 'graph.alias', render: renderNode });
      } catch (err) {
        exitWithError(err, 'graph.alias');
      }
    });

  program
    .command('unalias <ids...>')
    .description('Remove the alias of each node')
    .action(async (ids: string[], _opts: unknown, command: Command) => {
      try {
        const data = await withGraph(command, { mutates: true }, ({ graph }) => {
          const handles = ids.map((id) => graph.resolve(id));
          for (const handle of handles) {
            graph.unsetAlias(handle);
          }
          return { handles };
        });
        cliOutput(data, {
          command: 'unalias',
          operation: 'graph.unalias',
          message: `Removed ${data.handles.length} alias${data.handles.length === 1 ? '' : 'es'}`,
        });
      } catch (err) {
        exitWithError(err, 'graph.unalias');
      }
    });

  program
    .command('aliases')
    .description('List aliases')
    .action(async (_opts: unknown, command: Command) => {
      try {
        const data = await withGraph(command, { mutates: false }, ({ graph }) => ({
          aliases: [...graph.aliases]
            .filter(([, handle]) => graph.isLive(handle))
            .sort(([a], [b]) => a.localeCompare(b))
            .map(([alias, handle]) => ({ alias, handle, title: graph.node(handle).title })),
        }));
        cliOutput(data, { command: 'aliases', operation: 'graph.aliases', render: renderAliases });
      } catch (err) {
        exitWithError(err, 'graph.aliases');
      }
    });
}
