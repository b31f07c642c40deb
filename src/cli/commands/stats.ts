/**
 * CLI stats and clean commands.
 */

import { Command } from 'commander';
import { graphStats } from '../../core/graph/stats.js';
import { cliOutput, exitWithError } from '../renderers/index.js';
import { renderStats } from '../renderers/graph.js';
import { withGraph } from '../runtime.js';

export function registerStatsCommand(program: Command): void {
  program
    .command('stats [id]')
    .description('Show node counts for the graph or a subtree')
    .action(async (id: string | undefined, _opts: unknown, command: Command) => {
      try {
        const data = await withGraph(command, { mutates: false }, ({ graph }) => graphStats(graph, id));
        cliOutput(data, { command: 'stats', operation: 'graph.stats', render: renderStats });
      } catch (err) {
        exitWithError(err, 'graph.stats');
      }
    });
}

/** Register clean: compact the graph, renumbering handles densely. */
export function registerCleanCommand(program: Command): void {
  program
    .command('clean')
    .description('Compact the graph, dropping unused slots (renumbers handles)')
    .action(async (_opts: unknown, command: Command) => {
      try {
        const data = await withGraph(command, { mutates: true }, ({ graph }) => {
          const before = graph.slotCount;
          graph.clean();
          return { before, after: graph.slotCount };
        });
        cliOutput(data, {
          command: 'clean',
          operation: 'graph.clean',
          message: `Compacted ${data.before} slots to ${data.after}`,
        });
      } catch (err) {
        exitWithError(err, 'graph.clean');
      }
    });
}
