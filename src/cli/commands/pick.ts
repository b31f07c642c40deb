/**
 * CLI rand command: pick a random child of a node.
 */

import { Command } from 'commander';
import { TrellisError } from '../../core/errors.js';
import { pickChild, type PickFilter } from '../../core/graph/operations.js';
import { ExitCode } from '../../types/exit-codes.js';
import { cliOutput, exitWithError } from '../renderers/index.js';
import { renderNode } from '../renderers/graph.js';
import { withGraph } from '../runtime.js';
import { toNodeView } from '../views.js';

interface PickOptions {
  checked?: boolean;
  unchecked?: boolean;
}

function pickFilter(opts: PickOptions): PickFilter {
  if (opts.checked && opts.unchecked) {
    throw new TrellisError(ExitCode.INVALID_INPUT, '--checked and --unchecked cannot be used together');
  }
  if (opts.checked) return 'done';
  if (opts.unchecked) return 'open';
  return 'any';
}

export function registerRandomCommand(program: Command): void {
  program
    .command('rand <id>')
    .description('Pick a random child of a node')
    .option('-c, --checked', 'Only pick among finished tasks')
    .option('-u, --unchecked', 'Only pick among unfinished tasks')
    .action(async (id: string, opts: PickOptions, command: Command) => {
      try {
        const filter = pickFilter(opts);
        const data = await withGraph(command, { mutates: false }, ({ graph }) => ({
          node: toNodeView(graph.node(pickChild(graph, id, filter))),
        }));
        cliOutput(data, { command: 'rand', operation: 'graph.pick', render: renderNode });
      } catch (err) {
        exitWithError(err, 'graph.pick');
      }
    });
}
