/**
 * CLI cp command.
 */

import { Command } from 'commander';
import { TrellisError } from '../../core/errors.js';
import { parseDateInput } from '../../core/dates.js';
import { GraphError } from '../../core/graph/errors.js';
import type { Graph } from '../../core/graph/graph.js';
import { copyNode, copyRecursive } from '../../core/graph/operations.js';
import { ExitCode } from '../../types/exit-codes.js';
import { cliOutput, exitWithError } from '../renderers/index.js';
import { connectionMessage, withGraph } from '../runtime.js';

/**
 * Resolve the copy target. A date that has no node yet is created, which
 * only makes sense for a recursive copy.
 */
function resolveTarget(graph: Graph, token: string, recursive: boolean): { handle: number; created: boolean } {
  try {
    return { handle: graph.resolve(token), created: false };
  } catch (err) {
    if (!(err instanceof GraphError) || err.reason !== 'InvalidDate') throw err;
    if (!recursive) {
      throw new TrellisError(ExitCode.INVALID_INPUT, 'Copying to a date that does not exist yet requires --recursive', {
        cause: err,
      });
    }
    return { handle: graph.insertDate(parseDateInput(token)), created: true };
  }
}

/**
 * Register the cp command.
 *
 * Copying into a new date copies the source's children rather than the
 * source itself, so a day can be duplicated onto another.
 */
export function registerCopyCommand(program: Command): void {
  program
    .command('cp <args...>')
    .description('Copy nodes under a parent: cp <id...> <parent>')
    .option('-r, --recursive', 'Copy whole subtrees')
    .action(async (args: string[], opts: { recursive?: boolean }, command: Command) => {
      try {
        const targetId = args.at(-1);
        const sources = args.slice(0, -1);
        if (targetId === undefined || sources.length === 0) {
          throw new TrellisError(ExitCode.INVALID_INPUT, 'cp needs at least one source and a target');
        }
        const recursive = opts.recursive ?? false;

        const result = await withGraph(command, { mutates: true }, (ctx) => {
          const { graph } = ctx;
          const handles = sources.map((id) => graph.resolve(id));
          const target = resolveTarget(graph, targetId, recursive);
          const copies: number[] = [];
          for (const source of handles) {
            if (target.created) {
              for (const child of graph.children(source)) {
                copies.push(copyRecursive(graph, child, target.handle));
              }
            } else if (recursive) {
              copies.push(copyRecursive(graph, source, target.handle));
            } else {
              copies.push(copyNode(graph, source, target.handle));
            }
          }
          return {
            data: { target: target.handle, copies },
            message: connectionMessage(ctx, copies.map((h) => `Linked ${h} under ${target.handle}`).join('\n')),
          };
        });
        cliOutput(result.data, { command: 'cp', operation: 'graph.copy', message: result.message });
      } catch (err) {
        exitWithError(err, 'graph.copy');
      }
    });
}
