/**
 * CLI commands that change edges: link, unlink, mv and ord.
 */

import { Command } from 'commander';
import { TrellisError } from '../../core/errors.js';
import { moveNode, reorderChild } from '../../core/graph/operations.js';
import { ExitCode } from '../../types/exit-codes.js';
import { cliOutput, exitWithError } from '../renderers/index.js';
import { connectionMessage, withGraph } from '../runtime.js';

export function registerLinkCommand(program: Command): void {
  program
    .command('link <parent> <child>')
    .description('Add a parent -> child edge')
    .action(async (parentId: string, childId: string, _opts: unknown, command: Command) => {
      try {
        const result = await withGraph(command, { mutates: true }, (ctx) => {
          const parent = ctx.graph.resolve(parentId);
          const child = ctx.graph.resolve(childId);
          ctx.graph.link(parent, child);
          return { data: { parent, child }, message: connectionMessage(ctx, `Linked ${child} under ${parent}`) };
        });
        cliOutput(result.data, { command: 'link', operation: 'graph.link', message: result.message });
      } catch (err) {
        exitWithError(err, 'graph.link');
      }
    });
}

export function registerUnlinkCommand(program: Command): void {
  program
    .command('unlink <parent> <child>')
    .description('Remove a parent -> child edge')
    .action(async (parentId: string, childId: string, _opts: unknown, command: Command) => {
      try {
        const result = await withGraph(command, { mutates: true }, (ctx) => {
          const parent = ctx.graph.resolve(parentId);
          const child = ctx.graph.resolve(childId);
          ctx.graph.unlink(parent, child);
          return { data: { parent, child }, message: connectionMessage(ctx, `Unlinked ${child} from ${parent}`) };
        });
        cliOutput(result.data, { command: 'unlink', operation: 'graph.unlink', message: result.message });
      } catch (err) {
        exitWithError(err, 'graph.unlink');
      }
    });
}

/**
 * Register the mv command: detach nodes from all parents, then link them
 * under a new parent.
 */
export function registerMoveCommand(program: Command): void {
  program
    .command('mv <args...>')
    .description('Move nodes under a new parent: mv <id...> <parent>')
    .action(async (args: string[], _opts: unknown, command: Command) => {
      try {
        const parentId = args.at(-1);
        const ids = args.slice(0, -1);
        if (parentId === undefined || ids.length === 0) {
          throw new TrellisError(ExitCode.INVALID_INPUT, 'mv needs at least one node and a parent');
        }
        const result = await withGraph(command, { mutates: true }, (ctx) => {
          const parent = ctx.graph.resolve(parentId);
          const moved = ids.map((id) => {
            const handle = ctx.graph.resolve(id);
            moveNode(ctx.graph, handle, parent);
            return handle;
          });
          return {
            data: { parent, moved },
            message: connectionMessage(ctx, moved.map((h) => `Linked ${h} under ${parent}`).join('\n')),
          };
        });
        cliOutput(result.data, { command: 'mv', operation: 'graph.move', message: result.message });
      } catch (err) {
        exitWithError(err, 'graph.move');
      }
    });
}

interface OrderOptions {
  parent?: string;
}

/**
 * Register the ord command: move a node up or down among its siblings.
 */
export function registerOrderCommand(program: Command): void {
  program
    .command('ord <id> <direction> [count]')
    .description('Move a node up or down within its parent\'s children')
    .option('-p, --parent <id>', 'Parent to reorder within (defaults to the first parent)')
    .action(async (id: string, direction: string, count: string | undefined, opts: OrderOptions, command: Command) => {
      try {
        if (direction !== 'up' && direction !== 'down') {
          throw new TrellisError(ExitCode.INVALID_INPUT, `Direction must be 'up' or 'down', got '${direction}'`);
        }
        const steps = count === undefined ? 1 : Number(count);
        if (!Number.isInteger(steps) || steps < 0) {
          throw new TrellisError(ExitCode.INVALID_INPUT, `Count must be a non-negative integer, got '${count}'`);
        }

        const data = await withGraph(command, { mutates: true }, ({ graph }) => {
          const node = graph.resolve(id);
          const parents = graph.parents(node);
          let parent: number;
          if (opts.parent !== undefined) {
            parent = graph.resolve(opts.parent);
            if (!parents.includes(parent)) {
              throw new TrellisError(ExitCode.INVALID_INPUT, `Node ${parent} is not a parent of ${node}`);
            }
          } else {
            const first = parents[0];
            if (first === undefined) {
              throw new TrellisError(ExitCode.INVALID_INPUT, `Node ${node} has no parent to reorder within`);
            }
            parent = first;
          }
          const position = reorderChild(graph, node, parent, direction === 'up' ? -steps : steps);
          return { node, parent, position, children: graph.children(parent) };
        });
        cliOutput(data, { command: 'ord', operation: 'graph.reorder' });
      } catch (err) {
        exitWithError(err, 'graph.reorder');
      }
    });
}
