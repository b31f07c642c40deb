/**
 * CLI commands that change node state: set, check, uncheck, arc, unarc.
 */

import { Command } from 'commander';
import { TrellisError } from '../../core/errors.js';
import { ExitCode } from '../../types/exit-codes.js';
import { TASK_STATES, type TaskState } from '../../types/graph.js';
import { cliOutput, exitWithError } from '../renderers/index.js';
import { renderTree } from '../renderers/graph.js';
import { withGraph } from '../runtime.js';
import { toNodeView } from '../views.js';

function parseTaskState(value: string): TaskState {
  const state = TASK_STATES.find((candidate) => candidate === value.toLowerCase());
  if (!state) {
    throw new TrellisError(ExitCode.INVALID_INPUT, `Unknown state '${value}'`, {
      fix: `Use one of: ${TASK_STATES.join(', ')}.`,
    });
  }
  return state;
}

async function applyState(command: Command, ids: string[], state: TaskState, propagate: boolean, operation: string): Promise<void> {
  const data = await withGraph(command, { mutates: true }, ({ graph }) => {
    const handles = ids.map((id) => graph.resolve(id));
    for (const handle of handles) {
      graph.setState(handle, state, propagate);
    }
    return { lines: handles.map((handle) => ({ depth: 0, node: toNodeView(graph.node(handle)) })) };
  });
  cliOutput(data, { command: operation, operation: `graph.${operation}`, render: renderTree });
}

async function applyArchived(command: Command, ids: string[], archived: boolean, operation: string): Promise<void> {
  const data = await withGraph(command, { mutates: true }, ({ graph }) => {
    const handles = ids.map((id) => graph.resolve(id));
    for (const handle of handles) {
      graph.setArchived(handle, archived);
    }
    return { lines: handles.map((handle) => ({ depth: 0, node: toNodeView(graph.node(handle)) })) };
  });
  cliOutput(data, { command: operation, operation: `graph.${operation}`, render: renderTree });
}

export function registerSetCommand(program: Command): void {
  program
    .command('set <id> <state>')
    .description(`Set a task's state (${TASK_STATES.join('|')})`)
    .option('--no-propagate', 'Only change this node')
    .action(async (id: string, value: string, opts: { propagate: boolean }, command: Command) => {
      try {
        await applyState(command, [id], parseTaskState(value), opts.propagate, 'set');
      } catch (err) {
        exitWithError(err, 'graph.set');
      }
    });
}

export function registerCheckCommands(program: Command): void {
  program
    .command('check <ids...>')
    .description('Mark tasks (and everything below them) done')
    .action(async (ids: string[], _opts: unknown, command: Command) => {
      try {
        await applyState(command, ids, 'done', true, 'check');
      } catch (err) {
        exitWithError(err, 'graph.check');
      }
    });

  program
    .command('uncheck <ids...>')
    .description('Mark tasks (and everything below them) not done')
    .action(async (ids: string[], _opts: unknown, command: Command) => {
      try {
        await applyState(command, ids, 'none', true, 'uncheck');
      } catch (err) {
        exitWithError(err, 'graph.uncheck');
      }
    });
}

export function registerArchiveCommands(program: Command): void {
  program
    .command('arc <ids...>')
    .description('Archive nodes (hidden from listings)')
    .action(async (ids: string[], _opts: unknown, command: Command) => {
      try {
        await applyArchived(command, ids, true, 'arc');
      } catch (err) {
        exitWithError(err, 'graph.arc');
      }
    });

  program
    .command('unarc <ids...>')
    .description('Unarchive nodes')
    .action(async (ids: string[], _opts: unknown, command: Command) => {
      try {
        await applyArchived(command, ids, false, 'unarc');
      } catch (err) {
        exitWithError(err, 'graph.unarc');
      }
    });
}
