/**
 * CLI cal command: a month calendar of date nodes.
 */

import { Command } from 'commander';
import { monthCalendar } from '../../core/graph/calendar.js';
import { parseDateInput } from '../../core/dates.js';
import { cliOutput, exitWithError } from '../renderers/index.js';
import { renderCalendar } from '../renderers/graph.js';
import { withGraph } from '../runtime.js';

export function registerCalendarCommand(program: Command): void {
  program
    .command('cal [date]')
    .description('Show the month around a date, marking days that have date nodes')
    .action(async (date: string | undefined, _opts: unknown, command: Command) => {
      try {
        // Only the month of the date is used
        const anchor = parseDateInput(date ?? 'today');
        const data = await withGraph(command, { mutates: false }, ({ graph }) => monthCalendar(graph, anchor));
        cliOutput(data, { command: 'cal', operation: 'graph.calendar', render: renderCalendar });
      } catch (err) {
        exitWithError(err, 'graph.calendar');
      }
    });
}
