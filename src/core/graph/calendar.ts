/**
 * Month view of date nodes.
 */

import type { Handle } from '../../types/graph.js';
import { isTask } from '../../types/graph.js';
import { parseDateKey } from '../dates.js';
import { GraphError } from './errors.js';
import type { Graph } from './graph.js';

export interface CalendarDay {
  day: number;
  date: string;
  /** The date node for this day, if there is one. */
  handle: Handle | null;
  /** Finished task children of the date node. */
  done: number;
  /** All task children of the date node. */
  total: number;
}

export interface MonthCalendar {
  year: number;
  month: number;
  /** Weekday of the 1st, counted from Monday = 0. */
  firstWeekday: number;
  days: CalendarDay[];
}

/**
 * Lay out the month containing `anchor` (a canonical `YYYY-MM-DD` key),
 * with task counts for each day that has a date node.
 */
export function monthCalendar(graph: Graph, anchor: string): MonthCalendar {
  const key = parseDateKey(anchor);
  if (key === null) {
    throw GraphError.malformedDate(anchor);
  }
  const year = Number(key.slice(0, 4));
  const month = Number(key.slice(5, 7));
  const length = new Date(year, month, 0).getDate();
  const prefix = key.slice(0, 8);

  const days = Array.from({ length }, (_, offset): CalendarDay => {
    const day = offset + 1;
    const date = `${prefix}${String(day).padStart(2, '0')}`;
    const handle = graph.dates.get(date);
    if (handle === undefined || !graph.isLive(handle)) {
      return { day, date, handle: null, done: 0, total: 0 };
    }
    const tasks = graph.children(handle)
      .map((child) => graph.node(child).content)
      .filter(isTask);
    return {
      day,
      date,
      handle,
      done: tasks.filter((content) => content.state === 'done').length,
      total: tasks.length,
    };
  });

  return {
    year,
    month,
    firstWeekday: (new Date(year, month - 1, 1).getDay() + 6) % 7,
    days,
  };
}
