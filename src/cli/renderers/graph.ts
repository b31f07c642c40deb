/**
 * Human renderers for graph commands.
 *
 * Trees are drawn with ASCII arms; a node with more than one parent gets a
 * dotted arm:
 *
 *   [~] 0: Release (rel)
 *    +-- [x] 1: Write notes
 *    +.. [ ] 2: Tag build
 */

import type { CalendarDay, MonthCalendar } from '../../core/graph/calendar.js';
import type { GraphStats } from '../../core/graph/stats.js';
import type { BlueprintSummary } from '../../store/blueprint-store.js';
import type { NodeView, TreeLine } from '../views.js';
import { BOLD, CYAN, DIM, GREEN, NC, ORANGE, nodeIcon } from './colors.js';

function treeIndent(depth: number, multiParent: boolean): string {
  if (depth === 0) return '';
  return ' |  '.repeat(depth - 1) + (multiParent ? ' +.. ' : ' +-- ');
}

/** One node as a single line, without indentation. */
export function formatNodeLine(node: NodeView): string {
  const alias = node.alias !== null ? ` ${DIM}(${node.alias})${NC}` : '';
  const archived = node.archived ? ` ${DIM}[archived]${NC}` : '';
  return `${nodeIcon(node)} ${BOLD}${node.handle}${NC}: ${node.title}${alias}${archived}`;
}

export function renderTree(data: { lines: TreeLine[] }, quiet: boolean): string {
  if (quiet) return data.lines.map((line) => String(line.node.handle)).join('\n');
  if (data.lines.length === 0) return 'Nothing to show.';
  return data.lines
    .map((line) => treeIndent(line.depth, line.node.parents.length > 1) + formatNodeLine(line.node))
    .join('\n');
}

export function renderNode(data: { node: NodeView }, quiet: boolean): string {
  return quiet ? String(data.node.handle) : formatNodeLine(data.node);
}

export function renderAliases(
  data: { aliases: { alias: string; handle: number; title: string }[] },
  quiet: boolean,
): string {
  if (quiet) return data.aliases.map((entry) => entry.alias).join('\n');
  if (data.aliases.length === 0) return 'No aliases.';
  const width = Math.max(...data.aliases.map((entry) => entry.alias.length));
  return data.aliases
    .map((entry) => `${BOLD}${entry.alias.padEnd(width)}${NC}  ${entry.handle}: ${entry.title}`)
    .join('\n');
}

export function renderStats(stats: GraphStats, quiet: boolean): string {
  if (quiet) return String(stats.nodes);
  const rows: [string, number][] = [
    ['Nodes', stats.nodes],
    ['Roots', stats.roots],
    ['Dates', stats.dates],
    ['Aliases', stats.aliases],
    ['Archived', stats.archived],
    ['Unused slots', stats.tombstones],
    ['Done', stats.done],
    ['Partial', stats.partial],
    ['Not started', stats.none],
    ['Pseudo', stats.pseudo],
  ];
  return rows.map(([label, value]) => `${label.padEnd(13)} ${value}`).join('\n');
}

export function renderBlueprintList(data: { blueprints: BlueprintSummary[] }, quiet: boolean): string {
  if (quiet) return data.blueprints.map((bp) => bp.name).join('\n');
  if (data.blueprints.length === 0) return 'No saved blueprints.';
  return data.blueprints
    .map((bp) => {
      const author = bp.author ? ` ${DIM}by ${bp.author}${NC}` : '';
      return `${BOLD}${bp.name}${NC}  ${bp.title} (${bp.size} nodes)${author}`;
    })
    .join('\n');
}

const WEEKDAYS = ['Mo', 'Tu', 'We', 'Th', 'Fr', 'Sa', 'Su'];

/** Three columns per day; a `*` marks a day with a date node. */
function calendarCell(day: CalendarDay): string {
  const number = String(day.day).padStart(2);
  if (day.handle === null) return `${number} `;
  const color = day.total > 0 && day.done === day.total ? GREEN : day.done > 0 ? ORANGE : CYAN;
  return `${color}${number}*${NC}`;
}

/**
 *   June 2024
 *   Mo  Tu  We  Th  Fr  Sa  Su
 *                        1   2
 *    3*  4   5 ...
 *
 *   2024-06-03  7: 1/2 done
 */
export function renderCalendar(cal: MonthCalendar, quiet: boolean): string {
  const marked = cal.days.filter((day) => day.handle !== null);
  if (quiet) return marked.map((day) => String(day.handle)).join('\n');

  const monthName = new Date(cal.year, cal.month - 1, 1).toLocaleString('en-US', { month: 'long' });
  const cells = [...Array.from({ length: cal.firstWeekday }, () => '   '), ...cal.days.map(calendarCell)];
  const lines = [`${BOLD}${monthName} ${cal.year}${NC}`, WEEKDAYS.map((name) => name.padEnd(3)).join(' ').trimEnd()];
  for (let start = 0; start < cells.length; start += 7) {
    lines.push(cells.slice(start, start + 7).join(' ').trimEnd());
  }
  if (marked.length > 0) {
    lines.push('');
    for (const day of marked) {
      lines.push(`${day.date}  ${day.handle}: ${day.done}/${day.total} done`);
    }
  }
  return lines.join('\n');
}
