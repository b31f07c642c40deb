/**
 * Terminal colors and node icons for human-readable output.
 *
 * Respects NO_COLOR (https://no-color.org) and FORCE_COLOR env vars.
 */

import type { NodeView } from '../views.js';

/** Whether ANSI color escape codes should be used. */
const colorsEnabled: boolean = (() => {
  if (process.env['NO_COLOR'] !== undefined) return false;
  if (process.env['FORCE_COLOR'] !== undefined) return true;
  return process.stdout.isTTY === true;
})();

function ansi(code: string): string {
  return colorsEnabled ? code : '';
}

export const BOLD = ansi('\x1b[1m');
export const DIM = ansi('\x1b[2m');
export const NC = ansi('\x1b[0m');  // reset
export const GREEN = ansi('\x1b[0;32m');
export const YELLOW = ansi('\x1b[1;33m');
export const ORANGE = ansi('\x1b[0;33m');
export const MAGENTA = ansi('\x1b[0;35m');
export const CYAN = ansi('\x1b[0;36m');

/** Bracketed marker for a node: `[ ]` `[x]` `[~]` `[*]` `[#]`. */
export function nodeIcon(node: Pick<NodeView, 'kind' | 'state'>): string {
  if (node.kind === 'pseudo') return `${YELLOW}[*]${NC}`;
  if (node.kind === 'date') return `${MAGENTA}[#]${NC}`;
  switch (node.state) {
    case 'done': return `${GREEN}[x]${NC}`;
    case 'partial': return `${ORANGE}[~]${NC}`;
    default: return `${CYAN}[ ]${NC}`;
  }
}
