/**
 * Path resolution for trellis data.
 *
 * Environment variables:
 *   TRELLIS_HOME - Global data directory (default: ~/.trellis)
 */

import { resolve, join, isAbsolute } from 'node:path';
import { homedir } from 'node:os';
import { existsSync } from 'node:fs';
import { CONFIG_FILE, DATA_DIR_NAME, GRAPH_FILE } from './constants.js';

/**
 * Get the global trellis home directory.
 * Respects TRELLIS_HOME env var, defaults to ~/.trellis.
 */
export function getTrellisHome(): string {
  return process.env['TRELLIS_HOME'] ?? join(homedir(), DATA_DIR_NAME);
}

/**
 * Get the absolute path to the project data directory under `cwd`.
 */
export function getLocalDataDir(cwd?: string): string {
  return resolve(cwd ?? process.cwd(), DATA_DIR_NAME);
}

/** Path to the global config.json. */
export function getGlobalConfigPath(): string {
  return join(getTrellisHome(), CONFIG_FILE);
}

/** Path to the project config.json. */
export function getConfigPath(cwd?: string): string {
  return join(getLocalDataDir(cwd), CONFIG_FILE);
}

/**
 * Expand `$HOME` and a leading `~` in a configured path, then make it
 * absolute against `cwd`.
 */
export function expandPath(path: string, cwd?: string): string {
  const home = homedir();
  let expanded = path.replace(/\$HOME|\$\{HOME\}/g, home);
  if (expanded === '~' || expanded.startsWith('~/')) {
    expanded = join(home, expanded.slice(1));
  }
  return isAbsolute(expanded) ? expanded : resolve(cwd ?? process.cwd(), expanded);
}

export interface GraphPathOptions {
  /** Use the project graph, creating it if needed. */
  local?: boolean;
  /** Use the global graph even when a project graph exists. */
  global?: boolean;
  /** Explicit graph file; overrides both flags. */
  file?: string;
  cwd?: string;
}

/**
 * Pick the graph file a command operates on.
 *
 * An explicit file wins. Otherwise the project graph is used when asked for
 * or when it already exists, and the global graph in every other case.
 */
export function resolveGraphPath(options: GraphPathOptions = {}): string {
  if (options.file) {
    return resolve(options.cwd ?? process.cwd(), options.file);
  }
  const localGraph = join(getLocalDataDir(options.cwd), GRAPH_FILE);
  if (options.local || (!options.global && existsSync(localGraph))) {
    return localGraph;
  }
  return join(getTrellisHome(), GRAPH_FILE);
}
