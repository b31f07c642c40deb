/**
 * Per-command runtime: resolve config and the graph file, load the graph,
 * run the command body, then compact and save when the command mutated it.
 */

import type { Command } from 'commander';
import type { TrellisConfig } from '../types/config.js';
import type { Graph } from '../core/graph/graph.js';
import { shouldAutoClean } from '../core/graph/compact.js';
import { loadConfig } from '../core/config.js';
import { getLogger } from '../core/logger.js';
import { pushWarning } from '../core/output.js';
import { expandPath, resolveGraphPath } from '../core/paths.js';
import { loadGraph, saveGraph } from '../store/graph-store.js';

/** Options every command inherits from the program. */
export interface GlobalOptions {
  local?: boolean;
  global?: boolean;
  file?: string;
  json?: boolean;
  human?: boolean;
  quiet?: boolean;
}

export interface CommandContext {
  config: TrellisConfig;
  cwd: string;
  /** Graph file the command reads and writes. */
  graphPath: string;
  /** Directory holding saved blueprints. */
  blueprintDir: string;
}

export interface GraphContext extends CommandContext {
  graph: Graph;
}

export function globalOptions(command: Command): GlobalOptions {
  return command.optsWithGlobals<GlobalOptions>();
}

/**
 * Resolve config and paths for a command without touching the graph.
 */
export async function commandContext(command: Command, cwd = process.cwd()): Promise<CommandContext> {
  const opts = globalOptions(command);
  const config = await loadConfig(cwd);
  return {
    config,
    cwd,
    graphPath: resolveGraphPath({ local: opts.local, global: opts.global, file: opts.file, cwd }),
    blueprintDir: expandPath(config.blueprints.storePath, cwd),
  };
}

/**
 * Load the graph, run `fn`, and save afterwards when `mutates` is set.
 *
 * With `graph.autoClean` on, a mutated graph is compacted before saving once
 * its unused slots pass `graph.autoCleanThreshold` percent.
 */
export async function withGraph<T>(
  command: Command,
  options: { mutates: boolean },
  fn: (ctx: GraphContext) => T | Promise<T>,
): Promise<T> {
  const ctx = await commandContext(command);
  const loaded = await loadGraph(ctx.graphPath);
  if (loaded.upgraded) {
    pushWarning({
      code: 'W_DOCUMENT_UPGRADED',
      message: `Graph file was read with the compatibility decoder (version ${loaded.version}); it is saved in the current version on the next change.`,
    });
  }

  const result = await fn({ ...ctx, graph: loaded.graph });

  if (options.mutates) {
    const { graph } = loaded;
    if (ctx.config.graph.autoClean && shouldAutoClean(graph, ctx.config.graph.autoCleanThreshold)) {
      graph.clean();
      getLogger('cli').info({ graphPath: ctx.graphPath }, 'Auto-cleaned graph');
      pushWarning({ code: 'W_GRAPH_COMPACTED', message: 'Graph was compacted; node handles were renumbered.' });
    }
    await saveGraph(ctx.graphPath, graph);
  }
  return result;
}

/**
 * The message a mutating command reports about the edges it touched, when
 * `output.showConnections` is on.
 */
export function connectionMessage(ctx: CommandContext, message: string): string | undefined {
  return ctx.config.output.showConnections ? message : undefined;
}
