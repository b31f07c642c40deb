/**
 * Build the trellis commander program.
 */

import { Command } from 'commander';
import { readFileSync } from 'node:fs';
import { dirname } from 'node:path';
import { fileURLToPath } from 'node:url';
import { loadConfig } from '../core/config.js';
import { getLogger, initLogger } from '../core/logger.js';
import { resolveGraphPath } from '../core/paths.js';
import type { OutputFormat } from '../types/config.js';
import { registerAddCommand, registerRenameCommand } from './commands/add.js';
import { registerAliasCommands } from './commands/alias.js';
import { registerBlueprintCommands } from './commands/blueprint.js';
import { registerCalendarCommand } from './commands/calendar.js';
import { registerConfigCommand } from './commands/config.js';
import { registerCopyCommand } from './commands/copy.js';
import {
  registerLinkCommand,
  registerMoveCommand,
  registerOrderCommand,
  registerUnlinkCommand,
} from './commands/edges.js';
import { registerListArchivedCommand, registerListCommand, registerListDatesCommand } from './commands/list.js';
import { registerRandomCommand } from './commands/pick.js';
import { registerRemoveCommand } from './commands/remove.js';
import { registerArchiveCommands, registerCheckCommands, registerSetCommand } from './commands/state.js';
import { registerCleanCommand, registerStatsCommand } from './commands/stats.js';
import { registerExportCommand, registerImportCommand } from './commands/transfer.js';
import { setFormatContext } from './format-context.js';
import { resolveFormat } from './middleware/output-format.js';
import { cliOutput } from './renderers/index.js';
import { globalOptions } from './runtime.js';

/** Read version from package.json (single source of truth). */
export function getPackageVersion(): string {
  // src/cli/program.ts and dist/cli/program.js both sit two levels below the root
  const path = fileURLToPath(new URL('../../package.json', import.meta.url));
  try {
    const pkg: unknown = JSON.parse(readFileSync(path, 'utf-8'));
    if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (err) {
    getLogger('cli').warn({ err, path }, 'Could not read package version');
  }
  return '0.0.0';
}

/**
 * Load config and start the file logger for the graph the command will use.
 * Returns the configured output format, or undefined when config could not
 * be loaded (the command itself then reports the config error).
 */
async function initRuntime(command: Command): Promise<OutputFormat | undefined> {
  const opts = globalOptions(command);
  const cwd = process.cwd();
  try {
    const config = await loadConfig(cwd);
    const graphPath = resolveGraphPath({ local: opts.local, global: opts.global, file: opts.file, cwd });
    initLogger(dirname(graphPath), config.logging);
    return config.output.defaultFormat;
  } catch (err) {
    getLogger('cli').warn({ err }, 'Starting without config; logging to stderr');
    return undefined;
  }
}

export interface ProgramOptions {
  /**
   * Build the program that `bp edit` runs inside a running command: the
   * outer invocation has already set up logging and the output format, and
   * `bp edit` itself is left out.
   */
  embedded?: boolean;
}

export function createProgram(options: ProgramOptions = {}): Command {
  const version = getPackageVersion();
  const program = new Command();

  program
    .name('trellis')
    .description('Task graphs in the terminal: nested checklists, dates and reusable blueprints')
    .version(version)
    .option('--local', 'Use the graph in ./.trellis (created if missing)')
    .option('--global', 'Use the global graph even when a local one exists')
    .option('--file <path>', 'Use an explicit graph file')
    .option('--json', 'Output in JSON format (default)')
    .option('--human', 'Output in human-readable format')
    .option('--quiet', 'Suppress non-essential output for scripting');

  program
    .command('version')
    .description('Display trellis version')
    .action(() => {
      cliOutput({ version }, { command: 'version', message: version });
    });

  registerAddCommand(program);
  registerRenameCommand(program);
  registerRemoveCommand(program);

  registerLinkCommand(program);
  registerUnlinkCommand(program);
  registerMoveCommand(program);
  registerCopyCommand(program);
  registerOrderCommand(program);

  registerSetCommand(program);
  registerCheckCommands(program);
  registerArchiveCommands(program);

  registerAliasCommands(program);

  registerListCommand(program);
  registerListDatesCommand(program);
  registerListArchivedCommand(program);
  registerStatsCommand(program);
  registerCleanCommand(program);
  registerRandomCommand(program);
  registerCalendarCommand(program);

  registerExportCommand(program);
  registerImportCommand(program);
  registerBlueprintCommands(
    program,
    options.embedded
      ? undefined
      : async (graphPath, args) => {
        await createProgram({ embedded: true }).parseAsync(['--file', graphPath, ...args], { from: 'user' });
      },
  );
  registerConfigCommand(program);

  if (options.embedded) return program;

  // Logger and output format are resolved once, before the first action runs
  let initialized = false;
  program.hook('preAction', async (_thisCommand, actionCommand) => {
    if (initialized) return;
    initialized = true;
    const configDefault = await initRuntime(actionCommand);
    setFormatContext(resolveFormat(actionCommand.optsWithGlobals(), configDefault));
  });

  return program;
}
