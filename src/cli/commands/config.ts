/**
 * CLI config command: get, set and list configuration values.
 */

import { Command } from 'commander';
import { getConfigValue, loadConfig, setConfigValue } from '../../core/config.js';
import type { ConfigSource } from '../../types/config.js';
import { cliOutput, exitWithError } from '../renderers/index.js';
import { globalOptions } from '../runtime.js';

/** Flatten a config object into dotted keys. */
export function flattenConfig(tree: object, prefix = ''): [string, unknown][] {
  const entries: [string, unknown][] = [];
  for (const [key, value] of Object.entries(tree)) {
    const path = prefix ? `${prefix}.${key}` : key;
    if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
      entries.push(...flattenConfig(value, path));
    } else {
      entries.push([path, value]);
    }
  }
  return entries;
}

function renderValue(data: { key: string; value: unknown; source: ConfigSource }, quiet: boolean): string {
  const value = JSON.stringify(data.value);
  return quiet ? value : `${data.key} = ${value} (${data.source})`;
}

function renderList(data: { values: Record<string, unknown> }, quiet: boolean): string {
  return Object.entries(data.values)
    .map(([key, value]) => (quiet ? key : `${key} = ${JSON.stringify(value)}`))
    .join('\n');
}

export function registerConfigCommand(program: Command): void {
  const config = program.command('config').description('Read and change configuration');

  config
    .command('get <key>')
    .description('Show a value and where it came from')
    .action(async (key: string) => {
      try {
        const resolved = await getConfigValue(key, process.cwd());
        cliOutput({ key, ...resolved }, { command: 'config get', operation: 'config.get', render: renderValue });
      } catch (err) {
        exitWithError(err, 'config.get');
      }
    });

  config
    .command('set <key> <value>')
    .description('Write a value to the project config, or the global one with --global')
    .action(async (key: string, value: string, _opts: unknown, command: Command) => {
      try {
        const { global } = globalOptions(command);
        const result = await setConfigValue(key, value, process.cwd(), { global });
        cliOutput(result, {
          command: 'config set',
          operation: 'config.set',
          message: `Set ${result.key} = ${JSON.stringify(result.value)} in the ${result.scope} config`,
        });
      } catch (err) {
        exitWithError(err, 'config.set');
      }
    });

  config
    .command('list')
    .description('Show the resolved configuration')
    .action(async () => {
      try {
        const resolved = await loadConfig(process.cwd());
        const values = Object.fromEntries(flattenConfig(resolved));
        cliOutput({ values }, { command: 'config list', operation: 'config.list', render: renderList });
      } catch (err) {
        exitWithError(err, 'config.list');
      }
    });
}
