/**
 * Configuration engine.
 *
 * Resolution priority: Environment vars > Project config > Global config > Defaults
 */

import { z } from 'zod';
import type { ConfigSource, ResolvedValue, TrellisConfig } from '../types/config.js';
import { ExitCode } from '../types/exit-codes.js';
import { readStoreFile, writeStoreFile } from '../store/files.js';
import { TrellisError } from './errors.js';
import { getConfigPath, getGlobalConfigPath } from './paths.js';

type ConfigTree = Record<string, unknown>;

/** Default configuration values. */
const DEFAULTS: TrellisConfig = {
  graph: {
    autoClean: false,
    autoCleanThreshold: 50,
  },
  output: {
    defaultFormat: 'json',
    showConnections: true,
  },
  blueprints: {
    storePath: '$HOME/.trellis/blueprints',
  },
  logging: {
    level: 'info',
    filePath: 'logs/trellis.log',
    maxFileSize: 10 * 1024 * 1024, // 10MB
    maxFiles: 5,
  },
};

const configSchema = z.object({
  graph: z.object({
    autoClean: z.boolean(),
    autoCleanThreshold: z.number().min(0).max(100),
  }),
  output: z.object({
    defaultFormat: z.enum(['json', 'human']),
    showConnections: z.boolean(),
  }),
  blueprints: z.object({
    storePath: z.string().min(1),
  }),
  logging: z.object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']),
    filePath: z.string().min(1),
    maxFileSize: z.number().int().positive(),
    maxFiles: z.number().int().positive(),
  }),
});

/** Environment variable to config path mapping. */
const ENV_MAP: Record<string, string> = {
  'TRELLIS_AUTO_CLEAN': 'graph.autoClean',
  'TRELLIS_AUTO_CLEAN_THRESHOLD': 'graph.autoCleanThreshold',
  'TRELLIS_FORMAT': 'output.defaultFormat',
  'TRELLIS_SHOW_CONNECTIONS': 'output.showConnections',
  'TRELLIS_BLUEPRINT_DIR': 'blueprints.storePath',
  'TRELLIS_LOG_LEVEL': 'logging.level',
  'TRELLIS_LOG_FILE': 'logging.filePath',
};

function isTree(value: unknown): value is ConfigTree {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Get a value at a dotted path from an object.
 */
function getNestedValue(obj: ConfigTree, path: string): unknown {
  let current: unknown = obj;
  for (const part of path.split('.')) {
    if (!isTree(current)) {
      return undefined;
    }
    current = current[part];
  }
  return current;
}

/**
 * Set a value at a dotted path in an object (mutates).
 */
function setNestedValue(obj: ConfigTree, path: string, value: unknown): void {
  const parts = path.split('.');
  const last = parts.pop();
  if (last === undefined) return;
  let current = obj;
  for (const part of parts) {
    const next = current[part];
    if (isTree(next)) {
      current = next;
    } else {
      const created: ConfigTree = {};
      current[part] = created;
      current = created;
    }
  }
  current[last] = value;
}

/**
 * Deep merge two objects. Source values override target values.
 * Arrays are replaced (not merged).
 */
function deepMerge(target: ConfigTree, source: ConfigTree): ConfigTree {
  const result = { ...target };
  for (const key of Object.keys(source)) {
    const sourceVal = source[key];
    const targetVal = result[key];
    result[key] = isTree(sourceVal) && isTree(targetVal) ? deepMerge(targetVal, sourceVal) : sourceVal;
  }
  return result;
}

/**
 * Parse a string value into its appropriate JS type.
 * Handles booleans, null, integers, floats, and JSON.
 */
export function parseConfigValue(value: string): unknown {
  if (value === 'true') return true;
  if (value === 'false') return false;
  if (value === 'null') return null;
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value);
  try {
    return JSON.parse(value);
  } catch {
    return value;
  }
}

async function readConfigFile(filePath: string): Promise<ConfigTree | null> {
  const text = await readStoreFile(filePath, 'config');
  if (text === null || text.trim() === '') return null;
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    throw new TrellisError(ExitCode.CONFIG_ERROR, `Config file is not valid JSON: ${filePath}`, { cause: err });
  }
  if (!isTree(parsed)) {
    throw new TrellisError(ExitCode.CONFIG_ERROR, `Config file must hold a JSON object: ${filePath}`);
  }
  return parsed;
}

function envOverrides(): ConfigTree {
  const overrides: ConfigTree = {};
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (envValue !== undefined) {
      setNestedValue(overrides, configPath, parseConfigValue(envValue));
    }
  }
  return overrides;
}

/**
 * Load and merge configuration from all sources.
 * Priority: defaults < global config < project config < environment vars
 */
export async function loadConfig(cwd?: string): Promise<TrellisConfig> {
  let merged: ConfigTree = { ...DEFAULTS };

  const globalConfig = await readConfigFile(getGlobalConfigPath());
  if (globalConfig) {
    merged = deepMerge(merged, globalConfig);
  }

  const projectConfig = await readConfigFile(getConfigPath(cwd));
  if (projectConfig) {
    merged = deepMerge(merged, projectConfig);
  }

  merged = deepMerge(merged, envOverrides());

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new TrellisError(
      ExitCode.CONFIG_ERROR,
      `Invalid configuration at ${issue?.path.join('.') ?? '?'}: ${issue?.message ?? 'unknown issue'}`,
      { fix: 'Check config.json and TRELLIS_* environment variables.' },
    );
  }
  return result.data;
}

/** The built-in defaults. */
export function getDefaultConfig(): TrellisConfig {
  return structuredClone(DEFAULTS);
}

/**
 * Get a single config value with source tracking.
 * Returns the value and which source it came from.
 */
export async function getConfigValue(path: string, cwd?: string): Promise<ResolvedValue<unknown>> {
  for (const [envKey, configPath] of Object.entries(ENV_MAP)) {
    const envValue = process.env[envKey];
    if (configPath === path && envValue !== undefined) {
      return { value: parseConfigValue(envValue), source: 'env' };
    }
  }

  const layers: [ConfigSource, string][] = [
    ['project', getConfigPath(cwd)],
    ['global', getGlobalConfigPath()],
  ];
  for (const [source, filePath] of layers) {
    const config = await readConfigFile(filePath);
    const value = config ? getNestedValue(config, path) : undefined;
    if (value !== undefined) {
      return { value, source };
    }
  }

  return { value: getNestedValue({ ...DEFAULTS }, path), source: 'default' };
}

/**
 * Set a config value in the project or global config file (dot-notation supported).
 * String values are parsed into booleans, numbers, null or JSON.
 */
export async function setConfigValue(
  key: string,
  value: string,
  cwd?: string,
  opts?: { global?: boolean },
): Promise<{ key: string; value: unknown; scope: 'project' | 'global' }> {
  if (getNestedValue({ ...DEFAULTS }, key) === undefined) {
    throw new TrellisError(ExitCode.INVALID_INPUT, `Unknown config key: ${key}`, {
      fix: 'Run `trellis config list` to see the available keys.',
    });
  }
  const configPath = opts?.global ? getGlobalConfigPath() : getConfigPath(cwd);
  const config = (await readConfigFile(configPath)) ?? {};
  const parsedValue = parseConfigValue(value);
  setNestedValue(config, key, parsedValue);
  await writeStoreFile(configPath, JSON.stringify(config, null, 2) + '\n', 'config');
  return { key, value: parsedValue, scope: opts?.global ? 'global' : 'project' };
}
