/**
 * Configuration type definitions.
 * Covers project and global config with cascade resolution.
 */

/** Output format options. */
export type OutputFormat = 'json' | 'human';

/** Output configuration. */
export interface OutputConfig {
  defaultFormat: OutputFormat;
  /** Print a line whenever a node is added, removed, linked or unlinked. */
  showConnections: boolean;
}

/** Graph maintenance configuration. */
export interface GraphConfig {
  /** Compact the graph after each mutating command. */
  autoClean: boolean;
  /** Only compact when tombstones exceed this percentage of slots. */
  autoCleanThreshold: number;
}

/** Blueprint storage configuration. */
export interface BlueprintConfig {
  /** Directory holding saved blueprints. `$HOME` expands to the home directory. */
  storePath: string;
}

/** Pino log levels. */
export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

/** Logging configuration. */
export interface LoggingConfig {
  /** Minimum log level to record (default: 'info') */
  level: LogLevel;
  /** Log file path relative to the data directory (default: 'logs/trellis.log') */
  filePath: string;
  /** Max log file size in bytes before rotation (default: 10MB) */
  maxFileSize: number;
  /** Number of rotated log files to retain (default: 5) */
  maxFiles: number;
}

/** trellis configuration (config.json). */
export interface TrellisConfig {
  graph: GraphConfig;
  output: OutputConfig;
  blueprints: BlueprintConfig;
  logging: LoggingConfig;
}

/** Configuration resolution priority. */
export type ConfigSource = 'cli' | 'env' | 'project' | 'global' | 'default';

/** A resolved config value with its source. */
export interface ResolvedValue<T> {
  value: T;
  source: ConfigSource;
}
