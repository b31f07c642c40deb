/**
 * Centralized pino logger factory.
 *
 * Singleton pattern. Uses pino-roll for automatic file rotation and retention.
 * Context via child loggers (getLogger('subsystem')).
 *
 * stdout is reserved for command output; diagnostics go to the log file,
 * or to stderr before the logger is initialized.
 */

import pino from 'pino';
import { join, dirname } from 'node:path';
import { mkdirSync } from 'node:fs';
import type { LoggingConfig } from '../types/config.js';

let rootLogger: pino.Logger | null = null;
let fallbackLogger: pino.Logger | null = null;

/**
 * Convert bytes to a size string for pino-roll ('10m', '1g', '500k').
 */
export function bytesToSizeString(bytes: number): string {
  if (bytes >= 1024 * 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024 * 1024))}g`;
  if (bytes >= 1024 * 1024) return `${Math.floor(bytes / (1024 * 1024))}m`;
  if (bytes >= 1024) return `${Math.floor(bytes / 1024)}k`;
  return `${bytes}`;
}

/**
 * Initialize the root logger. Call once at startup.
 *
 * @param dataDir - Absolute path to the data directory holding the graph
 * @param config  - Logging section of the resolved configuration
 */
export function initLogger(dataDir: string, config: LoggingConfig): pino.Logger {
  const dest = join(dataDir, config.filePath);

  // No file (and no transport worker) when nothing would be written
  if (config.level === 'silent') {
    rootLogger = pino({ level: 'silent' });
    return rootLogger;
  }

  mkdirSync(dirname(dest), { recursive: true });

  const transport = pino.transport({
    target: 'pino-roll',
    options: {
      file: dest,
      size: bytesToSizeString(config.maxFileSize),
      frequency: 'daily',
      dateFormat: 'yyyy-MM-dd',
      mkdir: true,
      limit: {
        count: config.maxFiles,
      },
    },
  });

  rootLogger = pino(
    {
      level: config.level,
      formatters: {
        level: (label: string) => ({ level: label.toUpperCase() }),
      },
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    transport,
  );

  return rootLogger;
}

/**
 * Get a child logger bound to a subsystem name.
 *
 * Safe to call before initLogger: returns a stderr fallback logger
 * so early startup code and tests never crash.
 */
export function getLogger(subsystem: string): pino.Logger {
  if (!rootLogger) {
    fallbackLogger ??= pino(
      {
        level: process.env['TRELLIS_LOG_LEVEL'] ?? 'warn',
        formatters: { level: (label: string) => ({ level: label.toUpperCase() }) },
      },
      pino.destination(2),
    );
    return fallbackLogger.child({ subsystem });
  }
  return rootLogger.child({ subsystem });
}

/** Flush and close the logger. Call during shutdown. */
export function closeLogger(): void {
  if (rootLogger) {
    rootLogger.flush();
  }
  rootLogger = null;
}
