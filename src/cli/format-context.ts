/**
 * CLI output format resolution context.
 *
 * Singleton that holds the resolved output format for the current CLI
 * invocation. Set once in the Commander.js preAction hook; read by
 * cliOutput() and the renderers.
 */

import type { OutputFormat } from '../types/config.js';

export interface FlagResolution {
  format: OutputFormat;
  /** Where the format came from. */
  source: 'flag' | 'config' | 'default';
  quiet: boolean;
}

/**
 * Current resolved format for this CLI invocation.
 * Defaults to JSON until resolved by the preAction hook.
 */
let currentResolution: FlagResolution = {
  format: 'json',
  source: 'default',
  quiet: false,
};

/**
 * Set the resolved format for this CLI invocation.
 */
export function setFormatContext(resolution: FlagResolution): void {
  currentResolution = resolution;
}

/**
 * Get the current resolved format.
 */
export function getFormatContext(): FlagResolution {
  return currentResolution;
}
