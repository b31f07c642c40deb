/**
 * Output envelopes for CLI commands.
 *
 * Every command prints one JSON envelope on stdout by default:
 *
 *   { "success": true, "result": ..., "message"?: ..., "_meta": {...} }
 *   { "success": false, "result": null, "error": {...}, "_meta": {...} }
 *
 * Human-readable rendering is opt-in (see src/cli/renderers).
 */

import { randomUUID } from 'node:crypto';
import { TrellisError } from './errors.js';

export interface OutputWarning {
  code: string;
  message: string;
}

export interface EnvelopeMeta {
  timestamp: string;
  operation: string;
  requestId: string;
  warnings?: OutputWarning[];
}

/**
 * Accumulated warnings for the current command.
 * Drained by the next formatSuccess/formatError call.
 */
const pendingWarnings: OutputWarning[] = [];

/** Attach a warning to the next envelope. */
export function pushWarning(warning: OutputWarning): void {
  pendingWarnings.push(warning);
}

/** Return and clear the pending warnings. */
export function drainWarnings(): OutputWarning[] | undefined {
  if (pendingWarnings.length === 0) return undefined;
  const drained = [...pendingWarnings];
  pendingWarnings.length = 0;
  return drained;
}

function createMeta(operation: string): EnvelopeMeta {
  const warnings = drainWarnings();
  return {
    timestamp: new Date().toISOString(),
    operation,
    requestId: randomUUID(),
    ...(warnings && { warnings }),
  };
}

/**
 * Format a successful result as a JSON envelope.
 */
export function formatSuccess<T>(data: T, message?: string, operation = 'cli.output'): string {
  return JSON.stringify({
    success: true,
    result: data,
    ...(message && { message }),
    _meta: createMeta(operation),
  });
}

/**
 * Format an error as a JSON envelope.
 */
export function formatError(error: TrellisError, operation = 'cli.output'): string {
  return JSON.stringify({
    ...error.toJSON(),
    result: null,
    _meta: createMeta(operation),
  });
}
