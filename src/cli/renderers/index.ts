/**
 * Central output dispatch for CLI commands.
 *
 * Commands call:
 *   cliOutput(data, { command: 'ls', message, operation, render })
 *
 * The resolved format picks between the JSON envelope (formatSuccess) and
 * the command's human renderer.
 */

import { getFormatContext } from '../format-context.js';
import { formatError, formatSuccess } from '../../core/output.js';
import { TrellisError } from '../../core/errors.js';

export type HumanRenderer<T> = (data: T, quiet: boolean) => string;

export interface CliOutputOptions<T> {
  /** Command name, used for the default operation name. */
  command: string;
  /** Optional success message. */
  message?: string;
  /** Operation name for _meta. */
  operation?: string;
  /** Human renderer; without one, the message (or the data as JSON) is printed. */
  render?: HumanRenderer<T>;
}

function renderGeneric(data: unknown, message: string | undefined, quiet: boolean): string {
  if (quiet) return '';
  if (message) return message;
  return JSON.stringify(data, null, 2);
}

/**
 * Output data to stdout in the resolved format (JSON or human-readable).
 */
export function cliOutput<T>(data: T, opts: CliOutputOptions<T>): void {
  const ctx = getFormatContext();

  if (ctx.format === 'human') {
    const text = opts.render
      ? opts.render(data, ctx.quiet)
      : renderGeneric(data, opts.message, ctx.quiet);
    if (text) {
      console.log(text);
    }
    return;
  }

  console.log(formatSuccess(data, opts.message, opts.operation ?? `cli.${opts.command}`));
}

/**
 * Output an error in the resolved format: the JSON error envelope, or a
 * plain `Error:` line with the fix hint for human output. Goes to stderr.
 */
export function cliError(error: TrellisError, operation?: string): void {
  const ctx = getFormatContext();

  if (ctx.format === 'human') {
    console.error(`Error: ${error.message}`);
    if (error.fix && !ctx.quiet) {
      console.error(`  Fix: ${error.fix}`);
    }
    return;
  }

  console.error(formatError(error, operation));
}

/**
 * Report a failed command and exit with its code. Errors that are not
 * TrellisErrors are rethrown untouched.
 */
export function exitWithError(err: unknown, operation?: string): never {
  if (err instanceof TrellisError) {
    cliError(err, operation);
    process.exit(err.code);
  }
  throw err;
}
