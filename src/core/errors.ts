/**
 * trellis error types with exit code integration.
 */

import { ExitCode, getExitCodeName, isRecoverableCode } from '../types/exit-codes.js';

/**
 * Structured error class for trellis operations.
 * Carries an exit code, human-readable message, and optional fix suggestion.
 */
export class TrellisError extends Error {
  readonly code: ExitCode;
  readonly fix?: string;

  constructor(
    code: ExitCode,
    message: string,
    options?: {
      fix?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options?.cause });
    this.name = 'TrellisError';
    this.code = code;
    this.fix = options?.fix;
  }

  /** Whether retrying the same operation may succeed. */
  get retryable(): boolean {
    return isRecoverableCode(this.code);
  }

  /** Structured JSON representation for the error envelope. */
  toJSON(): Record<string, unknown> {
    return {
      success: false,
      error: {
        code: this.code,
        name: getExitCodeName(this.code),
        message: this.message,
        ...(this.fix && { fix: this.fix }),
      },
    };
  }
}

/**
 * Throw for internal invariant violations (programmer errors, never bad input).
 */
export function invariant(condition: unknown, message: string): asserts condition {
  if (!condition) {
    throw new Error(`Invariant violated: ${message}`);
  }
}
