/**
 * Persistence error types.
 */

import { TrellisError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

export type DocumentErrorReason = 'ParseError' | 'IOError';

/** A graph document could not be read, decoded or written. */
export class DocumentError extends TrellisError {
  readonly reason: DocumentErrorReason;

  constructor(
    reason: DocumentErrorReason,
    message: string,
    options?: { code?: ExitCode; fix?: string; cause?: unknown },
  ) {
    const fallback = reason === 'ParseError' ? ExitCode.PARSE_ERROR : ExitCode.FILE_ERROR;
    super(options?.code ?? fallback, message, { fix: options?.fix, cause: options?.cause });
    this.name = 'DocumentError';
    this.reason = reason;
  }

  static unsupportedVersion(version: unknown): DocumentError {
    return new DocumentError('ParseError', `Unsupported document version: ${String(version)}`, {
      code: ExitCode.UNSUPPORTED_VERSION,
    });
  }
}

export type BlueprintErrorReason = 'NotFound' | 'AlreadyExists';

/** A named blueprint is missing, or would be overwritten. */
export class BlueprintError extends TrellisError {
  readonly reason: BlueprintErrorReason;
  readonly blueprint: string;

  constructor(reason: BlueprintErrorReason, blueprint: string) {
    super(
      reason === 'NotFound' ? ExitCode.BLUEPRINT_NOT_FOUND : ExitCode.BLUEPRINT_EXISTS,
      reason === 'NotFound'
        ? `Blueprint not found: '${blueprint}'`
        : `Blueprint already exists: '${blueprint}'`,
      {
        fix: reason === 'NotFound'
          ? 'Run `trellis bp ls` to list saved blueprints.'
          : 'Pass --overwrite to replace it.',
      },
    );
    this.name = 'BlueprintError';
    this.reason = reason;
    this.blueprint = blueprint;
  }
}
