/**
 * Advisory file locking using proper-lockfile.
 * Serializes writers of the same graph or blueprint file.
 */

import lockfile from 'proper-lockfile';
import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import { TrellisError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

const DEFAULT_LOCK_OPTIONS = {
  retries: {
    retries: 3,
    minTimeout: 100,
    maxTimeout: 1000,
    factor: 2,
  },
  stale: 10_000,
  // The target may not exist yet on a first save.
  realpath: false,
};

export interface LockOptions {
  stale?: number;
  retries?: number;
}

/** A release function returned by acquireLock. */
export type ReleaseFn = () => Promise<void>;

/**
 * Acquire an exclusive lock on a file.
 * Returns a release function that must be called when done.
 */
export async function acquireLock(filePath: string, options?: LockOptions): Promise<ReleaseFn> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    return await lockfile.lock(filePath, {
      ...DEFAULT_LOCK_OPTIONS,
      ...(options?.stale !== undefined && { stale: options.stale }),
      ...(options?.retries !== undefined && {
        retries: {
          ...DEFAULT_LOCK_OPTIONS.retries,
          retries: options.retries,
        },
      }),
    });
  } catch (err) {
    throw new TrellisError(
      ExitCode.LOCK_TIMEOUT,
      `Failed to acquire lock: ${filePath}`,
      {
        fix: 'Another trellis process may be writing to this file. Wait and retry.',
        cause: err,
      },
    );
  }
}

/**
 * Check if a file is currently locked.
 */
export async function isLocked(filePath: string): Promise<boolean> {
  return lockfile.check(filePath, { realpath: false });
}

/**
 * Execute a function while holding an exclusive lock on a file.
 * The lock is released when the function completes or throws.
 */
export async function withLock<T>(
  filePath: string,
  fn: () => Promise<T>,
  options?: LockOptions,
): Promise<T> {
  const release = await acquireLock(filePath, options);
  try {
    return await fn();
  } finally {
    await release();
  }
}
