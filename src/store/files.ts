/**
 * Text files of the store: graph documents, blueprints, exports and config.
 *
 * A missing file reads as null. Writes replace the whole file through
 * write-file-atomic (temp file, then rename), creating the directory first.
 * Failures surface as `DocumentError('IOError')` naming the kind of file.
 */

import writeFileAtomic from 'write-file-atomic';
import { mkdir, readFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { DocumentError } from './errors.js';

export type StoreFileKind = 'graph' | 'blueprint' | 'document' | 'config';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export async function readStoreFile(filePath: string, kind: StoreFileKind): Promise<string | null> {
  try {
    return await readFile(filePath, 'utf8');
  } catch (err) {
    if (isMissingFile(err)) return null;
    throw new DocumentError('IOError', `Failed to read ${kind} file: ${filePath}`, { cause: err });
  }
}

export async function writeStoreFile(filePath: string, text: string, kind: StoreFileKind): Promise<void> {
  try {
    await mkdir(dirname(filePath), { recursive: true });
    await writeFileAtomic(filePath, text, { encoding: 'utf8' });
  } catch (err) {
    throw new DocumentError('IOError', `Failed to write ${kind} file: ${filePath}`, { cause: err });
  }
}
