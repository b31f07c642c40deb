/**
 * Named blueprints saved as YAML files in a directory.
 */

import { readdir, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';
import type { BlueprintDoc } from '../types/graph.js';
import { BLUEPRINT_EXTENSION } from '../core/constants.js';
import { findBlueprintRangeError } from '../core/graph/blueprint.js';
import { TrellisError } from '../core/errors.js';
import { getLogger } from '../core/logger.js';
import { ExitCode } from '../types/exit-codes.js';
import { fromNodeDoc, toNodeDoc, type DocumentFormat } from './document.js';
import { BlueprintError, DocumentError } from './errors.js';
import { readStoreFile, writeStoreFile } from './files.js';
import { withLock } from './lock.js';
import { blueprintSchema, type BlueprintFileDoc } from './schema.js';

const BLUEPRINT_NAME = /^[A-Za-z0-9_-][A-Za-z0-9._-]*$/;

export interface BlueprintSummary {
  name: string;
  title: string;
  author: string | null;
  size: number;
}

function blueprintPath(dir: string, name: string): string {
  if (!BLUEPRINT_NAME.test(name)) {
    throw new TrellisError(ExitCode.INVALID_INPUT, `Invalid blueprint name: '${name}'`, {
      fix: 'Use letters, digits, dots, dashes and underscores.',
    });
  }
  return join(dir, `${name}${BLUEPRINT_EXTENSION}`);
}

function toFileDoc(doc: BlueprintDoc): BlueprintFileDoc {
  return { version: doc.version, title: doc.title, author: doc.author, nodes: doc.nodes.map(toNodeDoc) };
}

/** Serialize a blueprint for storage or export. */
export function encodeBlueprint(doc: BlueprintDoc, format: DocumentFormat = 'yaml'): string {
  const fileDoc = toFileDoc(doc);
  return format === 'json' ? JSON.stringify(fileDoc, null, 2) + '\n' : stringifyYaml(fileDoc);
}

/**
 * Decode a blueprint from YAML or JSON text.
 *
 * @throws DocumentError when the text is not a blueprint
 */
export function decodeBlueprint(text: string): BlueprintDoc {
  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new DocumentError('ParseError', 'Blueprint is not valid YAML or JSON', { cause: err });
  }
  const parsed = blueprintSchema.safeParse(raw);
  if (!parsed.success) {
    throw new DocumentError('ParseError', `Malformed blueprint: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`, {
      cause: parsed.error,
    });
  }
  const problem = findBlueprintRangeError(parsed.data.nodes);
  if (problem !== null) {
    throw new DocumentError('ParseError', `Malformed blueprint: ${problem}`);
  }
  return { ...parsed.data, nodes: parsed.data.nodes.map(fromNodeDoc) };
}

/**
 * Save a blueprint under `name`. An existing blueprint is only replaced
 * with `overwrite`.
 */
export async function saveBlueprint(
  dir: string,
  name: string,
  doc: BlueprintDoc,
  options: { overwrite?: boolean } = {},
): Promise<string> {
  const filePath = blueprintPath(dir, name);
  await withLock(filePath, async () => {
    if (!options.overwrite && (await readStoreFile(filePath, 'blueprint')) !== null) {
      throw new BlueprintError('AlreadyExists', name);
    }
    await writeStoreFile(filePath, encodeBlueprint(doc), 'blueprint');
  });
  getLogger('store').info({ name, nodes: doc.nodes.length }, 'Saved blueprint');
  return filePath;
}

export async function loadBlueprint(dir: string, name: string): Promise<BlueprintDoc> {
  const text = await readStoreFile(blueprintPath(dir, name), 'blueprint');
  if (text === null) {
    throw new BlueprintError('NotFound', name);
  }
  return decodeBlueprint(text);
}

export async function removeBlueprint(dir: string, name: string): Promise<void> {
  const filePath = blueprintPath(dir, name);
  if ((await readStoreFile(filePath, 'blueprint')) === null) {
    throw new BlueprintError('NotFound', name);
  }
  await rm(filePath);
  getLogger('store').info({ name }, 'Removed blueprint');
}

/**
 * Summaries of every readable blueprint in `dir`, sorted by name.
 * Unreadable files are skipped with a warning.
 */
export async function listBlueprints(dir: string): Promise<BlueprintSummary[]> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return [];
    throw new DocumentError('IOError', `Failed to list blueprints: ${dir}`, { cause: err });
  }

  const summaries: BlueprintSummary[] = [];
  for (const entry of entries.sort()) {
    if (!entry.endsWith(BLUEPRINT_EXTENSION)) continue;
    const name = entry.slice(0, -BLUEPRINT_EXTENSION.length);
    try {
      const doc = await loadBlueprint(dir, name);
      summaries.push({ name, title: doc.title, author: doc.author, size: doc.nodes.length });
    } catch (err) {
      getLogger('store').warn({ name, err }, 'Skipping unreadable blueprint');
    }
  }
  return summaries;
}
