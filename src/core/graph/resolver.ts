/**
 * Identifier resolution: user token -> node handle.
 *
 * Order is fixed: absolute date, relative date, numeric handle, alias.
 * An alias that is a plain integer, a valid date or a relative keyword is
 * therefore never reached by name.
 */

import type { Handle } from '../../types/graph.js';
import { isRelativeDate, matchesDateGrammar, parseDateKey, resolveRelativeDate } from '../dates.js';
import { GraphError } from './errors.js';

/** Index lookups the resolver needs from a graph. */
export interface ResolverIndex {
  readonly dates: ReadonlyMap<string, Handle>;
  readonly aliases: ReadonlyMap<string, Handle>;
  isLive(handle: Handle): boolean;
}

const PLAIN_INTEGER = /^\d+$/;
/** Signed or fractional numbers: never a handle. */
const NON_HANDLE_NUMBER = /^[+-]\d+(\.\d+)?$|^\d+\.\d+$/;

function lookupDate(index: ResolverIndex, key: string): Handle {
  const handle = index.dates.get(key);
  if (handle === undefined || !index.isLive(handle)) {
    throw GraphError.invalidDate(key);
  }
  return handle;
}

/** Validate a numeric handle against the graph. */
export function checkHandle(index: ResolverIndex, handle: number): Handle {
  if (!Number.isInteger(handle) || handle < 0) {
    throw GraphError.malformedHandle(String(handle));
  }
  if (!index.isLive(handle)) {
    throw GraphError.invalidHandle(handle);
  }
  return handle;
}

/** Parse a date-shaped token, keeping a MalformedDate for later. */
function dateKeyOf(token: string): { key: string | null; error: GraphError | null } {
  try {
    return { key: parseDateKey(token), error: null };
  } catch (err) {
    if (err instanceof GraphError) return { key: null, error: err };
    throw err;
  }
}

/**
 * Resolve a user token to a live handle.
 *
 * A token that is shaped like a date or a number but is not a valid one
 * (`2024-02-30`, `-1`, `1.5`) is still looked up as an alias; it fails as
 * malformed only when no such alias exists.
 *
 * @param now - Reference time for `today` / `tomorrow` / `yesterday`
 */
export function resolveToken(index: ResolverIndex, token: string, now: Date = new Date()): Handle {
  const trimmed = token.trim();
  if (trimmed === '') {
    throw GraphError.malformedHandle(token);
  }

  let malformed: GraphError | null = null;
  if (matchesDateGrammar(trimmed)) {
    const { key, error } = dateKeyOf(trimmed);
    if (key !== null) return lookupDate(index, key);
    malformed = error;
  } else if (isRelativeDate(trimmed)) {
    return lookupDate(index, resolveRelativeDate(trimmed, now));
  } else if (PLAIN_INTEGER.test(trimmed)) {
    return checkHandle(index, Number(trimmed));
  } else if (NON_HANDLE_NUMBER.test(trimmed)) {
    malformed = GraphError.malformedHandle(token);
  }

  const aliased = index.aliases.get(trimmed);
  if (aliased === undefined || !index.isLive(aliased)) {
    throw malformed ?? GraphError.invalidAlias(trimmed);
  }
  return aliased;
}
