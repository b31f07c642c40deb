/**
 * Resolve the output format from --json/--human/--quiet flags.
 *
 * Precedence: --json, then --human, then the configured default.
 */

import type { OutputFormat } from '../../types/config.js';
import type { FlagResolution } from '../format-context.js';

/**
 * Resolve output format from Commander.js option values.
 *
 * @param opts - Commander.js parsed options (with globals)
 * @param configDefault - `output.defaultFormat` from the resolved config
 */
export function resolveFormat(opts: Record<string, unknown>, configDefault?: OutputFormat): FlagResolution {
  const quiet = opts['quiet'] === true;
  if (opts['json'] === true) return { format: 'json', source: 'flag', quiet };
  if (opts['human'] === true) return { format: 'human', source: 'flag', quiet };
  if (configDefault) return { format: configDefault, source: 'config', quiet };
  return { format: 'json', source: 'default', quiet };
}
