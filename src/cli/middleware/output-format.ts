/**
 * Shared CLI middleware for resolving output mode from --json/--quiet/--dry-run.
 *
 * Precedence: --json flag > config `output.defaultFormat` > human.
 */

import type { OutputFormat } from '../../types/config.js';

/** Where the output format came from. */
export type FormatSource = 'flag' | 'config' | 'default';

export interface FormatResolution {
  format: OutputFormat;
  source: FormatSource;
  quiet: boolean;
  dryRun: boolean;
}

/**
 * Resolve output mode from Commander.js option values.
 *
 * @param opts - Commander.js parsed options (with globals)
 * @param configDefault - `output.defaultFormat` from the resolved config
 */
export function resolveFormat(
  opts: Record<string, unknown>,
  configDefault?: OutputFormat,
): FormatResolution {
  const quiet = opts['quiet'] === true;
  const dryRun = opts['dryRun'] === true;

  if (opts['json'] === true) {
    return { format: 'json', source: 'flag', quiet, dryRun };
  }
  if (configDefault) {
    return { format: configDefault, source: 'config', quiet, dryRun };
  }
  return { format: 'human', source: 'default', quiet, dryRun };
}
