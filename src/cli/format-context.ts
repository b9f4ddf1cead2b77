/**
 * CLI output format resolution context.
 *
 * Singleton that holds the resolved output mode for the current CLI invocation.
 * Set once in the Commander.js preAction hook; read by cliOutput() and renderers.
 */

import type { FormatResolution } from './middleware/output-format.js';

/**
 * Current resolved format for this CLI invocation.
 * Defaults to human output until resolved by the preAction hook.
 */
let currentResolution: FormatResolution = {
  format: 'human',
  source: 'default',
  quiet: false,
  dryRun: false,
};

/**
 * Set the resolved format for this CLI invocation.
 * Called once from the preAction hook in src/cli/program.ts.
 */
export function setFormatContext(resolution: FormatResolution): void {
  currentResolution = resolution;
}

/**
 * Get the current resolved format.
 */
export function getFormatContext(): FormatResolution {
  return currentResolution;
}

/**
 * Check if edits should be reported without being written.
 */
export function isDryRun(): boolean {
  return currentResolution.dryRun;
}
