#!/usr/bin/env node
/**
 * pv CLI entry point.
 */

import { runCli } from './program.js';

await runCli(process.argv);
