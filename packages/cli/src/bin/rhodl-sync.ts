#!/usr/bin/env tsx

/**
 * rhodl-sync CLI entry point
 *
 * Exit status 0 on success, 1 on any failure.
 */

import { runCli } from '../index.js';

process.exitCode = await runCli(process.argv.slice(2));
