#!/usr/bin/env node
/**
 * CLI entry point.
 *
 * Usage:
 *   npx tsx src/run.ts data/sample.txt
 */

import { runCli } from "./cli.js";

process.exitCode = runCli(process.argv.slice(2));
