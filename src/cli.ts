/**
 * Command-line driver: load → compute → append, with console reporting and
 * an exit code. Kept free of process.exit so it can run in-process.
 */

import minimist from "minimist";
import { resolve } from "node:path";
import { RESULTS_FILENAME } from "./config.js";
import { NumstatError } from "./errors.js";
import { readSampleFile } from "./loader.js";
import { buildReport } from "./report.js";
import { appendReport } from "./writer.js";

export const USAGE = `
numstat - descriptive statistics for a file of numbers

Usage:
  numstat <data-file>

Reads whitespace-separated numbers from <data-file>, computes mean, median,
mode, population variance and standard deviation, and appends a timestamped
report to ${RESULTS_FILENAME} in the working directory.

Options:
  --help, -h        Show this help message
`.trim();

export interface CliOptions {
  cwd?: string;
  now?: () => Date;
}

export function runCli(argv: string[], options: CliOptions = {}): number {
  const args = minimist(argv, {
    boolean: ["help"],
    string: ["_"],
    alias: {
      h: "help",
    },
  });

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  if (args._.length !== 1) {
    console.error(
      args._.length === 0
        ? "Error: missing input data file"
        : `Error: expected one input data file, got ${args._.length}`,
    );
    console.error(USAGE);
    return 1;
  }

  const cwd = options.cwd ?? process.cwd();
  const source = String(args._[0]);
  const inputPath = resolve(cwd, source);
  const outputPath = resolve(cwd, RESULTS_FILENAME);

  try {
    const load = readSampleFile(inputPath);
    for (const entry of load.rejected) {
      console.error(`Warning: line ${entry.line}: '${entry.token}' is not a number, skipped`);
    }

    const report = buildReport(load, { source, now: options.now });
    if (report.kind === "no-data") {
      console.error(`No valid numeric data found in ${source}`);
    }

    const block = appendReport(outputPath, report);
    console.log(block.trimEnd());
    console.log("");
    console.log(`Results appended to: ${outputPath}`);
    return 0;
  } catch (err) {
    if (err instanceof NumstatError) {
      console.error(`Error: ${err.message}`);
    } else {
      console.error(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`);
    }
    return 1;
  }
}
