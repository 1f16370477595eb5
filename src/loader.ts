/**
 * Numeric loader.
 *
 * Turns raw text into an ordered sample set. Every whitespace-delimited
 * token is one candidate value; tokens that are not real-number literals
 * are recorded as rejected entries and loading carries on.
 *
 * Accepted literal: optional sign, digits with an optional single decimal
 * point (or a leading point), optional exponent. `12`, `-3.5`, `+.5`,
 * `4.`, `1e-3` parse; `NaN`, `Infinity`, `0x1F`, `1_000`, `1,5` do not.
 */

import { readFileSync, statSync } from "node:fs";
import { FileAccessError, describeFsError } from "./errors.js";
import type { LoadResult, RawLine, RejectedEntry } from "./types.js";

const NUMERIC_LITERAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?$/;

export function splitLines(text: string): RawLine[] {
  return text.split(/\r?\n/).map((line, i) => ({ line: i + 1, text: line }));
}

/** Returns the value of a numeric token, or null if it is malformed or not finite. */
export function parseNumericToken(token: string): number | null {
  if (!NUMERIC_LITERAL.test(token)) return null;
  const value = Number(token);
  return Number.isFinite(value) ? value : null;
}

export function loadSamples(lines: Iterable<RawLine>): LoadResult {
  const samples: number[] = [];
  const rejected: RejectedEntry[] = [];

  for (const { line, text } of lines) {
    for (const token of text.split(/\s+/)) {
      if (token === "") continue;
      const value = parseNumericToken(token);
      if (value === null) {
        rejected.push({ line, token });
      } else {
        samples.push(value);
      }
    }
  }

  return { samples, rejected, rejectedCount: rejected.length };
}

export function parseSampleText(text: string): LoadResult {
  return loadSamples(splitLines(text));
}

/**
 * Read and parse a data file. Throws FileAccessError when the path cannot
 * be read as a regular file; malformed content never throws.
 */
export function readSampleFile(path: string): LoadResult {
  let text: string;
  try {
    if (!statSync(path).isFile()) {
      throw new FileAccessError(path, "not a regular file");
    }
    text = readFileSync(path, "utf-8");
  } catch (err) {
    if (err instanceof FileAccessError) throw err;
    throw new FileAccessError(path, describeFsError(err), { cause: err });
  }
  return parseSampleText(text);
}
