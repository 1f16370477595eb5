/**
 * Report writer: renders a report block and appends it to the results file.
 */

import { appendFileSync } from "node:fs";
import { DISPLAY_PRECISION, LABEL_WIDTH, RULE_WIDTH } from "./config.js";
import { OutputWriteError, describeFsError } from "./errors.js";
import type { ModeResult, StatisticsReport } from "./types.js";

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}

export function formatNumber(value: number): string {
  return value.toFixed(DISPLAY_PRECISION);
}

export function formatMode(mode: ModeResult): string {
  if (mode.kind === "none") {
    return "none (every value occurs once)";
  }
  return `${mode.values.map(formatNumber).join(", ")} (frequency ${mode.frequency})`;
}

function row(label: string, value: string | number): string {
  return `${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
}

export function formatReport(report: StatisticsReport): string {
  const lines = [
    `Run timestamp: ${formatTimestamp(report.timestamp)}`,
    "=".repeat(RULE_WIDTH),
    row("Source file", report.source),
    row("Valid samples", report.validCount),
    row("Rejected entries", report.rejectedCount),
  ];

  if (report.kind === "no-data") {
    lines.push("No valid numeric data found.");
  } else {
    const stats = report.statistics;
    lines.push(
      "-".repeat(RULE_WIDTH),
      row("Mean", formatNumber(stats.mean)),
      row("Median", formatNumber(stats.median)),
      row("Mode", formatMode(stats.mode)),
      row("Variance", formatNumber(stats.variance)),
      row("Standard deviation", formatNumber(stats.standardDeviation)),
      "-".repeat(RULE_WIDTH),
      row("Computation time", `${formatNumber(report.elapsedMs)} ms`),
    );
  }

  // Trailing blank line separates this block from the next run's.
  return lines.join("\n") + "\n\n";
}

/**
 * Append one report block to `path`, creating the file if needed. The block
 * goes out in a single append so concurrent runs cannot interleave lines.
 */
export function appendReport(path: string, report: StatisticsReport): string {
  const block = formatReport(report);
  try {
    appendFileSync(path, block, "utf-8");
  } catch (err) {
    throw new OutputWriteError(path, describeFsError(err), { cause: err });
  }
  return block;
}
