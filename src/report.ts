/**
 * Builds the per-run report record from a loaded sample set.
 */

import { performance } from "node:perf_hooks";
import { computeStatistics } from "./stats.js";
import type { LoadResult, NoDataReport, StatisticsReport, StatisticsRunReport } from "./types.js";

export interface ReportOptions {
  source: string;
  now?: () => Date; // report timestamp
  clock?: () => number; // monotonic milliseconds, brackets the computation
}

export function buildReport(load: LoadResult, options: ReportOptions): StatisticsReport {
  const now = options.now ?? (() => new Date());
  const clock = options.clock ?? (() => performance.now());

  const header = {
    timestamp: now(),
    source: options.source,
    validCount: load.samples.length,
    rejectedCount: load.rejectedCount,
  };

  if (load.samples.length === 0) {
    const report: NoDataReport = { kind: "no-data", ...header };
    return Object.freeze(report);
  }

  const start = clock();
  const statistics = computeStatistics(load.samples);
  const elapsedMs = clock() - start;

  const report: StatisticsRunReport = {
    kind: "statistics",
    ...header,
    statistics: Object.freeze(statistics),
    elapsedMs,
  };
  return Object.freeze(report);
}
