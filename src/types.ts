/**
 * Shared record types for the loader, calculator and report writer.
 */

export interface RawLine {
  line: number; // 1-based
  text: string;
}

/**
 * A token that did not parse as a number. Kept for counting and
 * diagnostics only.
 */
export interface RejectedEntry {
  line: number;
  token: string;
}

export interface LoadResult {
  samples: readonly number[]; // input order
  rejected: RejectedEntry[];
  rejectedCount: number;
}

/**
 * Most frequent value(s). "none" means every value occurs exactly once.
 * Tied values are listed in ascending order.
 */
export type ModeResult =
  | { kind: "none" }
  | { kind: "modes"; values: number[]; frequency: number };

export interface StatisticsSummary {
  mean: number;
  median: number;
  mode: ModeResult;
  variance: number; // population, divisor n
  standardDeviation: number;
}

interface ReportHeader {
  readonly timestamp: Date;
  readonly source: string;
  readonly validCount: number;
  readonly rejectedCount: number;
}

export interface StatisticsRunReport extends ReportHeader {
  readonly kind: "statistics";
  readonly statistics: Readonly<StatisticsSummary>;
  readonly elapsedMs: number;
}

export interface NoDataReport extends ReportHeader {
  readonly kind: "no-data";
}

export type StatisticsReport = StatisticsRunReport | NoDataReport;
