/** Fixed settings. There are no config files or environment variables. */

export const RESULTS_FILENAME = "StatisticsResults.txt";

/** Decimal places used when a statistic is printed. Computation is unrounded. */
export const DISPLAY_PRECISION = 4;

export const LABEL_WIDTH = 22;
export const RULE_WIDTH = 60;
