/** Descriptive statistics over a non-empty sample set. Inputs are never mutated. */

import { EmptySampleError } from "./errors.js";
import type { ModeResult, StatisticsSummary } from "./types.js";

function assertNonEmpty(arr: readonly number[]): void {
	if (arr.length === 0) throw new EmptySampleError();
}

export function sorted(arr: readonly number[]): number[] {
	return [...arr].sort((a, b) => a - b);
}

/**
 * Arithmetic mean. Deviations are summed relative to the first sample, so a
 * set of identical values returns that value exactly. When a deviation
 * overflows, falls back to sum / n, then to the sum of v / n.
 */
export function mean(arr: readonly number[]): number {
	assertNonEmpty(arr);
	const n = arr.length;
	const origin = arr[0];
	let shifted = 0;
	for (const v of arr) {
		shifted += v - origin;
	}
	if (Number.isFinite(shifted)) return origin + shifted / n;

	let total = 0;
	for (const v of arr) {
		total += v;
	}
	if (Number.isFinite(total)) return total / n;

	let scaled = 0;
	for (const v of arr) {
		scaled += v / n;
	}
	return scaled;
}

export function median(arr: readonly number[]): number {
	assertNonEmpty(arr);
	const s = sorted(arr);
	const mid = Math.floor(s.length / 2);
	// Halve before adding so two large middle values cannot overflow.
	return s.length % 2 !== 0 ? s[mid] : s[mid - 1] / 2 + s[mid] / 2;
}

export function mode(arr: readonly number[]): ModeResult {
	assertNonEmpty(arr);
	const counts = new Map<number, number>();
	let frequency = 0;
	for (const v of arr) {
		const count = (counts.get(v) ?? 0) + 1;
		counts.set(v, count);
		if (count > frequency) frequency = count;
	}

	if (frequency === 1) return { kind: "none" };

	const values: number[] = [];
	for (const [value, count] of counts) {
		if (count === frequency) values.push(value);
	}
	return { kind: "modes", values: sorted(values), frequency };
}

/** Population variance: mean squared deviation, divisor n. */
export function variance(arr: readonly number[], m: number = mean(arr)): number {
	assertNonEmpty(arr);
	let sumSquares = 0;
	for (const v of arr) {
		sumSquares += (v - m) ** 2;
	}
	return sumSquares / arr.length;
}

export function standardDeviation(varianceValue: number): number {
	return Math.sqrt(varianceValue);
}

export function computeStatistics(samples: readonly number[]): StatisticsSummary {
	assertNonEmpty(samples);
	const m = mean(samples);
	const v = variance(samples, m);
	return {
		mean: m,
		median: median(samples),
		mode: mode(samples),
		variance: v,
		standardDeviation: standardDeviation(v),
	};
}
