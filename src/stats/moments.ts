/**
 * Mean and variance of sample arrays and of repeated-execution rows.
 */

import { FloatKind } from "../types/float-kind.ts";
import { type MeanVariance, MeanVarianceState } from "./agg-state.ts";

export type { MeanVariance } from "./agg-state.ts";

/**
 * Single-pass population mean and variance.
 *
 * Computed as E[x^2] - E[x]^2, so values far from zero with a small spread
 * lose precision. An empty array gives NaN for both.
 *
 * @example
 * ```ts
 * calculateMeanAndVariance([1, 2, 3, 4, 5]); // { mean: 3, variance: 2 }
 * ```
 */
export function calculateMeanAndVariance(
	data: ArrayLike<number>,
	kind: FloatKind = FloatKind.Float64,
): MeanVariance {
	const state = new MeanVarianceState(kind);
	for (let i = 0; i < data.length; i++) {
		state.accumulate(data[i] ?? 0);
	}
	return state.result();
}

export interface MatrixMeanVariance {
	means: number[];
	variances: number[];
}

/**
 * Per-column mean and variance across rows. The column count is taken from
 * the widest row; a row shorter than that contributes nothing to the columns
 * it lacks.
 */
export function calculateMatrixMeanAndVariance(
	rows: readonly ArrayLike<number>[],
	kind: FloatKind = FloatKind.Float64,
): MatrixMeanVariance {
	const width = rows.reduce((max, row) => Math.max(max, row.length), 0);
	const states = Array.from({ length: width }, () => new MeanVarianceState(kind));

	for (const row of rows) {
		for (let column = 0; column < row.length; column++) {
			states[column]?.accumulate(row[column] ?? 0);
		}
	}

	const results = states.map((state) => state.result());
	return {
		means: results.map((r) => r.mean),
		variances: results.map((r) => r.variance),
	};
}
