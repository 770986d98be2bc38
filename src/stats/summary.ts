import { MaxState, MeanVarianceState, MinState } from "./agg-state.ts";
import { quantile } from "./quantile.ts";

export interface SampleSummary {
	count: number;
	mean: number;
	variance: number;
	min: number | undefined;
	max: number | undefined;
	median: number | undefined;
	p05: number | undefined;
	p95: number | undefined;
}

/**
 * Descriptive statistics of a sample array in double precision.
 */
export function summarize(data: ArrayLike<number>): SampleSummary {
	const moments = new MeanVarianceState();
	const min = new MinState();
	const max = new MaxState();

	for (let i = 0; i < data.length; i++) {
		const value = data[i] ?? 0;
		moments.accumulate(value);
		min.accumulate(value);
		max.accumulate(value);
	}

	const { mean, variance } = moments.result();
	return {
		count: data.length,
		mean,
		variance,
		min: min.result(),
		max: max.result(),
		median: quantile(data, 0.5),
		p05: quantile(data, 0.05),
		p95: quantile(data, 0.95),
	};
}
