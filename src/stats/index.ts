export { type AggState, MaxState, type MeanVariance, MeanVarianceState, MinState } from "./agg-state.ts";
export {
	calculateMatrixMeanAndVariance,
	calculateMeanAndVariance,
	type MatrixMeanVariance,
} from "./moments.ts";
export { quantile } from "./quantile.ts";
export { type SampleSummary, summarize } from "./summary.ts";
