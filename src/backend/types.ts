import type { ColumnSource } from "../io/csv/classifier.ts";
import type { FloatArray } from "../types/float-kind.ts";

/**
 * The numeric subsystem that owns uncertain values.
 *
 * Readers and emitters never look inside a distribution; they build one from
 * samples or from an encoded cell and ask for moments and renderings.
 *
 * @typeParam D - the distribution value type
 */
export interface DistributionBackend<D> {
	/** Fit one distribution to a population of samples (may be empty) */
	fromSamples(samples: FloatArray): D;

	/** The nth statistical moment of a distribution */
	nthMoment(value: D, n: number): number;

	/**
	 * Decode a pre-encoded uncertain value from a CSV cell. Returns undefined
	 * when the cell holds no recognizable value.
	 */
	fromUx(text: string): D | undefined;

	/** Uncertainty-aware text rendering, accepted back by fromUx */
	toUx(value: D): string;

	/** Single representative value (the mean) */
	pointValue(value: D): number;
}

/**
 * One output distribution per expected CSV column.
 */
export interface ColumnDistribution<D> {
	/** Expected header name */
	readonly name: string;
	/** "ux" when copied from a pre-encoded cell, "samples" when fitted */
	readonly source: ColumnSource;
	/** Samples that contributed; 1 for a Ux column with data, else 0 */
	readonly sampleCount: number;
	/** The distribution value */
	readonly value: D;
}
