/**
 * Streaming accumulators for sample statistics.
 *
 * Each state takes values one at a time and produces its result on demand,
 * so a column of repeated-execution rows can be reduced without copying it.
 */

import { FloatKind, roundToKind } from "../types/float-kind.ts";

/** Accumulator over a stream of samples */
export interface AggState<R> {
	/** Reset state for a new column */
	reset(): void;

	/** Accumulate one sample */
	accumulate(value: number): void;

	/** Get the current result */
	result(): R;
}

export interface MeanVariance {
	mean: number;
	variance: number;
}

/**
 * Population mean and variance from a running sum and sum of squares.
 * With a Float32 kind every intermediate is rounded to single precision.
 * No samples gives NaN for both.
 */
export class MeanVarianceState implements AggState<MeanVariance> {
	private sum = 0;
	private sumOfSquares = 0;
	private count = 0;

	constructor(readonly kind: FloatKind = FloatKind.Float64) {}

	reset(): void {
		this.sum = 0;
		this.sumOfSquares = 0;
		this.count = 0;
	}

	accumulate(value: number): void {
		const x = roundToKind(value, this.kind);
		this.sum = roundToKind(this.sum + x, this.kind);
		this.sumOfSquares = roundToKind(this.sumOfSquares + roundToKind(x * x, this.kind), this.kind);
		this.count++;
	}

	result(): MeanVariance {
		const n = this.count;
		const mean = roundToKind(this.sum / n, this.kind);
		const meanOfSquares = roundToKind(this.sumOfSquares / n, this.kind);
		const variance = roundToKind(meanOfSquares - roundToKind(mean * mean, this.kind), this.kind);
		return { mean, variance };
	}
}

/** Minimum; undefined until a value arrives */
export class MinState implements AggState<number | undefined> {
	private min: number | undefined = undefined;

	reset(): void {
		this.min = undefined;
	}

	accumulate(value: number): void {
		if (this.min === undefined || value < this.min) {
			this.min = value;
		}
	}

	result(): number | undefined {
		return this.min;
	}
}

/** Maximum; undefined until a value arrives */
export class MaxState implements AggState<number | undefined> {
	private max: number | undefined = undefined;

	reset(): void {
		this.max = undefined;
	}

	accumulate(value: number): void {
		if (this.max === undefined || value > this.max) {
			this.max = value;
		}
	}

	result(): number | undefined {
		return this.max;
	}
}
