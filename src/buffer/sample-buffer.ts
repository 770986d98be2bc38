/**
 * Fixed-capacity sample buffer for one numeric CSV column.
 *
 * A SampleBuffer wraps a Float32Array or Float64Array and provides:
 * - Fixed capacity with bounds checking
 * - Skipped slots that are zeroed but not counted
 * - A view over the counted samples for fitting
 */

import { trackAllocation } from "../memory/allocation-tracker.ts";
import { ErrorCode } from "../types/error.ts";
import {
	allocateFloatArray,
	FLOAT_KIND_SIZES,
	type FloatArrayFor,
	type FloatKind,
	roundToKind,
} from "../types/float-kind.ts";

export class SampleBuffer<K extends FloatKind = FloatKind> {
	/** The underlying typed array */
	readonly data: FloatArrayFor<K>;

	/** The element kind */
	readonly kind: K;

	/** Maximum number of samples */
	readonly capacity: number;

	/** Current number of counted samples */
	private _length: number;

	constructor(kind: K, capacity: number) {
		this.kind = kind;
		this.capacity = capacity;
		this._length = 0;
		this.data = allocateFloatArray(kind, capacity);
	}

	/** Current number of counted samples */
	get length(): number {
		return this._length;
	}

	/** Append a sample, return success or BufferFull error */
	append(value: number): ErrorCode {
		if (this._length >= this.capacity) {
			return ErrorCode.BufferFull;
		}
		this.data[this._length] = roundToKind(value, this.kind);
		this._length++;
		return ErrorCode.None;
	}

	/**
	 * Zero the next slot without counting it. The slot is overwritten by the
	 * next append.
	 */
	skip(): ErrorCode {
		if (this._length >= this.capacity) {
			return ErrorCode.BufferFull;
		}
		this.data[this._length] = 0;
		return ErrorCode.None;
	}

	/** Create a view over current counted samples */
	view(): FloatArrayFor<K> {
		return this.data.subarray(0, this._length) as FloatArrayFor<K>;
	}
}

/**
 * Create a sample buffer and record it against the owning read task.
 */
export function createSampleBuffer<K extends FloatKind>(
	kind: K,
	capacity: number,
	taskId: string,
): SampleBuffer<K> {
	const buffer = new SampleBuffer(kind, capacity);
	trackAllocation(taskId, capacity * FLOAT_KIND_SIZES[kind]);
	return buffer;
}
