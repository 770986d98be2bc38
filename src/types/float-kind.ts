/**
 * Floating-point element types for samples and distributions.
 *
 * Every reader, writer and statistic is written once and takes the element
 * type as a parameter:
 * - Float32 stores samples in a Float32Array and rounds through Math.fround
 * - Float64 stores samples in a Float64Array
 */

export enum FloatKind {
	Float32 = 8,
	Float64 = 9,
}

/** Byte sizes for each FloatKind */
export const FLOAT_KIND_SIZES: Record<FloatKind, number> = {
	[FloatKind.Float32]: 4,
	[FloatKind.Float64]: 8,
};

/** Get TypedArray type for a FloatKind */
export type FloatArrayFor<K extends FloatKind> = K extends FloatKind.Float32
	? Float32Array
	: Float64Array;

export type FloatArray = Float32Array | Float64Array;

/** Display name used in messages and JSON type tags */
export function floatKindName(kind: FloatKind): "float" | "double" {
	return kind === FloatKind.Float32 ? "float" : "double";
}

/** Round a JS number to the precision of the given kind */
export function roundToKind(value: number, kind: FloatKind): number {
	return kind === FloatKind.Float32 ? Math.fround(value) : value;
}

/** Allocate a zero-filled array of the given kind */
export function allocateFloatArray<K extends FloatKind>(
	kind: K,
	length: number,
): FloatArrayFor<K> {
	if (kind === FloatKind.Float32) {
		return new Float32Array(length) as FloatArrayFor<K>;
	}
	return new Float64Array(length) as FloatArrayFor<K>;
}
