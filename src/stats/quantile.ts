/**
 * Empirical quantile of a sample array.
 *
 * Sorts a copy ascending and returns the element at `trunc(p * N)`. No
 * interpolation. Returns undefined when that index falls outside the array,
 * which includes `p = 1` and an empty input.
 *
 * @example
 * ```ts
 * quantile([50, 10, 40, 20, 30], 0.4); // 30
 * ```
 */
export function quantile(data: ArrayLike<number>, percentage: number): number | undefined {
	const sorted = Array.from(data).sort((a, b) => Math.sign(a - b));
	const index = Math.trunc(percentage * sorted.length);
	if (!(index >= 0 && index < sorted.length)) {
		return undefined;
	}
	return sorted[index];
}
