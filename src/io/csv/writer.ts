/**
 * CSV emission of named output values: one header line of names, one data
 * line of values in printf "%e" notation, both comma-space separated.
 */

import { logger } from "../../logger.ts";
import { ErrorCode, err, ok, type Result } from "../../types/error.ts";
import { FloatKind, roundToKind } from "../../types/float-kind.ts";
import { formatExponential } from "../format.ts";
import { writeTextOutput } from "../file.ts";

/** Separator between header names and between values */
export const OUTPUT_SEPARATOR = ", ";

/**
 * Render names and values as two CSV lines.
 *
 * @example
 * ```ts
 * formatDistributionsCsv([1.5, -2], ['x', 'y']);
 * // "x, y\n1.500000e+00, -2.000000e+00\n"
 * ```
 */
export function formatDistributionsCsv(
	values: ArrayLike<number>,
	names: readonly string[],
	kind: FloatKind = FloatKind.Float64,
): Result<string> {
	if (values.length !== names.length) {
		const message = `Expected ${names.length} output values for ${names.length} names, got ${values.length}.`;
		logger.error({ code: ErrorCode.InvalidArgument }, message);
		return err(ErrorCode.InvalidArgument, message);
	}

	const formatted = Array.from(values, (value) =>
		formatExponential(roundToKind(value, kind)),
	);

	return ok(
		`${names.join(OUTPUT_SEPARATOR)}\n${formatted.join(OUTPUT_SEPARATOR)}\n`,
	);
}

/**
 * Write names and values to a CSV file, or to stdout when `path` is "stdout".
 */
export function writeDistributionsToCsv(
	path: string,
	values: ArrayLike<number>,
	names: readonly string[],
	kind: FloatKind = FloatKind.Float64,
): Result<void> {
	const text = formatDistributionsCsv(values, names, kind);
	if (text.error !== ErrorCode.None) {
		return err(text.error, text.message);
	}
	return writeTextOutput(path, text.value);
}
