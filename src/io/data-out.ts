/**
 * The repeated-execution results file, "data.out" by default.
 *
 * Line 1 holds the elapsed wall time in integer microseconds. Each later line
 * holds one iteration: a single value, or a row of values joined by ", ".
 * Values are written in fixed notation with 20 fractional digits.
 */

import { logger } from "../logger.ts";
import { ErrorCode, err, ok, type Result } from "../types/error.ts";
import { FloatKind, roundToKind } from "../types/float-kind.ts";
import { OUTPUT_SEPARATOR } from "./csv/writer.ts";
import { readTextFile, writeTextOutput } from "./file.ts";
import { formatFixed } from "./format.ts";
import { parseFloatChecked } from "./number.ts";

export const DATA_OUT_PATH = "data.out";

const FRACTION_DIGITS = 20;
const ELAPSED_PATTERN = /^\d+$/;

export interface DataDotOutOptions {
	/** Output file (default: "data.out") */
	path?: string;
	/** Precision the samples were produced in (default: Float64) */
	kind?: FloatKind;
}

export interface DataDotOut {
	elapsedMicroseconds: number;
	/** One row per iteration */
	samples: number[][];
}

/** One iteration's result: a single value or a row of values */
export type IterationSamples = ArrayLike<number> | readonly ArrayLike<number>[];

function isRowList(samples: IterationSamples): samples is readonly ArrayLike<number>[] {
	return samples.length > 0 && typeof samples[0] === "object";
}

/**
 * Render samples in data.out layout.
 *
 * @example
 * ```ts
 * formatDataDotOut([0.5, 1], 42);
 * // "42\n0.50000000000000000000\n1.00000000000000000000\n"
 * ```
 */
export function formatDataDotOut(
	samples: IterationSamples,
	elapsedMicroseconds: number,
	kind: FloatKind = FloatKind.Float64,
): string {
	const format = (value: number) => formatFixed(roundToKind(value, kind), FRACTION_DIGITS);
	const lines = [BigInt(Math.max(0, Math.trunc(elapsedMicroseconds))).toString()];

	if (isRowList(samples)) {
		for (const row of samples) {
			lines.push(Array.from(row, format).join(OUTPUT_SEPARATOR));
		}
	} else {
		for (let i = 0; i < samples.length; i++) {
			lines.push(format(samples[i] ?? 0));
		}
	}

	return `${lines.join("\n")}\n`;
}

/**
 * Write repeated-execution samples and their elapsed time to data.out.
 */
export function saveMonteCarloDataToDataDotOutFile(
	samples: IterationSamples,
	elapsedMicroseconds: number,
	options?: DataDotOutOptions,
): Result<void> {
	const path = options?.path ?? DATA_OUT_PATH;
	const result = writeTextOutput(
		path,
		formatDataDotOut(samples, elapsedMicroseconds, options?.kind),
	);
	if (result.error === ErrorCode.None) {
		logger.debug({ path, iterations: samples.length }, "Wrote repeated-execution samples");
	}
	return result;
}

/**
 * Parse data.out text. Blank lines are skipped.
 */
export function parseDataDotOut(text: string): Result<DataDotOut> {
	const lines = text.split("\n").map((line) => line.trim());
	const [first, ...rest] = lines;

	if (first === undefined || !ELAPSED_PATTERN.test(first)) {
		return err(
			ErrorCode.MalformedData,
			`The first line of data.out must be the elapsed time in microseconds (was '${first ?? ""}').`,
		);
	}
	const elapsedMicroseconds = Number(first);

	const samples: number[][] = [];
	for (let i = 0; i < rest.length; i++) {
		const line = rest[i] ?? "";
		if (line === "") continue;

		const row: number[] = [];
		for (const cell of line.split(",")) {
			const value = parseFloatChecked(cell.trim());
			if (value === undefined) {
				return err(
					ErrorCode.MalformedData,
					`Line ${i + 2} of data.out holds an invalid value (was '${cell.trim()}').`,
				);
			}
			row.push(value);
		}
		samples.push(row);
	}

	return ok({ elapsedMicroseconds, samples });
}

/**
 * Read and parse a data.out file.
 */
export function readDataDotOutFile(path: string = DATA_OUT_PATH): Result<DataDotOut> {
	const text = readTextFile(path);
	if (text.error !== ErrorCode.None) {
		return err(text.error, text.message);
	}
	return parseDataDotOut(text.value);
}
