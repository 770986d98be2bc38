/**
 * Distribution ingestion from CSV.
 *
 * Reads a header row and up to `maxSamples` data rows. Each expected column
 * becomes one distribution: either the single pre-encoded value of its first
 * data cell, or a fit over every numeric sample in the column. The read is
 * all-or-nothing; on any error no distributions are returned.
 */

import type { ColumnDistribution, DistributionBackend } from "../../backend/types.ts";
import { createSampleBuffer, type SampleBuffer } from "../../buffer/sample-buffer.ts";
import { getConfig } from "../../core/config.ts";
import { logger } from "../../logger.ts";
import { generateTaskId, releaseAllocation } from "../../memory/allocation-tracker.ts";
import {
	ErrorCode,
	err,
	type FailureCode,
	ok,
	type Result,
} from "../../types/error.ts";
import { allocateFloatArray, FloatKind } from "../../types/float-kind.ts";
import { readTextFile, STDIN_PATH, STDIN_UNSUPPORTED_MESSAGE } from "../file.ts";
import { isSpace, parseFloatChecked } from "../number.ts";
import { classifyColumns, type ColumnSource } from "./classifier.ts";
import { validateHeader } from "./header.ts";
import { DEFAULT_DELIMITER, FieldScanner, splitFields, splitLines } from "./scanner.ts";

/** Distribution read options */
export interface ReadDistributionsOptions {
	/** Element type of numeric samples (default: Float64) */
	kind?: FloatKind;
	/** Field delimiter (default: ",") */
	delimiter?: string;
}

/** Per-column state for the duration of one read */
interface ColumnState<D> {
	samples: SampleBuffer;
	uxValue: D | undefined;
}

type ReadResult<D> = Result<ColumnDistribution<D>[]>;

function fail<T>(
	code: FailureCode,
	message: string,
	context: Record<string, unknown> = {},
): Result<T> {
	logger.error({ code, ...context }, message);
	return err(code, message);
}

/**
 * True for the skip marker: a "-" followed by nothing but whitespace.
 */
export function isIgnoredSample(cell: string): boolean {
	if (cell[0] !== "-") return false;
	for (let i = 1; i < cell.length; i++) {
		if (!isSpace(cell[i])) return false;
	}
	return true;
}

/**
 * Parse distributions from CSV text.
 *
 * @param text - Full CSV text, header row first
 * @param expectedHeaders - Column names, in order; one distribution per name
 * @param backend - Builds and decodes distribution values
 *
 * @example
 * ```ts
 * const result = parseDistributionsFromCsv(
 *   'R1, R2Ux\n10.0, 1.5Ux...\n11.0, -\n',
 *   ['R1', 'R2Ux'],
 *   new EmpiricalBackend(),
 * );
 * if (result.error === ErrorCode.None) {
 *   for (const column of result.value) console.log(column.name, column.source);
 * }
 * ```
 */
export function parseDistributionsFromCsv<D>(
	text: string,
	expectedHeaders: readonly string[],
	backend: DistributionBackend<D>,
	options?: ReadDistributionsOptions,
): ReadResult<D> {
	if (expectedHeaders.length === 0) {
		return ok([]);
	}

	const taskId = generateTaskId("csv");
	try {
		return ingest(text, expectedHeaders, backend, options, taskId);
	} finally {
		releaseAllocation(taskId);
	}
}

/**
 * Read distributions from a CSV file. Synchronous.
 *
 * A path of "stdin" is rejected; only named files are supported.
 */
export function readDistributionsFromCsv<D>(
	path: string,
	expectedHeaders: readonly string[],
	backend: DistributionBackend<D>,
	options?: ReadDistributionsOptions,
): ReadResult<D> {
	if (expectedHeaders.length === 0) {
		return ok([]);
	}

	if (path === STDIN_PATH) {
		return fail(ErrorCode.StdinUnsupported, STDIN_UNSUPPORTED_MESSAGE);
	}

	const text = readTextFile(path);
	if (text.error !== ErrorCode.None) {
		return err(text.error, text.message);
	}

	return parseDistributionsFromCsv(text.value, expectedHeaders, backend, options);
}

function ingest<D>(
	text: string,
	expectedHeaders: readonly string[],
	backend: DistributionBackend<D>,
	options: ReadDistributionsOptions | undefined,
	taskId: string,
): ReadResult<D> {
	const kind = options?.kind ?? FloatKind.Float64;
	const delimiter = options?.delimiter ?? DEFAULT_DELIMITER;
	const maxSamples = getConfig().maxSamples;
	const columnCount = expectedHeaders.length;

	const columns: ColumnState<D>[] = expectedHeaders.map(() => ({
		samples: createSampleBuffer(kind, maxSamples, taskId),
		uxValue: undefined,
	}));

	const lines = splitLines(text);
	if (lines.error !== ErrorCode.None) {
		return fail(lines.error, lines.message);
	}

	const [headerLine, ...dataLines] = lines.value;
	if (headerLine === undefined) {
		return fail(ErrorCode.EmptyInput, "The input CSV data is empty (no header row).");
	}

	const header = validateHeader(headerLine, expectedHeaders, delimiter);
	if (header.error !== ErrorCode.None) {
		return fail(header.error, header.message);
	}
	const headerCells = header.value;

	const firstRow = dataLines[0];
	const sources = classifyColumns(
		headerCells,
		firstRow === undefined ? [] : splitFields(firstRow, delimiter),
	);

	for (let row = 0; row < dataLines.length; row++) {
		if (row >= maxSamples) {
			return fail(
				ErrorCode.TooManyRows,
				`The input CSV file has too many rows (the maximum is ${maxSamples}).`,
				{ row },
			);
		}

		const scanner = new FieldScanner(dataLines[row] ?? "", delimiter);
		let column = 0;

		for (let cell = scanner.next(); cell !== undefined; cell = scanner.next()) {
			const state = columns[column];
			if (state === undefined) {
				return fail(
					ErrorCode.RowTooManyEntries,
					`The input CSV data has more than the expected entries at data row ${row}.`,
					{ row },
				);
			}

			if (sources[column] === "ux") {
				if (row === 0) {
					const decoded = backend.fromUx(cell);
					if (decoded === undefined) {
						return fail(
							ErrorCode.InvalidNumber,
							`The input CSV data at row ${row} and column ${column} is not a valid Ux value (was '${cell.trimEnd()}').`,
							{ row, column },
						);
					}
					state.uxValue = decoded;
				}
			} else if (isIgnoredSample(cell)) {
				state.samples.skip();
			} else {
				const parsed = parseFloatChecked(cell, kind);
				if (parsed === undefined) {
					return fail(
						ErrorCode.InvalidNumber,
						`The input CSV data at row ${row} and column ${column} is not a valid number (was '${cell.trimEnd()}').`,
						{ row, column },
					);
				}
				if (state.samples.append(parsed) !== ErrorCode.None) {
					return fail(
						ErrorCode.TooManyRows,
						`The input CSV file has too many rows (the maximum is ${maxSamples}).`,
						{ row },
					);
				}
			}

			column++;
		}

		if (column !== columnCount) {
			return fail(
				ErrorCode.RowTooFewEntries,
				`The input CSV data has less than expected entries at data row ${row}.`,
				{ row },
			);
		}
	}

	logger.debug(
		{ rows: dataLines.length, columns: columnCount },
		"CSV rows accepted, building distributions",
	);

	return ok(buildDistributions(expectedHeaders, sources, columns, backend, kind));
}

/**
 * Turn accumulated column state into distributions. Runs once, after every
 * row has been validated.
 */
function buildDistributions<D>(
	expectedHeaders: readonly string[],
	sources: readonly ColumnSource[],
	columns: readonly ColumnState<D>[],
	backend: DistributionBackend<D>,
	kind: FloatKind,
): ColumnDistribution<D>[] {
	return columns.map((state, column) => {
		const name = expectedHeaders[column] ?? "";
		const source = sources[column] ?? "samples";

		if (source === "ux") {
			return state.uxValue === undefined
				? { name, source, sampleCount: 0, value: backend.fromSamples(allocateFloatArray(kind, 0)) }
				: { name, source, sampleCount: 1, value: state.uxValue };
		}

		return {
			name,
			source,
			sampleCount: state.samples.length,
			value: backend.fromSamples(state.samples.view().slice()),
		};
	});
}
