/**
 * Header row validation against an expected, ordered list of column names.
 *
 * Each header cell must start with its expected name (case-sensitive) and may
 * be followed by whitespace only. Column indices in messages are 0-based.
 */

import { ErrorCode, err, ok, type Result } from "../../types/error.ts";
import { isSpace } from "../number.ts";
import { DEFAULT_DELIMITER, FieldScanner } from "./scanner.ts";

function hasOnlySpaceFrom(text: string, start: number): boolean {
	for (let i = start; i < text.length; i++) {
		if (!isSpace(text[i])) return false;
	}
	return true;
}

/**
 * Check a single header cell. `cell` has already had its leading whitespace
 * skipped.
 */
export function validateHeaderCell(
	cell: string,
	expected: string,
	column: number,
): Result<void> {
	const shown = cell.trimEnd();

	if (!cell.startsWith(expected)) {
		return err(
			ErrorCode.HeaderMismatch,
			`Column ${column} of the input CSV should have header '${expected}' but has header '${shown}'`,
		);
	}

	if (!hasOnlySpaceFrom(cell, expected.length)) {
		return err(
			ErrorCode.HeaderTrailingCharacters,
			`Column ${column} of the input CSV should have header '${expected}' but has header '${shown}' (trailing characters)`,
		);
	}

	return ok(undefined);
}

/**
 * Validate a raw header line. On success returns the header cells, leading
 * whitespace skipped, in column order.
 */
export function validateHeader(
	line: string,
	expectedHeaders: readonly string[],
	delimiter: string = DEFAULT_DELIMITER,
): Result<string[]> {
	const scanner = new FieldScanner(line, delimiter);
	const cells: string[] = [];

	for (let cell = scanner.next(); cell !== undefined; cell = scanner.next()) {
		const column = cells.length;
		const expected = expectedHeaders[column];
		if (expected === undefined) {
			return err(ErrorCode.HeaderTooManyValues);
		}

		const checked = validateHeaderCell(cell, expected, column);
		if (checked.error !== ErrorCode.None) {
			return err(checked.error, checked.message);
		}

		cells.push(cell);
	}

	if (cells.length !== expectedHeaders.length) {
		return err(ErrorCode.HeaderTooFewValues);
	}

	return ok(cells);
}
