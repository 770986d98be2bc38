/**
 * Line and field scanning for the minimal unquoted CSV dialect.
 *
 * Fields are separated by a single-character delimiter with no quoting or
 * escaping. Runs of delimiters collapse, so empty fields are never produced.
 * Each field has its leading whitespace skipped; trailing text (including
 * the line terminator) is kept for the caller to inspect.
 */

import { getConfig } from "../../core/config.ts";
import { ErrorCode, err, ok, type Result } from "../../types/error.ts";
import { skipSpace } from "../number.ts";

/** Default field delimiter */
export const DEFAULT_DELIMITER = ",";

/**
 * Streaming field scanner over one line.
 *
 * @example
 * ```ts
 * const scanner = new FieldScanner("  1.5, 2.5\n");
 * scanner.next(); // "1.5"
 * scanner.next(); // "2.5\n"
 * scanner.next(); // undefined
 * ```
 */
export class FieldScanner {
	private readonly line: string;
	private readonly delimiter: string;
	private position = 0;

	constructor(line: string, delimiter: string = DEFAULT_DELIMITER) {
		this.line = line;
		this.delimiter = delimiter;
	}

	/** Next field with leading whitespace skipped, or undefined at end of line */
	next(): string | undefined {
		const { line, delimiter } = this;
		let start = this.position;

		while (start < line.length && line[start] === delimiter) start++;
		if (start >= line.length) {
			this.position = line.length;
			return undefined;
		}

		let end = line.indexOf(delimiter, start);
		if (end === -1) end = line.length;
		this.position = end;

		return line.slice(skipSpace(line, start), end);
	}
}

/**
 * Split a line into leading-trimmed fields.
 */
export function splitFields(line: string, delimiter: string = DEFAULT_DELIMITER): string[] {
	const scanner = new FieldScanner(line, delimiter);
	const fields: string[] = [];
	for (let field = scanner.next(); field !== undefined; field = scanner.next()) {
		fields.push(field);
	}
	return fields;
}

/**
 * Split text into lines, each keeping its "\n" terminator. A final line
 * without a terminator is kept as is; there is no empty line after a final
 * newline.
 */
export function splitLines(text: string): Result<string[]> {
	const maxChars = getConfig().maxCharsPerLine;
	const lines: string[] = [];

	let start = 0;
	while (start < text.length) {
		const newline = text.indexOf("\n", start);
		const end = newline === -1 ? text.length : newline + 1;
		const contentLength = newline === -1 ? end - start : newline - start;

		if (contentLength > maxChars) {
			return err(
				ErrorCode.LineTooLong,
				`Line ${lines.length} of the input CSV is longer than ${maxChars} characters.`,
			);
		}

		lines.push(text.slice(start, end));
		start = end;
	}

	return ok(lines);
}
