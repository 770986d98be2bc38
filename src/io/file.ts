/**
 * Whole-file text input and output by name.
 *
 * "stdout" names the process stdout for writes. "stdin" is recognised so
 * readers can reject it; it is never opened here.
 */

import { readFileSync, writeFileSync } from "node:fs";
import { logger } from "../logger.ts";
import { ErrorCode, err, type FailureCode, ok, type Result } from "../types/error.ts";

/** Name that selects standard input, which reads do not support */
export const STDIN_PATH = "stdin";

export const STDIN_UNSUPPORTED_MESSAGE =
	"Pipeline mode not implemented. Please use the '-i' command-line argument option.";

/** Name that selects the process stdout instead of a file */
export const STDOUT_PATH = "stdout";

function fail<T>(code: FailureCode, message: string, path: string, reason?: string): Result<T> {
	logger.error({ code, path, reason }, message);
	return err(code, message);
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && "code" in error;
}

/**
 * Read a whole UTF-8 file, mapping a missing file to FileNotFound.
 */
export function readTextFile(path: string): Result<string> {
	try {
		return ok(readFileSync(path, "utf8"));
	} catch (error) {
		if (isErrnoException(error) && (error.code === "ENOENT" || error.code === "EISDIR")) {
			return fail(ErrorCode.FileNotFound, `Cannot open the file ${path}.`, path);
		}
		const reason = error instanceof Error ? error.message : String(error);
		return fail(ErrorCode.ReadError, `Cannot read the file ${path}.`, path, reason);
	}
}

/**
 * Write `text` to `path`. "stdout" writes to the process stdout, which is
 * never opened or closed here.
 */
export function writeTextOutput(path: string, text: string): Result<void> {
	if (path === STDOUT_PATH) {
		process.stdout.write(text);
		return ok(undefined);
	}

	try {
		writeFileSync(path, text, "utf8");
		return ok(undefined);
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error);
		return fail(ErrorCode.WriteError, `Cannot open the file ${path}.`, path, reason);
	}
}
