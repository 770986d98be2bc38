/**
 * Go-style error handling for recoverable data errors.
 *
 * Readers and writers never throw on bad input. They return a Result whose
 * error side carries an ErrorCode plus a message naming the offending row or
 * column. On the happy path, error is ErrorCode.None.
 */

export enum ErrorCode {
	None = 0,

	// Buffer errors (1-99)
	BufferFull = 1,

	// Header errors (100-199)
	HeaderTooManyValues = 100,
	HeaderTooFewValues = 101,
	HeaderMismatch = 102,
	HeaderTrailingCharacters = 103,

	// Parse errors (200-299)
	InvalidNumber = 200,
	RowTooManyEntries = 201,
	RowTooFewEntries = 202,
	TooManyRows = 203,
	LineTooLong = 204,
	MalformedData = 205,
	EmptyInput = 206,

	// I/O errors (300-399)
	FileNotFound = 300,
	ReadError = 301,
	WriteError = 302,
	StdinUnsupported = 303,

	// Argument errors (400-499)
	InvalidArgument = 400,
	MissingArgument = 401,
	UnexpectedArgument = 402,
	UnknownOption = 403,
	IncompatibleModes = 404,
}

/** Human-readable defaults, used when no more specific message is given */
export const ERROR_MESSAGES: Record<ErrorCode, string> = {
	[ErrorCode.None]: "No error",
	[ErrorCode.BufferFull]: "Buffer is full",
	[ErrorCode.HeaderTooManyValues]: "The input CSV data has more than expected header values",
	[ErrorCode.HeaderTooFewValues]: "The input CSV data has less than expected header values",
	[ErrorCode.HeaderMismatch]: "Unexpected column header",
	[ErrorCode.HeaderTrailingCharacters]: "Unexpected trailing characters in column header",
	[ErrorCode.InvalidNumber]: "Invalid number format",
	[ErrorCode.RowTooManyEntries]: "The input CSV data has more than the expected entries",
	[ErrorCode.RowTooFewEntries]: "The input CSV data has less than expected entries",
	[ErrorCode.TooManyRows]: "The input CSV file has too many rows",
	[ErrorCode.LineTooLong]: "Line exceeds the maximum line length",
	[ErrorCode.MalformedData]: "Malformed data",
	[ErrorCode.EmptyInput]: "Input is empty",
	[ErrorCode.FileNotFound]: "File not found",
	[ErrorCode.ReadError]: "Read error",
	[ErrorCode.WriteError]: "Write error",
	[ErrorCode.StdinUnsupported]: "Pipeline mode not implemented",
	[ErrorCode.InvalidArgument]: "Invalid argument",
	[ErrorCode.MissingArgument]: "Option is missing mandatory argument",
	[ErrorCode.UnexpectedArgument]: "Unexpected argument",
	[ErrorCode.UnknownOption]: "Invalid option",
	[ErrorCode.IncompatibleModes]: "Incompatible output modes",
};

export type FailureCode = Exclude<ErrorCode, ErrorCode.None>;

/**
 * Result type for operations that can fail.
 * Discriminated union: check error first, then access value.
 *
 * Usage:
 *   const result = readDistributionsFromCsv(path, headers, backend);
 *   if (result.error !== ErrorCode.None) {
 *     console.error(result.message);
 *     return;
 *   }
 *   // result.value is now safely accessible
 */
export type Result<T> =
	| { readonly value: T; readonly error: ErrorCode.None }
	| {
			readonly value: undefined;
			readonly error: FailureCode;
			readonly message: string;
	  };

export type Failure = Extract<Result<unknown>, { error: FailureCode }>;

/** Create a successful result */
export function ok<T>(value: T): Result<T> {
	return { value, error: ErrorCode.None };
}

/** Create an error result */
export function err<T>(error: FailureCode, message?: string): Result<T> {
	return { value: undefined, error, message: message ?? getErrorMessage(error) };
}

/** Check if a result is successful */
export function isOk<T>(
	result: Result<T>,
): result is { value: T; error: ErrorCode.None } {
	return result.error === ErrorCode.None;
}

/** Check if a result is an error */
export function isErr<T>(result: Result<T>): result is Failure {
	return result.error !== ErrorCode.None;
}

/** Get human-readable error message */
export function getErrorMessage(code: ErrorCode): string {
	return ERROR_MESSAGES[code] ?? `Unknown error (${code})`;
}

/**
 * Unwrap a result, throwing if it's an error.
 * Use sparingly - only in tests or at application boundaries.
 */
export function unwrap<T>(result: Result<T>): T {
	if (result.error !== ErrorCode.None) {
		throw new Error(result.message);
	}
	return result.value;
}

/**
 * Unwrap a result or return a default value.
 */
export function unwrapOr<T>(result: Result<T>, defaultValue: T): T {
	if (result.error !== ErrorCode.None) {
		return defaultValue;
	}
	return result.value;
}

/**
 * Map over a successful result.
 */
export function mapResult<T, U>(
	result: Result<T>,
	fn: (value: T) => U,
): Result<U> {
	if (result.error !== ErrorCode.None) {
		return err(result.error, result.message);
	}
	return ok(fn(result.value));
}

/**
 * Chain results (flatMap).
 */
export function andThen<T, U>(
	result: Result<T>,
	fn: (value: T) => Result<U>,
): Result<U> {
	if (result.error !== ErrorCode.None) {
		return err(result.error, result.message);
	}
	return fn(result.value);
}
