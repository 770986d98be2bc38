/**
 * uxio - CSV and JSON I/O for uncertain-valued variables.
 *
 * Reads sample columns or pre-encoded uncertain values from CSV into
 * distributions, summarizes sample arrays, and writes results as CSV, as
 * JSON for plotting front ends, or as a repeated-execution data.out file.
 *
 * @example
 * ```ts
 * import { EmpiricalBackend, ErrorCode, readDistributionsFromCsv } from 'uxio';
 *
 * const result = readDistributionsFromCsv('input.csv', ['R1', 'R2'], new EmpiricalBackend());
 * if (result.error === ErrorCode.None) {
 *   for (const column of result.value) console.log(column.name, column.value.mean);
 * }
 * ```
 */

// Errors and results
export {
	andThen,
	ERROR_MESSAGES,
	ErrorCode,
	err,
	type Failure,
	type FailureCode,
	getErrorMessage,
	isErr,
	isOk,
	mapResult,
	ok,
	type Result,
	unwrap,
	unwrapOr,
} from "./types/error.ts";
export { assertNever, fatal, InvariantError } from "./errors/index.ts";

// Element types
export {
	allocateFloatArray,
	type FloatArray,
	type FloatArrayFor,
	FloatKind,
	floatKindName,
	roundToKind,
} from "./types/float-kind.ts";

// Configuration and logging
export {
	configure,
	getConfig,
	getDefaultConfig,
	resetConfig,
	type UxioConfig,
} from "./core/config.ts";
export { DEFAULT_LOG_LEVEL, LOG_LEVELS, type LogLevel, logger } from "./logger.ts";
export { getMemoryStats, type MemoryStats, type TaskAllocation } from "./memory/allocation-tracker.ts";

// Distribution backends
export type { ColumnDistribution, DistributionBackend } from "./backend/types.ts";
export { EmpiricalBackend, EmpiricalDistribution } from "./backend/empirical.ts";

// CSV
export {
	isIgnoredSample,
	parseDistributionsFromCsv,
	type ReadDistributionsOptions,
	readDistributionsFromCsv,
} from "./io/csv/reader.ts";
export { formatDistributionsCsv, OUTPUT_SEPARATOR, writeDistributionsToCsv } from "./io/csv/writer.ts";
export { classifyColumn, classifyColumns, type ColumnSource, UX_MARKER } from "./io/csv/classifier.ts";
export { DEFAULT_DELIMITER, FieldScanner, splitFields, splitLines } from "./io/csv/scanner.ts";
export { validateHeader, validateHeaderCell } from "./io/csv/header.ts";

// Number parsing and formatting
export { parseFloatChecked, parseIntChecked } from "./io/number.ts";
export { formatExponential, formatFixed } from "./io/format.ts";

// JSON
export {
	buildJsonDocument,
	formatJsonDocument,
	type JsonDocument,
	type JsonPlot,
	type JsonValues,
	type JsonValueType,
	type JsonVariable,
	printJsonVariables,
} from "./io/json.ts";

// Repeated execution
export {
	DATA_OUT_PATH,
	type DataDotOut,
	type DataDotOutOptions,
	formatDataDotOut,
	type IterationSamples,
	parseDataDotOut,
	readDataDotOutFile,
	saveMonteCarloDataToDataDotOutFile,
} from "./io/data-out.ts";
export { type RepeatedExecution, runRepeatedExecutions } from "./bench/repeated.ts";

// Statistics
export {
	calculateMatrixMeanAndVariance,
	calculateMeanAndVariance,
	type MatrixMeanVariance,
	type MeanVariance,
	quantile,
	type SampleSummary,
	summarize,
} from "./stats/index.ts";

// Command line
export {
	COMMON_OPTIONS,
	type CommonArguments,
	type ExtraOptionValues,
	type OptionSpec,
	parseCommonArgs,
} from "./cli/args.ts";
export { formatCommonUsage, printCommonUsage } from "./cli/usage.ts";
export { type OutputVariable, type SelectionArguments, selectOutputVariables } from "./cli/selection.ts";
export { STDIN_PATH, STDOUT_PATH } from "./io/file.ts";
