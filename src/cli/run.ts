/**
 * The uxio program: read sample columns from CSV, fit one distribution per
 * column and emit them as CSV or JSON.
 *
 * With -M N each iteration draws one value from every column and the
 * iteration rows are written to data.out (or the file named by -D).
 *
 * Program options besides the common ones:
 *   -c, --columns <names>  comma-separated expected headers (default: the input's header row)
 *   -f, --float            read samples in single precision
 *   -D, --data-out <path>  repeated-execution output file
 */

import { EmpiricalBackend, type EmpiricalDistribution } from "../backend/empirical.ts";
import { runRepeatedExecutions } from "../bench/repeated.ts";
import { writeDistributionsToCsv } from "../io/csv/writer.ts";
import { readDistributionsFromCsv } from "../io/csv/reader.ts";
import { splitFields, splitLines } from "../io/csv/scanner.ts";
import { DATA_OUT_PATH, saveMonteCarloDataToDataDotOutFile } from "../io/data-out.ts";
import { readTextFile, STDIN_PATH, STDIN_UNSUPPORTED_MESSAGE, STDOUT_PATH } from "../io/file.ts";
import { formatExponential } from "../io/format.ts";
import { printJsonVariables } from "../io/json.ts";
import { logger } from "../logger.ts";
import { summarize } from "../stats/summary.ts";
import { ErrorCode, err, ok, type Result } from "../types/error.ts";
import { FloatKind } from "../types/float-kind.ts";
import { type CommonArguments, type OptionSpec, parseCommonArgs } from "./args.ts";
import { type OutputVariable, selectOutputVariables } from "./selection.ts";
import { printCommonUsage } from "./usage.ts";

export const PROGRAM_OPTIONS: readonly OptionSpec[] = [
	{ name: "columns", short: "c", hasArgument: true },
	{ name: "float", short: "f", hasArgument: false },
	{ name: "data-out", short: "D", hasArgument: true },
];

const JSON_DESCRIPTION = "Distributions fitted from the input CSV columns";

/** Column names from --columns, or from the input's own header row */
function resolveColumns(args: CommonArguments, path: string): Result<string[]> {
	const listed = args.extras.columns;
	if (typeof listed === "string") {
		return ok(splitFields(listed).map((name) => name.trim()).filter((name) => name !== ""));
	}
	if (path === STDIN_PATH) {
		logger.error({ code: ErrorCode.StdinUnsupported }, STDIN_UNSUPPORTED_MESSAGE);
		return err(ErrorCode.StdinUnsupported, STDIN_UNSUPPORTED_MESSAGE);
	}

	const text = readTextFile(path);
	if (text.error !== ErrorCode.None) return err(text.error, text.message);
	const lines = splitLines(text.value);
	if (lines.error !== ErrorCode.None) return err(lines.error, lines.message);

	const header = lines.value[0] ?? "";
	return ok(splitFields(header).map((name) => name.trim()).filter((name) => name !== ""));
}

function describe(column: { name: string; source: string; sampleCount: number }): string {
	return column.source === "ux"
		? `${column.name} (pre-encoded)`
		: `${column.name} (${column.sampleCount} samples)`;
}

function report(name: string, samples: ArrayLike<number>): string {
	const s = summarize(samples);
	const fields = [s.mean, s.variance, s.min, s.p05, s.median, s.p95, s.max].map((value) =>
		value === undefined ? "-" : formatExponential(value),
	);
	return `${name}: n=${s.count}, ${fields.join(", ")}`;
}

/**
 * Run the program and return its exit status.
 */
export function runCli(argv: readonly string[]): number {
	const parsed = parseCommonArgs(argv, PROGRAM_OPTIONS);
	if (parsed.error !== ErrorCode.None) {
		printCommonUsage();
		return 1;
	}
	const args = parsed.value;

	if (args.isHelpEnabled) {
		printCommonUsage();
		return 0;
	}
	if (args.isVerbose) {
		logger.level = "debug";
	}

	const kind = args.extras.float === true ? FloatKind.Float32 : FloatKind.Float64;
	const inputPath = args.isInputFromFileEnabled ? args.inputFilePath : STDIN_PATH;
	const outputPath = args.isWriteToFileEnabled ? args.outputFilePath : STDOUT_PATH;

	const columns = resolveColumns(args, inputPath);
	if (columns.error !== ErrorCode.None) return 1;

	const backend = new EmpiricalBackend();
	const start = performance.now();
	const read = readDistributionsFromCsv(inputPath, columns.value, backend, { kind });
	if (read.error !== ErrorCode.None) return 1;

	if (args.isTimingEnabled && args.isSingleShotExecution) {
		const elapsedMicroseconds = Math.trunc((performance.now() - start) * 1000);
		logger.info({ elapsedMicroseconds }, "Input read and fitted");
	}

	for (const column of read.value) {
		logger.debug({ column: column.name }, `Read ${describe(column)}`);
	}

	const variables: OutputVariable<EmpiricalDistribution>[] = read.value.map((column) => ({
		symbol: column.name,
		description: describe(column),
		value: column.value,
	}));

	let iterationRows: number[][] | undefined;
	if (args.isMonteCarloMode) {
		const run = runRepeatedExecutions(
			() => variables.map((variable) => variable.value.draw()),
			args.numberOfMonteCarloIterations,
		);
		if (run.error !== ErrorCode.None) return 1;

		iterationRows = run.value.samples;
		const dataOutPath = args.extras["data-out"];
		const saved = saveMonteCarloDataToDataDotOutFile(iterationRows, run.value.elapsedMicroseconds, {
			kind,
			path: typeof dataOutPath === "string" ? dataOutPath : DATA_OUT_PATH,
		});
		if (saved.error !== ErrorCode.None) return 1;

		if (args.isTimingEnabled) {
			logger.info(
				{ elapsedMicroseconds: run.value.elapsedMicroseconds },
				`${args.numberOfMonteCarloIterations} iterations`,
			);
		}
	}

	const selected = selectOutputVariables(variables, args, iterationRows, kind);
	if (selected.error !== ErrorCode.None) return 1;

	if (args.isBenchmarkingMode) {
		const lines = selected.value.map((variable) => {
			const samples =
				variable.data.type === "float" || variable.data.type === "double"
					? variable.data.values
					: variables.find((v) => v.symbol === variable.symbol)?.value.samples ?? [];
			return report(variable.symbol, samples);
		});
		process.stdout.write(`${lines.join("\n")}\n`);
		return 0;
	}

	if (args.isOutputJSONMode) {
		const printed = printJsonVariables(selected.value, JSON_DESCRIPTION, backend, outputPath);
		return printed.error === ErrorCode.None ? 0 : 1;
	}

	const names = selected.value.map((variable) => variable.symbol);
	const means = selected.value.map((variable) => {
		const data = variable.data;
		if (data.type === "float" || data.type === "double") {
			return summarize(data.values).mean;
		}
		return data.values[0] === undefined ? Number.NaN : backend.pointValue(data.values[0]);
	});
	const written = writeDistributionsToCsv(outputPath, means, names, kind);
	return written.error === ErrorCode.None ? 0 : 1;
}
