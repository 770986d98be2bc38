/**
 * Command-line arguments shared by every demo program.
 *
 * Long options may be written with one dash or two ("-input" and "--input"
 * are the same), and every short alias may also be written with two dashes.
 * Short options cannot be grouped: "-To" must be given as "-T -o".
 */

import { parseArgs, type ParseArgsConfig } from "node:util";
import { z } from "zod";
import { fatal } from "../errors/fatal.ts";
import { parseIntChecked } from "../io/number.ts";
import { logger } from "../logger.ts";
import { ErrorCode, err, type FailureCode, ok, type Result } from "../types/error.ts";

/** One option a demo accepts in addition to the common ones */
export interface OptionSpec {
	/** Long name, used as "--name" */
	readonly name: string;
	/** Single-character alias, used as "-x" */
	readonly short?: string;
	/** True when the option takes a value */
	readonly hasArgument: boolean;
}

export type ExtraOptionValues = Readonly<Record<string, string | boolean>>;

export interface CommonArguments {
	readonly inputFilePath: string;
	readonly outputFilePath: string;
	readonly isWriteToFileEnabled: boolean;
	readonly isTimingEnabled: boolean;
	readonly numberOfMonteCarloIterations: number;
	readonly outputSelect: number;
	readonly isOutputSelected: boolean;
	readonly isVerbose: boolean;
	readonly isInputFromFileEnabled: boolean;
	readonly isOutputJSONMode: boolean;
	readonly isHelpEnabled: boolean;
	readonly isBenchmarkingMode: boolean;
	readonly isMonteCarloMode: boolean;
	readonly isSingleShotExecution: boolean;
	/** Values of demo-specific options that were given, by long name */
	readonly extras: ExtraOptionValues;
}

export const COMMON_OPTIONS: readonly OptionSpec[] = [
	{ name: "input", short: "i", hasArgument: true },
	{ name: "output", short: "o", hasArgument: true },
	{ name: "select-output", short: "S", hasArgument: true },
	{ name: "time", short: "T", hasArgument: false },
	{ name: "multiple-executions", short: "M", hasArgument: true },
	{ name: "verbose", short: "v", hasArgument: false },
	{ name: "json", short: "j", hasArgument: false },
	{ name: "help", short: "h", hasArgument: false },
	{ name: "benchmarking", short: "b", hasArgument: false },
];

function integerArgument(notInteger: string) {
	return z.string().transform((text, ctx) => {
		const value = parseIntChecked(text);
		if (value === undefined) {
			ctx.addIssue({ code: z.ZodIssueCode.custom, message: notInteger });
			return z.NEVER;
		}
		return value;
	});
}

const outputSelectSchema = integerArgument("The output selected must be an integer.").pipe(
	z.number().nonnegative("The output selected must be non-negative."),
);

const multipleExecutionsSchema = integerArgument(
	"The number of multiple executions must be an integer.",
).pipe(z.number().positive("The number of multiple executions must be positive."));

function fail<T>(code: FailureCode, message: string): Result<T> {
	logger.error({ code }, message);
	return err(code, message);
}

function validate<T>(schema: z.ZodType<T, z.ZodTypeDef, string>, text: string): Result<T> {
	const parsed = schema.safeParse(text);
	if (!parsed.success) {
		return fail(ErrorCode.InvalidArgument, parsed.error.issues[0]?.message ?? "Invalid argument.");
	}
	return ok(parsed.data);
}

function buildParseConfig(options: readonly OptionSpec[]): NonNullable<ParseArgsConfig["options"]> {
	const config: NonNullable<ParseArgsConfig["options"]> = {};
	const seen = new Set<string>();

	const claim = (key: string) => {
		if (seen.has(key)) {
			fatal(`Internal error: option '${key}' is declared more than once.`);
		}
		seen.add(key);
	};

	for (const option of options) {
		const type = option.hasArgument ? "string" : "boolean";
		claim(option.name);
		config[option.name] = option.short === undefined ? { type } : { type, short: option.short };
		if (option.short !== undefined) {
			claim(option.short);
			config[option.short] = { type };
		}
	}
	return config;
}

/**
 * Rewrite "-name" to "--name" for known long names.
 */
function normalizeArgv(argv: readonly string[], options: readonly OptionSpec[]): string[] {
	const longNames = new Set(options.map((option) => option.name));
	const normalized: string[] = [];

	for (let i = 0; i < argv.length; i++) {
		const arg = argv[i] ?? "";
		if (arg === "--") {
			normalized.push(...argv.slice(i));
			break;
		}

		const flag = arg.split("=")[0] ?? "";
		if (/^-[^-]/.test(flag) && flag.length > 2 && longNames.has(flag.slice(1))) {
			normalized.push(`-${arg}`);
		} else {
			normalized.push(arg);
		}
	}
	return normalized;
}

function isNodeError(error: unknown): error is Error & { code: string } {
	return error instanceof Error && "code" in error && typeof error.code === "string";
}

function parseErrorCode(error: Error & { code: string }): FailureCode {
	switch (error.code) {
		case "ERR_PARSE_ARGS_UNKNOWN_OPTION":
			return ErrorCode.UnknownOption;
		case "ERR_PARSE_ARGS_INVALID_OPTION_VALUE":
			return ErrorCode.MissingArgument;
		case "ERR_PARSE_ARGS_UNEXPECTED_POSITIONAL":
			return ErrorCode.UnexpectedArgument;
		default:
			return ErrorCode.InvalidArgument;
	}
}

/**
 * Parse the common options plus any demo-specific ones.
 *
 * Giving -M enables repeated-execution mode and timing. JSON output and
 * benchmarking mode cannot be combined.
 *
 * @example
 * ```ts
 * const args = parseCommonArgs(['-i', 'input.csv', '-M', '100']);
 * if (args.error === ErrorCode.None) {
 *   args.value.isMonteCarloMode; // true
 * }
 * ```
 */
export function parseCommonArgs(
	argv: readonly string[],
	extraOptions: readonly OptionSpec[] = [],
): Result<CommonArguments> {
	const options = [...extraOptions, ...COMMON_OPTIONS];
	const config = buildParseConfig(options);

	let values: Record<string, string | boolean | (string | boolean)[] | undefined>;
	try {
		values = parseArgs({
			args: normalizeArgv(argv, options),
			options: config,
			strict: true,
			allowPositionals: false,
		}).values;
	} catch (error) {
		if (isNodeError(error)) {
			return fail(parseErrorCode(error), error.message);
		}
		throw error;
	}

	const lookup = (option: OptionSpec): string | boolean | undefined => {
		const direct = values[option.name];
		const aliased = option.short === undefined ? undefined : values[option.short];
		const value = direct ?? aliased;
		return Array.isArray(value) ? value[value.length - 1] : value;
	};
	const stringOf = (name: string): string | undefined => {
		const option = options.find((candidate) => candidate.name === name);
		const value = option === undefined ? undefined : lookup(option);
		return typeof value === "string" ? value : undefined;
	};
	const flagOf = (name: string): boolean => {
		const option = options.find((candidate) => candidate.name === name);
		return option !== undefined && lookup(option) === true;
	};

	const inputFilePath = stringOf("input");
	const outputFilePath = stringOf("output");
	const outputSelectText = stringOf("select-output");
	const multipleExecutionsText = stringOf("multiple-executions");

	let outputSelect = 0;
	if (outputSelectText !== undefined) {
		const parsed = validate(outputSelectSchema, outputSelectText);
		if (parsed.error !== ErrorCode.None) return err(parsed.error, parsed.message);
		outputSelect = parsed.value;
	}

	let numberOfMonteCarloIterations = 1;
	if (multipleExecutionsText !== undefined) {
		const parsed = validate(multipleExecutionsSchema, multipleExecutionsText);
		if (parsed.error !== ErrorCode.None) return err(parsed.error, parsed.message);
		numberOfMonteCarloIterations = parsed.value;
	}

	const isMonteCarloMode = multipleExecutionsText !== undefined;
	const isOutputJSONMode = flagOf("json");
	const isBenchmarkingMode = flagOf("benchmarking");

	if (isOutputJSONMode && isBenchmarkingMode) {
		return fail(
			ErrorCode.IncompatibleModes,
			"Output JSON mode and benchmarking mode are not compatible. Please choose only one.",
		);
	}

	const extras: Record<string, string | boolean> = {};
	for (const option of extraOptions) {
		const value = lookup(option);
		if (value !== undefined) extras[option.name] = value;
	}

	return ok(
		Object.freeze({
			inputFilePath: inputFilePath ?? "",
			outputFilePath: outputFilePath ?? "",
			isWriteToFileEnabled: outputFilePath !== undefined,
			isTimingEnabled: flagOf("time") || isMonteCarloMode,
			numberOfMonteCarloIterations,
			outputSelect,
			isOutputSelected: outputSelectText !== undefined,
			isVerbose: flagOf("verbose"),
			isInputFromFileEnabled: inputFilePath !== undefined,
			isOutputJSONMode,
			isHelpEnabled: flagOf("help"),
			isBenchmarkingMode,
			isMonteCarloMode,
			isSingleShotExecution: !isMonteCarloMode,
			extras: Object.freeze(extras),
		}),
	);
}
