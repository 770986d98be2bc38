import type { JsonVariable } from "../io/json.ts";
import { logger } from "../logger.ts";
import { ErrorCode, err, ok, type Result } from "../types/error.ts";
import { FloatKind } from "../types/float-kind.ts";
import type { CommonArguments } from "./args.ts";

/** One program output from a single evaluation */
export interface OutputVariable<D> {
	readonly symbol: string;
	readonly description: string;
	readonly value: D;
}

export type SelectionArguments = Pick<
	CommonArguments,
	"isOutputSelected" | "outputSelect" | "isMonteCarloMode"
>;

/**
 * Choose which outputs to emit and in which representation.
 *
 * With an output selected only that output is kept. In repeated-execution
 * mode each output's values are column `i` of the iteration rows, as plain
 * numbers; otherwise each output carries its single uncertain value.
 *
 * @param iterationRows - One row of output values per iteration; required in
 * repeated-execution mode
 */
export function selectOutputVariables<D>(
	variables: readonly OutputVariable<D>[],
	args: SelectionArguments,
	iterationRows?: readonly ArrayLike<number>[],
	kind: FloatKind = FloatKind.Float64,
): Result<JsonVariable<D>[]> {
	if (args.isOutputSelected && args.outputSelect >= variables.length) {
		const message = `The output selected (${args.outputSelect}) is out of range; there are ${variables.length} outputs.`;
		logger.error({ code: ErrorCode.InvalidArgument }, message);
		return err(ErrorCode.InvalidArgument, message);
	}

	if (args.isMonteCarloMode && iterationRows === undefined) {
		return err(
			ErrorCode.MissingArgument,
			"Repeated-execution mode needs the per-iteration output values.",
		);
	}

	const isSingle = kind === FloatKind.Float32;
	const selected: JsonVariable<D>[] = [];

	variables.forEach((variable, index) => {
		if (args.isOutputSelected && index !== args.outputSelect) return;

		const { symbol, description } = variable;
		if (iterationRows !== undefined && args.isMonteCarloMode) {
			const values = iterationRows.map((row) => row[index] ?? Number.NaN);
			selected.push({
				symbol,
				description,
				data: isSingle ? { type: "float", values } : { type: "double", values },
			});
		} else {
			const values = [variable.value];
			selected.push({
				symbol,
				description,
				data: isSingle
					? { type: "uncertainFloat", values }
					: { type: "uncertainDouble", values },
			});
		}
	});

	return ok(selected);
}
