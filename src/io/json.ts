/**
 * JSON emission of output variables for plotting front ends.
 *
 * The document shape is a stable external contract:
 *
 * {
 *   "description": "...",
 *   "plots": [
 *     { "variableID", "variableSymbol", "variableDescription", "values", "stdValues" }
 *   ]
 * }
 *
 * variableID repeats variableSymbol for older consumers and is always emitted.
 */

import type { DistributionBackend } from "../backend/types.ts";
import { assertNever } from "../errors/invariant-error.ts";
import type { Result } from "../types/error.ts";
import { FloatKind, roundToKind } from "../types/float-kind.ts";
import { formatFixed } from "./format.ts";
import { STDOUT_PATH, writeTextOutput } from "./file.ts";

/**
 * Values of one output variable, tagged by representation:
 * - "float" / "double": plain numbers, one per evaluation or per iteration
 * - "uncertainFloat" / "uncertainDouble": distributions from a backend
 */
export type JsonValues<D> =
	| { readonly type: "float"; readonly values: ArrayLike<number> }
	| { readonly type: "double"; readonly values: ArrayLike<number> }
	| { readonly type: "uncertainFloat"; readonly values: readonly D[] }
	| { readonly type: "uncertainDouble"; readonly values: readonly D[] };

export type JsonValueType = JsonValues<unknown>["type"];

export interface JsonVariable<D> {
	/** Short symbol, e.g. "R_total" */
	readonly symbol: string;
	/** Human-readable description */
	readonly description: string;
	readonly data: JsonValues<D>;
}

export interface JsonPlot {
	variableID: string;
	variableSymbol: string;
	variableDescription: string;
	values: string[];
	stdValues: number[];
}

export interface JsonDocument {
	description: string;
	plots: JsonPlot[];
}

function renderValues<D>(
	data: JsonValues<D>,
	backend: DistributionBackend<D>,
): Pick<JsonPlot, "values" | "stdValues"> {
	switch (data.type) {
		case "float":
		case "double": {
			const kind = data.type === "float" ? FloatKind.Float32 : FloatKind.Float64;
			const values = Array.from(data.values, (value) =>
				formatFixed(roundToKind(value, kind)),
			);
			return { values, stdValues: values.map(() => 0.0) };
		}
		case "uncertainFloat":
		case "uncertainDouble": {
			const kind = data.type === "uncertainFloat" ? FloatKind.Float32 : FloatKind.Float64;
			return {
				values: data.values.map((value) => backend.toUx(value)),
				stdValues: data.values.map((value) =>
					roundToKind(backend.nthMoment(value, 2), kind),
				),
			};
		}
		default:
			return assertNever(data, "JSON value type");
	}
}

/**
 * Build the JSON document for a set of output variables.
 */
export function buildJsonDocument<D>(
	variables: readonly JsonVariable<D>[],
	description: string,
	backend: DistributionBackend<D>,
): JsonDocument {
	return {
		description,
		plots: variables.map((variable) => ({
			variableID: variable.symbol,
			variableSymbol: variable.symbol,
			variableDescription: variable.description,
			...renderValues(variable.data, backend),
		})),
	};
}

/** Render a document as tab-indented JSON with a trailing newline */
export function formatJsonDocument(document: JsonDocument): string {
	return `${JSON.stringify(document, null, "\t")}\n`;
}

/**
 * Print output variables as JSON, to stdout by default.
 */
export function printJsonVariables<D>(
	variables: readonly JsonVariable<D>[],
	description: string,
	backend: DistributionBackend<D>,
	path: string = STDOUT_PATH,
): Result<void> {
	return writeTextOutput(
		path,
		formatJsonDocument(buildJsonDocument(variables, description, backend)),
	);
}
