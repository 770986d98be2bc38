/**
 * Checked number parsing for CSV cells and command-line values.
 *
 * Both parsers read a number at the start of the text (after optional
 * whitespace) and ignore whatever follows it, so "1.5Ux..." parses as 1.5.
 * Text with no number at the start, or a value outside the range of the
 * target type, is rejected.
 */

import { FloatKind } from "../types/float-kind.ts";

const DECIMAL_PATTERN = /^[+-]?(?:\d+\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/;
const HEX_PATTERN = /^([+-]?)0[xX]((?:[0-9a-fA-F]+\.?[0-9a-fA-F]*|\.[0-9a-fA-F]+))(?:[pP]([+-]?\d+))?/;
const SPECIAL_PATTERN = /^([+-]?)(infinity|inf|nan)/i;
const INTEGER_PATTERN = /^[+-]?\d+/;

const SMALLEST_NORMAL: Record<FloatKind, number> = {
	[FloatKind.Float32]: 1.1754943508222875e-38,
	[FloatKind.Float64]: 2.2250738585072014e-308,
};

const INT32_MIN = -2147483648;
const INT32_MAX = 2147483647;

/** Whitespace per isspace: space, \t, \n, \v, \f, \r */
export function isSpace(char: string | undefined): boolean {
	return (
		char === " " ||
		char === "\t" ||
		char === "\n" ||
		char === "\v" ||
		char === "\f" ||
		char === "\r"
	);
}

/** Index of the first non-whitespace character at or after `start` */
export function skipSpace(text: string, start = 0): number {
	let i = start;
	while (i < text.length && isSpace(text[i])) i++;
	return i;
}

function parseHex(sign: string, mantissa: string, exponent: string | undefined): number {
	const [whole = "", fraction = ""] = mantissa.split(".");
	let value = 0;
	for (const digit of whole) {
		value = value * 16 + Number.parseInt(digit, 16);
	}
	let scale = 1 / 16;
	for (const digit of fraction) {
		value += Number.parseInt(digit, 16) * scale;
		scale /= 16;
	}
	if (exponent !== undefined) {
		value *= 2 ** Number(exponent);
	}
	return sign === "-" ? -value : value;
}

/** Scan a leading float literal. Returns the value and whether its digits were non-zero. */
function scanFloat(text: string): { value: number; nonZero: boolean } | null {
	const rest = text.slice(skipSpace(text));

	const hex = HEX_PATTERN.exec(rest);
	if (hex) {
		const mantissa = hex[2] ?? "";
		return {
			value: parseHex(hex[1] ?? "", mantissa, hex[3]),
			nonZero: /[1-9a-fA-F]/.test(mantissa),
		};
	}

	const special = SPECIAL_PATTERN.exec(rest);
	if (special) {
		const negative = special[1] === "-";
		const word = (special[2] ?? "").toLowerCase();
		if (word === "nan") {
			return { value: Number.NaN, nonZero: false };
		}
		return {
			value: negative ? Number.NEGATIVE_INFINITY : Number.POSITIVE_INFINITY,
			nonZero: false,
		};
	}

	const decimal = DECIMAL_PATTERN.exec(rest);
	if (!decimal) return null;

	const literal = decimal[0];
	const mantissa = literal.replace(/[eE].*$/, "");
	return { value: Number(literal), nonZero: /[1-9]/.test(mantissa) };
}

/**
 * Parse a floating-point value at the start of `text`, trailing characters are
 * ignored. Returns undefined when no number is found or the value overflows or
 * underflows the target kind.
 */
export function parseFloatChecked(
	text: string,
	kind: FloatKind = FloatKind.Float64,
): number | undefined {
	const scanned = scanFloat(text);
	if (scanned === null) return undefined;

	const value = kind === FloatKind.Float32 ? Math.fround(scanned.value) : scanned.value;

	if (!Number.isFinite(value) && Number.isFinite(scanned.value)) {
		return undefined;
	}
	if (!Number.isFinite(scanned.value)) {
		return value;
	}
	if (scanned.nonZero && Math.abs(value) < SMALLEST_NORMAL[kind]) {
		return undefined;
	}
	return value;
}

/**
 * Parse a 32-bit integer at the start of `text`, trailing characters are
 * ignored.
 */
export function parseIntChecked(text: string): number | undefined {
	const match = INTEGER_PATTERN.exec(text.slice(skipSpace(text)));
	if (!match) return undefined;

	const value = Number(match[0]);
	if (!Number.isSafeInteger(value) || value < INT32_MIN || value > INT32_MAX) {
		return undefined;
	}
	return value;
}
