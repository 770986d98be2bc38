/**
 * printf-compatible number rendering for "%e" and "%f".
 *
 * Digits are produced from the exact binary value of the double and rounded
 * half-to-even, which is what glibc does. Non-finite values print as "inf",
 * "-inf" and "nan".
 */

const TEN = 10n;

/** Split a finite, non-negative double into mantissa * 2^exponent */
function decompose(abs: number): { mantissa: bigint; exponent: number } {
	const view = new DataView(new ArrayBuffer(8));
	view.setFloat64(0, abs);
	const high = view.getUint32(0);
	const low = view.getUint32(4);

	const biased = (high >>> 20) & 0x7ff;
	const fractionHigh = BigInt(high & 0xfffff);
	const fraction = (fractionHigh << 32n) | BigInt(low);

	if (biased === 0) {
		return { mantissa: fraction, exponent: -1074 };
	}
	return { mantissa: fraction | (1n << 52n), exponent: biased - 1075 };
}

/** round-half-even(abs * 10^scale) for the exact value of abs */
function scaleAndRound(abs: number, scale: number): bigint {
	const { mantissa, exponent } = decompose(abs);

	let numerator = mantissa;
	let denominator = 1n;

	if (exponent >= 0) {
		numerator <<= BigInt(exponent);
	} else {
		denominator <<= BigInt(-exponent);
	}
	if (scale >= 0) {
		numerator *= TEN ** BigInt(scale);
	} else {
		denominator *= TEN ** BigInt(-scale);
	}

	const quotient = numerator / denominator;
	const twiceRemainder = (numerator % denominator) * 2n;

	if (twiceRemainder > denominator) return quotient + 1n;
	if (twiceRemainder < denominator) return quotient;
	return quotient % 2n === 0n ? quotient : quotient + 1n;
}

function isNegative(value: number): boolean {
	return value < 0 || Object.is(value, -0);
}

function nonFinite(value: number): string {
	if (Number.isNaN(value)) return "nan";
	return value > 0 ? "inf" : "-inf";
}

function withPoint(digits: string, fractionDigits: number): string {
	if (fractionDigits === 0) return digits;
	const padded = digits.padStart(fractionDigits + 1, "0");
	const split = padded.length - fractionDigits;
	return `${padded.slice(0, split)}.${padded.slice(split)}`;
}

/**
 * Format like printf("%.<fractionDigits>f").
 *
 * @example
 * formatFixed(1 / 128) // "0.007812"
 * formatFixed(0.1, 20) // "0.10000000000000000555"
 */
export function formatFixed(value: number, fractionDigits = 6): string {
	if (!Number.isFinite(value)) return nonFinite(value);

	const sign = isNegative(value) ? "-" : "";
	const scaled = scaleAndRound(Math.abs(value), fractionDigits);
	return `${sign}${withPoint(scaled.toString(), fractionDigits)}`;
}

/**
 * Format like printf("%.<fractionDigits>e"); "%e" and "%le" print the same.
 *
 * @example
 * formatExponential(1234.5) // "1.234500e+03"
 * formatExponential(0) // "0.000000e+00"
 */
export function formatExponential(value: number, fractionDigits = 6): string {
	if (!Number.isFinite(value)) return nonFinite(value);

	const sign = isNegative(value) ? "-" : "";
	const abs = Math.abs(value);

	let exponent = 0;
	let digits = 0n;

	if (abs !== 0) {
		const lower = TEN ** BigInt(fractionDigits);
		const upper = lower * TEN;

		exponent = Math.floor(Math.log10(abs));
		digits = scaleAndRound(abs, fractionDigits - exponent);
		if (digits >= upper) {
			exponent++;
			digits = scaleAndRound(abs, fractionDigits - exponent);
		} else if (digits < lower) {
			exponent--;
			digits = scaleAndRound(abs, fractionDigits - exponent);
		}
		// Rounding up can carry into a new leading digit (9.9999996 -> 10.000000)
		if (digits >= upper) {
			exponent++;
			digits /= TEN;
		}
	}

	const mantissa = withPoint(digits.toString(), fractionDigits);
	const exponentSign = exponent < 0 ? "-" : "+";
	const exponentDigits = String(Math.abs(exponent)).padStart(2, "0");
	return `${sign}${mantissa}e${exponentSign}${exponentDigits}`;
}
