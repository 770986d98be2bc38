/**
 * Pure-TypeScript distribution backend.
 *
 * A distribution is the sample population it was fitted from. Its Ux text
 * form is `<mean %e>Ux<base64 little-endian float64 samples>`, so a value
 * written by toUx reads back through fromUx unchanged. A plain number (with
 * or without an empty "Ux" suffix) decodes to a point mass.
 */

import { Buffer } from "node:buffer";
import { formatExponential } from "../io/format.ts";
import { parseFloatChecked } from "../io/number.ts";
import { UX_MARKER } from "../io/csv/classifier.ts";
import type { FloatArray } from "../types/float-kind.ts";
import type { DistributionBackend } from "./types.ts";

const BASE64_PATTERN = /^[A-Za-z0-9+/]*={0,2}$/;

/**
 * An immutable empirical distribution.
 */
export class EmpiricalDistribution {
	private readonly _samples: Float64Array;

	/** Population mean; NaN when there are no samples */
	readonly mean: number;

	constructor(samples: ArrayLike<number>) {
		this._samples = Float64Array.from(samples);
		let sum = 0;
		for (const sample of this._samples) sum += sample;
		this.mean = sum / this._samples.length;
	}

	/** Number of samples in the population */
	get size(): number {
		return this._samples.length;
	}

	/** A copy of the sample population */
	get samples(): Float64Array {
		return this._samples.slice();
	}

	/**
	 * One sample chosen uniformly from the population; NaN when empty.
	 *
	 * @param random - Returns a value in [0, 1)
	 */
	draw(random: () => number = Math.random): number {
		const index = Math.floor(random() * this._samples.length);
		return this._samples[index] ?? Number.NaN;
	}

	/**
	 * nth moment: the mean for n = 1, 1 for n = 0, otherwise the nth central
	 * moment of the population.
	 */
	moment(n: number): number {
		if (n === 0) return 1;
		if (n === 1) return this.mean;

		let sum = 0;
		for (const sample of this._samples) {
			sum += (sample - this.mean) ** n;
		}
		return sum / this._samples.length;
	}
}

function encodeSamples(samples: Float64Array): string {
	const view = new DataView(new ArrayBuffer(samples.length * 8));
	samples.forEach((sample, i) => view.setFloat64(i * 8, sample, true));
	return Buffer.from(view.buffer).toString("base64");
}

function decodeSamples(payload: string): Float64Array | undefined {
	if (!BASE64_PATTERN.test(payload)) return undefined;

	const bytes = Buffer.from(payload, "base64");
	if (bytes.length === 0 || bytes.length % 8 !== 0) return undefined;

	const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.length);
	const samples = new Float64Array(bytes.length / 8);
	for (let i = 0; i < samples.length; i++) {
		samples[i] = view.getFloat64(i * 8, true);
	}
	return samples;
}

function pointMass(value: number): EmpiricalDistribution {
	return new EmpiricalDistribution(Number.isNaN(value) ? [] : [value]);
}

export class EmpiricalBackend implements DistributionBackend<EmpiricalDistribution> {
	fromSamples(samples: FloatArray): EmpiricalDistribution {
		return new EmpiricalDistribution(samples);
	}

	nthMoment(value: EmpiricalDistribution, n: number): number {
		return value.moment(n);
	}

	fromUx(text: string): EmpiricalDistribution | undefined {
		const trimmed = text.trim();
		const marker = trimmed.indexOf(UX_MARKER);

		if (marker === -1) {
			const point = parseFloatChecked(trimmed);
			return point === undefined ? undefined : pointMass(point);
		}

		const payload = trimmed.slice(marker + UX_MARKER.length);
		if (payload === "") {
			const point = parseFloatChecked(trimmed.slice(0, marker));
			return point === undefined ? undefined : pointMass(point);
		}

		const samples = decodeSamples(payload);
		return samples === undefined ? undefined : new EmpiricalDistribution(samples);
	}

	toUx(value: EmpiricalDistribution): string {
		return `${formatExponential(value.mean)}${UX_MARKER}${encodeSamples(value.samples)}`;
	}

	pointValue(value: EmpiricalDistribution): number {
		return value.mean;
	}
}
