import { describe, expect, test } from 'vitest';
import { EmpiricalBackend, EmpiricalDistribution } from '../../src/backend/empirical';
import { parseDistributionsFromCsv } from '../../src/io/csv/reader';
import { ErrorCode } from '../../src/types/error';

const backend = new EmpiricalBackend();

describe('EmpiricalDistribution', () => {
  test('moments of a small population', () => {
    const d = backend.fromSamples(new Float64Array([1, 2, 3, 4]));
    expect(d.size).toBe(4);
    expect(d.mean).toBe(2.5);
    expect(d.moment(0)).toBe(1);
    expect(d.moment(1)).toBe(2.5);
    expect(d.moment(2)).toBe(1.25);
    expect(d.moment(3)).toBe(0);
    expect(backend.nthMoment(d, 2)).toBe(1.25);
    expect(backend.pointValue(d)).toBe(2.5);
  });

  test('an empty population has a NaN mean', () => {
    const d = new EmpiricalDistribution([]);
    expect(d.size).toBe(0);
    expect(d.mean).toBeNaN();
    expect(d.draw()).toBeNaN();
  });

  test('draw picks the sample at the scaled random index', () => {
    const d = new EmpiricalDistribution([1, 2, 3, 4]);
    expect(d.draw(() => 0)).toBe(1);
    expect(d.draw(() => 0.5)).toBe(3);
    expect(d.draw(() => 0.99)).toBe(4);
  });

  test('samples returns a copy', () => {
    const d = new EmpiricalDistribution([1, 2]);
    const copy = d.samples;
    copy[0] = 100;
    expect(d.samples[0]).toBe(1);
  });
});

describe('EmpiricalBackend Ux text', () => {
  test('toUx writes the mean then the encoded samples', () => {
    expect(backend.toUx(new EmpiricalDistribution([1]))).toBe('1.000000e+00UxAAAAAAAA8D8=');
  });

  test('fromUx reads back what toUx wrote', () => {
    const original = new EmpiricalDistribution([0.25, -3, 7.5]);
    const decoded = backend.fromUx(backend.toUx(original));
    expect(decoded?.samples).toEqual(new Float64Array([0.25, -3, 7.5]));
  });

  test('a plain number is a point mass', () => {
    expect(backend.fromUx('3.5')?.samples).toEqual(new Float64Array([3.5]));
    expect(backend.fromUx('  4Ux \n')?.samples).toEqual(new Float64Array([4]));
  });

  test('an empty distribution survives the round trip', () => {
    const text = backend.toUx(new EmpiricalDistribution([]));
    expect(text).toBe('nanUx');
    expect(backend.fromUx(text)?.size).toBe(0);
  });

  test('malformed text is rejected', () => {
    expect(backend.fromUx('abc')).toBeUndefined();
    expect(backend.fromUx('1Ux!!!')).toBeUndefined();
    expect(backend.fromUx('1UxAAAA')).toBeUndefined();
  });

  test('a Ux column read from CSV keeps its samples', () => {
    const cell = backend.toUx(new EmpiricalDistribution([2, 4]));
    const result = parseDistributionsFromCsv(`R1, R2Ux\n1.0, ${cell}\n3.0, -\n`, ['R1', 'R2Ux'], backend);
    if (result.error === ErrorCode.None) {
      expect(result.value[0]?.value.samples).toEqual(new Float64Array([1, 3]));
      expect(result.value[1]?.value.samples).toEqual(new Float64Array([2, 4]));
      expect(result.value[1]?.value.mean).toBe(3);
    } else {
      expect.unreachable(result.message);
    }
  });
});
