import { describe, expect, test } from 'vitest';
import { quantile } from '../../src/stats/quantile';

describe('quantile', () => {
  const data = [50, 10, 40, 20, 30];

  test('takes the element at trunc(p * N) of the sorted copy', () => {
    expect(quantile(data, 0.4)).toBe(30);
    expect(quantile(data, 0)).toBe(10);
    expect(quantile(data, 0.99)).toBe(50);
    expect(quantile(data, 0.5)).toBe(30);
  });

  test('does not reorder the input', () => {
    quantile(data, 0.5);
    expect(data).toEqual([50, 10, 40, 20, 30]);
  });

  test('an index past either end is undefined', () => {
    expect(quantile(data, 1)).toBeUndefined();
    expect(quantile(data, -0.5)).toBeUndefined();
    expect(quantile([], 0.5)).toBeUndefined();
  });

  test('sorts negative values numerically', () => {
    expect(quantile(new Float64Array([-1, -10, 2]), 0)).toBe(-10);
  });
});
