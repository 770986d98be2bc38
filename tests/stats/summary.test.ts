import { describe, expect, test } from 'vitest';
import { MaxState, MeanVarianceState, MinState } from '../../src/stats/agg-state';
import { summarize } from '../../src/stats/summary';

describe('summarize', () => {
  test('describes a small sample', () => {
    const summary = summarize([3, 1, 2]);
    expect(summary.count).toBe(3);
    expect(summary.mean).toBe(2);
    expect(summary.variance).toBeCloseTo(2 / 3, 12);
    expect(summary.min).toBe(1);
    expect(summary.max).toBe(3);
    expect(summary.median).toBe(2);
    expect(summary.p05).toBe(1);
    expect(summary.p95).toBe(3);
  });

  test('an empty sample has no extremes or quantiles', () => {
    const summary = summarize([]);
    expect(summary.count).toBe(0);
    expect(summary.mean).toBeNaN();
    expect(summary.min).toBeUndefined();
    expect(summary.max).toBeUndefined();
    expect(summary.median).toBeUndefined();
  });
});

describe('aggregation states', () => {
  test('reset clears accumulated values', () => {
    const moments = new MeanVarianceState();
    moments.accumulate(10);
    moments.reset();
    moments.accumulate(4);
    expect(moments.result()).toEqual({ mean: 4, variance: 0 });

    const min = new MinState();
    min.accumulate(-1);
    min.reset();
    expect(min.result()).toBeUndefined();

    const max = new MaxState();
    max.accumulate(5);
    max.accumulate(9);
    max.accumulate(7);
    expect(max.result()).toBe(9);
  });
});
