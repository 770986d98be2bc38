import { describe, expect, test } from 'vitest';
import { runRepeatedExecutions } from '../../src/bench/repeated';
import { ErrorCode } from '../../src/types/error';

describe('runRepeatedExecutions', () => {
  test('collects one result per iteration in order', () => {
    const result = runRepeatedExecutions((i) => i * 0.5, 3);
    expect(result.error).toBe(ErrorCode.None);
    if (result.error === ErrorCode.None) {
      expect(result.value.samples).toEqual([0, 0.5, 1]);
      expect(Number.isInteger(result.value.elapsedMicroseconds)).toBe(true);
      expect(result.value.elapsedMicroseconds).toBeGreaterThanOrEqual(0);
    }
  });

  test('collects rows from a multi-output kernel', () => {
    const result = runRepeatedExecutions((i) => [i, -i], 2);
    if (result.error === ErrorCode.None) {
      expect(result.value.samples).toEqual([[0, -0], [1, -1]]);
    }
  });

  test('rejects a non-positive iteration count without calling the kernel', () => {
    let calls = 0;
    const result = runRepeatedExecutions(() => ++calls, 0);
    expect(result.error).toBe(ErrorCode.InvalidArgument);
    expect(calls).toBe(0);
  });
});
