import { beforeEach, describe, expect, test } from 'vitest';
import { SampleBuffer, createSampleBuffer } from '../../src/buffer/sample-buffer';
import { clearAllAllocations, getMemoryStats } from '../../src/memory/allocation-tracker';
import { ErrorCode } from '../../src/types/error';
import { FloatKind } from '../../src/types/float-kind';

describe('SampleBuffer', () => {
  test('appends up to capacity', () => {
    const buffer = new SampleBuffer(FloatKind.Float64, 2);
    expect(buffer.append(1)).toBe(ErrorCode.None);
    expect(buffer.append(2)).toBe(ErrorCode.None);
    expect(buffer.append(3)).toBe(ErrorCode.BufferFull);
    expect(buffer.length).toBe(2);
    expect(Array.from(buffer.view())).toEqual([1, 2]);
  });

  test('a skipped slot is zeroed and then overwritten', () => {
    const buffer = new SampleBuffer(FloatKind.Float64, 2);
    buffer.append(1);
    buffer.data[1] = 9;
    expect(buffer.skip()).toBe(ErrorCode.None);
    expect(buffer.data[1]).toBe(0);
    expect(buffer.length).toBe(1);
    buffer.append(2);
    expect(Array.from(buffer.view())).toEqual([1, 2]);
    expect(buffer.skip()).toBe(ErrorCode.BufferFull);
  });

  test('Float32 buffers store single-precision values', () => {
    const buffer = new SampleBuffer(FloatKind.Float32, 1);
    buffer.append(0.1);
    expect(buffer.data).toBeInstanceOf(Float32Array);
    expect(Array.from(buffer.view())).toEqual([Math.fround(0.1)]);
  });

  test('view covers counted samples only', () => {
    const buffer = new SampleBuffer(FloatKind.Float64, 4);
    buffer.append(5);
    expect(buffer.view().length).toBe(1);
    expect(buffer.data.length).toBe(4);
  });
});

describe('createSampleBuffer', () => {
  beforeEach(() => {
    clearAllAllocations();
  });

  test('records the buffer against its task', () => {
    createSampleBuffer(FloatKind.Float64, 4, 'csv_test_1');
    createSampleBuffer(FloatKind.Float32, 4, 'csv_test_1');
    const stats = getMemoryStats();
    expect(stats.activeTaskCount).toBe(1);
    expect(stats.totalAllocatedBytes).toBe(48);
    expect(stats.tasks.get('csv_test_1')?.bufferCount).toBe(2);
  });
});
