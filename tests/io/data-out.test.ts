import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, describe, expect, test } from 'vitest';
import {
  formatDataDotOut,
  parseDataDotOut,
  readDataDotOutFile,
  saveMonteCarloDataToDataDotOutFile,
} from '../../src/io/data-out';
import { ErrorCode } from '../../src/types/error';
import { FloatKind } from '../../src/types/float-kind';

describe('formatDataDotOut', () => {
  test('writes elapsed time then one %.20f value per line', () => {
    expect(formatDataDotOut([0.5, 1], 42)).toBe(
      '42\n0.50000000000000000000\n1.00000000000000000000\n',
    );
  });

  test('joins row values with comma-space', () => {
    expect(formatDataDotOut([[1, 2], [3, 4]], 7)).toBe(
      '7\n1.00000000000000000000, 2.00000000000000000000\n3.00000000000000000000, 4.00000000000000000000\n',
    );
  });

  test('prints single-precision samples at their float value', () => {
    expect(formatDataDotOut([0.1], 0, FloatKind.Float32)).toBe('0\n0.10000000149011611938\n');
  });

  test('truncates fractional microseconds', () => {
    expect(formatDataDotOut([], 12.9)).toBe('12\n');
  });
});

describe('parseDataDotOut', () => {
  test('reads single values and rows', () => {
    const result = parseDataDotOut('42\n0.5\n1.0, 2.0\n\n');
    expect(result.error).toBe(ErrorCode.None);
    if (result.error === ErrorCode.None) {
      expect(result.value).toEqual({ elapsedMicroseconds: 42, samples: [[0.5], [1, 2]] });
    }
  });

  test('rejects a bad first line', () => {
    const result = parseDataDotOut('abc\n1\n');
    expect(result.error).toBe(ErrorCode.MalformedData);
    if (result.error !== ErrorCode.None) {
      expect(result.message).toBe(
        "The first line of data.out must be the elapsed time in microseconds (was 'abc').",
      );
    }
  });

  test('rejects a bad value with its line number', () => {
    const result = parseDataDotOut('42\n0.5\nx\n');
    expect(result.error).toBe(ErrorCode.MalformedData);
    if (result.error !== ErrorCode.None) {
      expect(result.message).toBe("Line 3 of data.out holds an invalid value (was 'x').");
    }
  });
});

describe('saveMonteCarloDataToDataDotOutFile', () => {
  const dir = mkdtempSync(join(tmpdir(), 'uxio-data-out-'));

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('writes a file that reads back', () => {
    const path = join(dir, 'data.out');
    const saved = saveMonteCarloDataToDataDotOutFile([[0.25, -1]], 1500, { path });
    expect(saved.error).toBe(ErrorCode.None);
    expect(readFileSync(path, 'utf8')).toBe('1500\n0.25000000000000000000, -1.00000000000000000000\n');

    const read = readDataDotOutFile(path);
    if (read.error === ErrorCode.None) {
      expect(read.value).toEqual({ elapsedMicroseconds: 1500, samples: [[0.25, -1]] });
    } else {
      expect.unreachable(read.message);
    }
  });

  test('an unwritable path is WriteError', () => {
    const saved = saveMonteCarloDataToDataDotOutFile([1], 0, { path: join(dir, 'missing', 'data.out') });
    expect(saved.error).toBe(ErrorCode.WriteError);
  });

  test('a missing file is FileNotFound on read', () => {
    expect(readDataDotOutFile(join(dir, 'absent.out')).error).toBe(ErrorCode.FileNotFound);
  });
});
