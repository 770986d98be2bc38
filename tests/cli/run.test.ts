import { mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterAll, afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { runCli } from '../../src/cli/run';
import { formatCommonUsage } from '../../src/cli/usage';
import { readDataDotOutFile } from '../../src/io/data-out';
import type { JsonDocument } from '../../src/io/json';
import { ErrorCode } from '../../src/types/error';

describe('runCli', () => {
  const dir = mkdtempSync(join(tmpdir(), 'uxio-cli-'));
  const input = join(dir, 'input.csv');
  let stdout: string[] = [];
  let stderr: string[] = [];

  beforeEach(() => {
    writeFileSync(input, 'R1, R2\n1, 10\n3, 30\n');
    stdout = [];
    stderr = [];
    vi.spyOn(process.stdout, 'write').mockImplementation((chunk) => {
      stdout.push(String(chunk));
      return true;
    });
    vi.spyOn(process.stderr, 'write').mockImplementation((chunk) => {
      stderr.push(String(chunk));
      return true;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  afterAll(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  test('writes column means as CSV to stdout', () => {
    expect(runCli(['-i', input])).toBe(0);
    expect(stdout.join('')).toBe('R1, R2\n2.000000e+00, 2.000000e+01\n');
  });

  test('writes the selected output to a file', () => {
    const output = join(dir, 'out.csv');
    expect(runCli(['-i', input, '-o', output, '-S', '1'])).toBe(0);
    expect(readFileSync(output, 'utf8')).toBe('R2\n2.000000e+01\n');
  });

  test('reads only the listed columns', () => {
    writeFileSync(input, 'R1\n4\n');
    expect(runCli(['-i', input, '--columns', 'R1'])).toBe(0);
    expect(stdout.join('')).toBe('R1\n4.000000e+00\n');
  });

  test('prints JSON with each fit and its variance', () => {
    expect(runCli(['-i', input, '-j'])).toBe(0);
    const doc: JsonDocument = JSON.parse(stdout.join(''));
    expect(doc.plots.map((plot) => plot.variableSymbol)).toEqual(['R1', 'R2']);
    expect(doc.plots.map((plot) => plot.stdValues)).toEqual([[1], [100]]);
  });

  test('benchmarking mode prints a summary line per output', () => {
    expect(runCli(['-i', input, '-b', '-S', '0'])).toBe(0);
    expect(stdout.join('')).toBe(
      'R1: n=2, 2.000000e+00, 1.000000e+00, 1.000000e+00, 1.000000e+00, 3.000000e+00, 3.000000e+00, 3.000000e+00\n',
    );
  });

  test('repeated execution writes one row per iteration to data.out', () => {
    const dataOut = join(dir, 'data.out');
    expect(runCli(['-i', input, '-M', '4', '-D', dataOut, '-o', join(dir, 'mc.csv')])).toBe(0);

    const read = readDataDotOutFile(dataOut);
    if (read.error === ErrorCode.None) {
      expect(read.value.samples).toHaveLength(4);
      for (const row of read.value.samples) {
        expect([1, 3]).toContain(row[0]);
        expect([10, 30]).toContain(row[1]);
      }
    } else {
      expect.unreachable(read.message);
    }
  });

  test('help prints usage and succeeds', () => {
    expect(runCli(['-h'])).toBe(0);
    expect(stderr.join('')).toBe(formatCommonUsage());
  });

  test('bad arguments print usage and fail', () => {
    expect(runCli(['--bogus'])).toBe(1);
    expect(stderr.join('')).toBe(formatCommonUsage());
  });

  test('fails without an input file', () => {
    expect(runCli([])).toBe(1);
    expect(stdout).toEqual([]);
  });

  test('fails on a malformed input', () => {
    writeFileSync(input, 'R1, R2\n1\n');
    expect(runCli(['-i', input])).toBe(1);
    expect(stdout).toEqual([]);
  });
});
