import { describe, expect, test } from 'vitest';
import { type OptionSpec, parseCommonArgs } from '../../src/cli/args';
import { ErrorCode } from '../../src/types/error';

describe('parseCommonArgs', () => {
  test('defaults with no arguments', () => {
    const result = parseCommonArgs([]);
    expect(result.error).toBe(ErrorCode.None);
    if (result.error === ErrorCode.None) {
      expect(result.value).toEqual({
        inputFilePath: '',
        outputFilePath: '',
        isWriteToFileEnabled: false,
        isTimingEnabled: false,
        numberOfMonteCarloIterations: 1,
        outputSelect: 0,
        isOutputSelected: false,
        isVerbose: false,
        isInputFromFileEnabled: false,
        isOutputJSONMode: false,
        isHelpEnabled: false,
        isBenchmarkingMode: false,
        isMonteCarloMode: false,
        isSingleShotExecution: true,
        extras: {},
      });
      expect(Object.isFrozen(result.value)).toBe(true);
    }
  });

  test('input and output paths enable file modes', () => {
    const result = parseCommonArgs(['-i', 'in.csv', '--output', 'out.csv']);
    if (result.error === ErrorCode.None) {
      expect(result.value.inputFilePath).toBe('in.csv');
      expect(result.value.isInputFromFileEnabled).toBe(true);
      expect(result.value.outputFilePath).toBe('out.csv');
      expect(result.value.isWriteToFileEnabled).toBe(true);
    } else {
      expect.unreachable(result.message);
    }
  });

  test('long names may use a single dash and short names two', () => {
    const single = parseCommonArgs(['-input', 'a.csv', '-json']);
    const double = parseCommonArgs(['--i', 'b.csv', '--T']);
    if (single.error === ErrorCode.None && double.error === ErrorCode.None) {
      expect(single.value.inputFilePath).toBe('a.csv');
      expect(single.value.isOutputJSONMode).toBe(true);
      expect(double.value.inputFilePath).toBe('b.csv');
      expect(double.value.isTimingEnabled).toBe(true);
    } else {
      expect.unreachable('expected both to parse');
    }
  });

  test('-M enables repeated execution and timing', () => {
    const result = parseCommonArgs(['-M', '100']);
    if (result.error === ErrorCode.None) {
      expect(result.value.numberOfMonteCarloIterations).toBe(100);
      expect(result.value.isMonteCarloMode).toBe(true);
      expect(result.value.isTimingEnabled).toBe(true);
      expect(result.value.isSingleShotExecution).toBe(false);
    } else {
      expect.unreachable(result.message);
    }
  });

  test('-S selects an output', () => {
    const result = parseCommonArgs(['-S', '2']);
    if (result.error === ErrorCode.None) {
      expect(result.value.outputSelect).toBe(2);
      expect(result.value.isOutputSelected).toBe(true);
    } else {
      expect.unreachable(result.message);
    }
  });

  test.each([
    [['-S', 'x'], 'The output selected must be an integer.'],
    [['--select-output=-1'], 'The output selected must be non-negative.'],
    [['-M', 'many'], 'The number of multiple executions must be an integer.'],
    [['-M', '0'], 'The number of multiple executions must be positive.'],
    [['-M', '99999999999'], 'The number of multiple executions must be an integer.'],
  ])('%j is rejected', (argv, message) => {
    const result = parseCommonArgs(argv);
    expect(result.error).toBe(ErrorCode.InvalidArgument);
    if (result.error !== ErrorCode.None) {
      expect(result.message).toBe(message);
    }
  });

  test('JSON output and benchmarking cannot be combined', () => {
    const result = parseCommonArgs(['-j', '-b']);
    expect(result.error).toBe(ErrorCode.IncompatibleModes);
    if (result.error !== ErrorCode.None) {
      expect(result.message).toBe(
        'Output JSON mode and benchmarking mode are not compatible. Please choose only one.',
      );
    }
  });

  test('unknown options, missing values and stray arguments are errors', () => {
    expect(parseCommonArgs(['--bogus']).error).toBe(ErrorCode.UnknownOption);
    expect(parseCommonArgs(['-i']).error).toBe(ErrorCode.MissingArgument);
    expect(parseCommonArgs(['stray']).error).toBe(ErrorCode.UnexpectedArgument);
  });

  test('program options are returned in extras', () => {
    const extra: OptionSpec[] = [
      { name: 'columns', short: 'c', hasArgument: true },
      { name: 'float', short: 'f', hasArgument: false },
      { name: 'seed', hasArgument: true },
    ];
    const result = parseCommonArgs(['--columns', 'a,b', '-f', '-v'], extra);
    if (result.error === ErrorCode.None) {
      expect(result.value.extras).toEqual({ columns: 'a,b', float: true });
      expect(result.value.isVerbose).toBe(true);
    } else {
      expect.unreachable(result.message);
    }
  });
});
