/**
 * Conformance Check Tests
 */

import {
  assertConformance,
  computeResult,
  isPowerOfTwo,
  runConformanceCheck,
  runLoggedCheck,
  validateParameters
} from '../check';
import { ConstraintViolationError } from '../errors';
import { Logger, LogLevel } from '../../utils/logger';
import { VALID_PARAMETERS } from '../../__tests__/test-helpers';

describe('isPowerOfTwo', () => {
  test.each([1, 2, 4, 8, 1024, 2 ** 52])('accepts %d', (value) => {
    expect(isPowerOfTwo(value)).toBe(true);
  });

  test('rejects zero even though 0 & -1 is 0', () => {
    expect(isPowerOfTwo(0)).toBe(false);
  });

  test.each([3, 6, 12, 1023, 2 ** 52 + 1])('rejects %d (more than one bit set)', (value) => {
    expect(isPowerOfTwo(value)).toBe(false);
  });

  test.each([-1, -2, -4, -(2 ** 52)])('rejects negative %d', (value) => {
    expect(isPowerOfTwo(value)).toBe(false);
  });

  test('rejects non-integers', () => {
    expect(isPowerOfTwo(2.5)).toBe(false);
    expect(isPowerOfTwo(NaN)).toBe(false);
    expect(isPowerOfTwo(Infinity)).toBe(false);
  });
});

describe('validateParameters', () => {
  test('returns null when every gate passes', () => {
    expect(validateParameters(VALID_PARAMETERS)).toBeNull();
  });

  test('rejects bound of 7 at the first gate', () => {
    expect(validateParameters({ ...VALID_PARAMETERS, bound: 7 })).toEqual({
      parameter: 'bound',
      constraint: 'bound-greater-than-seven',
      value: 7,
      condition: 'bound > 7',
      message: 'Constraint violated: bound > 7 (bound = 7)'
    });
  });

  test('rejects flag outside 0 and 1', () => {
    const violation = validateParameters({ ...VALID_PARAMETERS, flag: 2 });
    expect(violation?.parameter).toBe('flag');
    expect(violation?.constraint).toBe('flag-is-boolean');
    expect(violation?.message).toBe('Constraint violated: flag == 0 || flag == 1 (flag = 2)');
  });

  test('rejects powerValue of 0 through the zero guard', () => {
    const violation = validateParameters({ ...VALID_PARAMETERS, powerValue: 0 });
    expect(violation?.constraint).toBe('power-value-is-power-of-two');
    expect(violation?.value).toBe(0);
  });

  test('rejects powerValue of 6', () => {
    expect(validateParameters({ ...VALID_PARAMETERS, powerValue: 6 })?.parameter).toBe('powerValue');
  });

  test('reports only the first failing gate', () => {
    const violation = validateParameters({ bound: 5, flag: 3, powerValue: 6 });
    expect(violation?.parameter).toBe('bound');
  });

  test('checks flag before powerValue', () => {
    const violation = validateParameters({ bound: 10, flag: 3, powerValue: 6 });
    expect(violation?.parameter).toBe('flag');
  });

  test('rejects a non-integer as an integer violation', () => {
    expect(validateParameters({ ...VALID_PARAMETERS, bound: 7.5 })).toEqual({
      parameter: 'bound',
      constraint: 'integer',
      value: 7.5,
      condition: 'bound is an integer',
      message: 'Constraint violated: bound must be an integer, got 7.5'
    });
  });
});

describe('computeResult', () => {
  test('evaluates |(bound - 5.5) * (flag + 0.1) * (powerValue - 2.5)|', () => {
    expect(computeResult({ bound: 10, flag: 0, powerValue: 4 })).toBe(0.675);
    expect(computeResult({ bound: 8, flag: 1, powerValue: 1 })).toBe(4.125);
  });

  test('takes the absolute value of a negative product', () => {
    // (8 - 5.5) * (0 + 0.1) * (2 - 2.5) = -0.125
    expect(computeResult({ bound: 8, flag: 0, powerValue: 2 })).toBe(0.125);
  });
});

describe('runConformanceCheck', () => {
  test('produces 7.425000 for bound=10, flag=1, powerValue=4', () => {
    const outcome = runConformanceCheck({ bound: 10, flag: 1, powerValue: 4 });

    expect(outcome.success).toBe(true);
    if (outcome.success) {
      expect(outcome.result).toBeCloseTo(7.425, 12);
      expect(outcome.output).toBe('7.425000\n');
    }
  });

  test('formats larger results with six decimals', () => {
    const outcome = runConformanceCheck({ bound: 100, flag: 0, powerValue: 1024 });
    expect(outcome.success && outcome.output).toBe('9653.175000\n');
  });

  test.each([
    ['bound=5', { bound: 5, flag: 1, powerValue: 4 }, 'bound'],
    ['powerValue=0', { bound: 10, flag: 1, powerValue: 0 }, 'powerValue'],
    ['powerValue=6', { bound: 10, flag: 1, powerValue: 6 }, 'powerValue']
  ] as const)('aborts without output for %s', (_label, parameters, parameter) => {
    const outcome = runConformanceCheck(parameters);

    expect(outcome.success).toBe(false);
    expect('output' in outcome).toBe(false);
    if (!outcome.success) {
      expect(outcome.violation.parameter).toBe(parameter);
    }
  });

  test('keeps the input parameters on the outcome', () => {
    const parameters = { bound: 5, flag: 1, powerValue: 4 };
    expect(runConformanceCheck(parameters).parameters).toBe(parameters);
  });
});

describe('assertConformance', () => {
  test('returns the result for valid parameters', () => {
    expect(assertConformance({ bound: 8, flag: 1, powerValue: 1 })).toBe(4.125);
  });

  test('throws ConstraintViolationError carrying the violation', () => {
    expect.assertions(3);
    try {
      assertConformance({ bound: 10, flag: 1, powerValue: 6 });
    } catch (error) {
      expect(error).toBeInstanceOf(ConstraintViolationError);
      if (error instanceof ConstraintViolationError) {
        expect(error.violation.constraint).toBe('power-value-is-power-of-two');
        expect(error.message).toBe(
          'Constraint violated: powerValue && !(powerValue & (powerValue - 1)) (powerValue = 6)'
        );
      }
    }
  });
});

describe('runLoggedCheck', () => {
  const log = Logger.getInstance();
  let lines: string[];

  beforeEach(() => {
    lines = [];
    log.setSink((line) => lines.push(line));
    log.setTimestamps(false);
    log.setLevel(LogLevel.DEBUG);
  });

  afterEach(() => {
    log.setSink();
    log.setTimestamps(true);
    log.setLevel(LogLevel.INFO);
  });

  test('traces each passed gate and the result', () => {
    const outcome = runLoggedCheck(VALID_PARAMETERS, 'defaults');

    expect(outcome.success).toBe(true);
    expect(lines).toHaveLength(5);
    expect(lines[0]).toBe(
      '[DEBUG] [comp=Check | set=defaults | step=untested] Checking bound=10 flag=1 powerValue=4'
    );
    expect(lines[1]).toBe('[DEBUG] [comp=Check | set=defaults | param=bound]   ├─ ✓ bound > 7');
  });

  test('logs the violation after the gates that passed', () => {
    runLoggedCheck({ bound: 10, flag: 2, powerValue: 4 });

    expect(lines).toHaveLength(3);
    expect(lines[2]).toBe(
      '[ERROR] [comp=Check | param=flag | constraint=flag-is-boolean | step=aborted-on-violation] ' +
        'Constraint violated: flag == 0 || flag == 1 (flag=2)'
    );
  });
});
