/**
 * Constant Conformance Check
 * Validates the three tunable constants in order and evaluates
 * |(bound - 5.5) * (flag + 0.1) * (powerValue - 2.5)| over them.
 */

import {
  ConformanceOutcome,
  ConformanceParameters,
  ConstraintName,
  ConstraintViolation,
  ParameterName
} from '../types/core';
import { ConstraintViolationError } from './errors';
import { formatFixed } from './format';
import { logger } from '../utils/logger';

interface Gate {
  parameter: ParameterName;
  constraint: ConstraintName;
  condition: string;
  holds: (value: number) => boolean;
}

/**
 * True when exactly one bit is set in the 64-bit two's-complement form.
 * Zero is excluded explicitly, since 0 & -1 is also 0.
 */
export function isPowerOfTwo(value: number): boolean {
  if (!Number.isSafeInteger(value)) {
    return false;
  }
  const x = BigInt.asIntN(64, BigInt(value));
  return x !== 0n && (x & (x - 1n)) === 0n;
}

const GATES: readonly Gate[] = [
  {
    parameter: 'bound',
    constraint: 'bound-greater-than-seven',
    condition: 'bound > 7',
    holds: (bound) => bound > 7
  },
  {
    parameter: 'flag',
    constraint: 'flag-is-boolean',
    condition: 'flag == 0 || flag == 1',
    holds: (flag) => flag === 0 || flag === 1
  },
  {
    parameter: 'powerValue',
    constraint: 'power-value-is-power-of-two',
    condition: 'powerValue && !(powerValue & (powerValue - 1))',
    holds: isPowerOfTwo
  }
];

function integerViolation(parameter: ParameterName, value: number): ConstraintViolation {
  return {
    parameter,
    constraint: 'integer',
    value,
    condition: `${parameter} is an integer`,
    message: `Constraint violated: ${parameter} must be an integer, got ${value}`
  };
}

/**
 * Runs the gates in order and returns the first violation, or null
 */
export function validateParameters(parameters: ConformanceParameters): ConstraintViolation | null {
  for (const gate of GATES) {
    const value = parameters[gate.parameter];

    if (!Number.isSafeInteger(value)) {
      return integerViolation(gate.parameter, value);
    }

    if (!gate.holds(value)) {
      return {
        parameter: gate.parameter,
        constraint: gate.constraint,
        value,
        condition: gate.condition,
        message: `Constraint violated: ${gate.condition} (${gate.parameter} = ${value})`
      };
    }
  }
  return null;
}

/**
 * Evaluates the expression without validating its inputs
 */
export function computeResult(parameters: ConformanceParameters): number {
  const { bound, flag, powerValue } = parameters;
  return Math.abs((bound - 5.5) * (flag + 0.1) * (powerValue - 2.5));
}

export function runConformanceCheck(parameters: ConformanceParameters): ConformanceOutcome {
  const violation = validateParameters(parameters);
  if (violation) {
    return { success: false, parameters, violation };
  }

  const result = computeResult(parameters);
  return {
    success: true,
    parameters,
    result,
    output: `${formatFixed(result)}\n`
  };
}

/**
 * Assertion-style variant: throws on the first violated constraint
 * and returns the result otherwise.
 */
export function assertConformance(parameters: ConformanceParameters): number {
  const outcome = runConformanceCheck(parameters);
  if (!outcome.success) {
    throw new ConstraintViolationError(outcome.violation);
  }
  return outcome.result;
}

/**
 * runConformanceCheck with the gate-by-gate trace written to the logger
 */
export function runLoggedCheck(parameters: ConformanceParameters, parameterSet?: string): ConformanceOutcome {
  const startedAt = Date.now();
  logger.checkStart(parameters, parameterSet);

  const outcome = runConformanceCheck(parameters);
  const failedAt = outcome.success
    ? GATES.length
    : GATES.findIndex((gate) => gate.parameter === outcome.violation.parameter);

  for (const gate of GATES.slice(0, failedAt)) {
    logger.gatePassed(gate.parameter, gate.condition, parameterSet);
  }

  if (outcome.success) {
    logger.checkComplete(outcome.result, Date.now() - startedAt, parameterSet);
  } else {
    logger.violation(outcome.violation, parameterSet);
  }
  return outcome;
}
