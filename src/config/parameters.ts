/**
 * Parameter Configuration
 * Defaults and environment loading for the three checked constants
 */

import { ConformanceParameters, ParameterName } from '../types/core';
import { ParameterParseError } from '../conformance/errors';

/**
 * Default parameters (all constraints satisfied)
 */
export const DEFAULT_PARAMETERS: ConformanceParameters = {
  bound: 10,
  flag: 1,
  powerValue: 4
};

export const PARAMETER_NAMES: readonly ParameterName[] = ['bound', 'flag', 'powerValue'];

export const PARAMETER_ENV_KEYS: Record<ParameterName, string> = {
  bound: 'CONFORMANCE_BOUND',
  flag: 'CONFORMANCE_FLAG',
  powerValue: 'CONFORMANCE_POWER_VALUE'
};

const INTEGER_PATTERN = /^[+-]?\d+$/;

/**
 * Parse one parameter from text. Range is left to the check:
 * a flag of 2 parses here and is rejected there.
 */
export function parseIntegerParameter(name: ParameterName, raw: string): number {
  const text = raw.trim();

  if (name === 'flag') {
    const lowered = text.toLowerCase();
    if (lowered === 'true') {return 1;}
    if (lowered === 'false') {return 0;}
  }

  if (!INTEGER_PATTERN.test(text)) {
    throw new ParameterParseError(name, raw);
  }

  const value = Number(text);
  if (!Number.isSafeInteger(value)) {
    throw new ParameterParseError(name, raw);
  }
  return value;
}

/**
 * Overlay the parameters present in env onto base
 */
export function parametersFromEnvironment(
  env: NodeJS.ProcessEnv = process.env,
  base: ConformanceParameters = DEFAULT_PARAMETERS
): ConformanceParameters {
  const overrides: Partial<Record<ParameterName, number>> = {};

  for (const name of PARAMETER_NAMES) {
    const raw = env[PARAMETER_ENV_KEYS[name]];
    if (raw !== undefined && raw !== '') {
      overrides[name] = parseIntegerParameter(name, raw);
    }
  }

  return { ...base, ...overrides };
}

export function mergeParameters(
  base: ConformanceParameters,
  overrides: Partial<ConformanceParameters>
): ConformanceParameters {
  return {
    bound: overrides.bound ?? base.bound,
    flag: overrides.flag ?? base.flag,
    powerValue: overrides.powerValue ?? base.powerValue
  };
}
