/**
 * Error types for the conformance check and its inputs
 */

import { ConstraintViolation } from '../types/core';

/**
 * Raised when a parameter fails one of the check's constraints
 */
export class ConstraintViolationError extends Error {
  readonly violation: ConstraintViolation;

  constructor(violation: ConstraintViolation) {
    super(violation.message);
    this.name = 'ConstraintViolationError';
    this.violation = violation;
  }
}

/**
 * Raised when parameters cannot be obtained at all, before any check runs
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export class ParameterParseError extends ConfigurationError {
  readonly parameter: string;
  readonly raw: string;

  constructor(parameter: string, raw: string) {
    super(`Invalid value for ${parameter}: '${raw}' is not an integer`);
    this.name = 'ParameterParseError';
    this.parameter = parameter;
    this.raw = raw;
  }
}

export class FastenerBindingError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = 'FastenerBindingError';
  }
}

export class UsageError extends ConfigurationError {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}
