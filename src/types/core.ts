/**
 * Core data models for the constant conformance check
 */

import { LogLevel } from '../utils/logger';

// ============================================================================
// Parameter Models
// ============================================================================

/**
 * The three tunable constants the check validates.
 * Flag is a boolean carried as an integer (0 or 1).
 */
export interface ConformanceParameters {
  readonly bound: number;
  readonly flag: number;
  readonly powerValue: number;
}

export type ParameterName = keyof ConformanceParameters;

export interface NamedParameterSet {
  name: string;
  parameters: ConformanceParameters;
}

export interface ParameterSetRecord extends NamedParameterSet {
  version: number;
  createdAt: Date;
}

// ============================================================================
// Check Outcome Models
// ============================================================================

export type ConstraintName =
  | 'integer'
  | 'bound-greater-than-seven'
  | 'flag-is-boolean'
  | 'power-value-is-power-of-two';

export interface ConstraintViolation {
  parameter: ParameterName;
  constraint: ConstraintName;
  value: number;
  condition: string; // e.g. "bound > 7"
  message: string;
}

export type CheckState = 'untested' | 'aborted-on-violation' | 'completed-with-output';

export interface ConformanceSuccess {
  success: true;
  parameters: ConformanceParameters;
  result: number;
  output: string; // formatted result followed by a newline
}

export interface ConformanceFailure {
  success: false;
  parameters: ConformanceParameters;
  violation: ConstraintViolation;
}

export type ConformanceOutcome = ConformanceSuccess | ConformanceFailure;

// ============================================================================
// Fastener Models
// ============================================================================

/**
 * Annotation kinds: INT is a plain integer, BOOL a 0/1 switch,
 * POW an integer that must stay a power of two.
 */
export type FastenerKind = 'INT' | 'BOOL' | 'POW';

export interface Fastener {
  path: string;
  line: number; // 0-based
  name?: string;
  kind: FastenerKind;
  original: number;
  value: number;
}

export interface SourceFile {
  path: string;
  lines: string[];
  fasteners: Fastener[];
}

/**
 * One candidate configuration: every annotated file with its current values
 */
export type Individual = SourceFile[];

/**
 * Fastener names to bind to each parameter. Unnamed parameters bind to
 * the single fastener of the matching kind.
 */
export type ParameterBinding = Partial<Record<ParameterName, string>>;

/**
 * Returns a number in [0, 1)
 */
export type RandomSource = () => number;

// ============================================================================
// Sweep Models
// ============================================================================

export interface SweepEntry {
  name: string;
  outcome: ConformanceOutcome;
}

export interface SweepReport {
  outcomes: SweepEntry[];
  passed: number;
  failed: number;
}

export interface ExplorationEntry {
  individual: Individual;
  changes: string[];
  outcome: ConformanceOutcome;
}

// ============================================================================
// Runtime Configuration Models
// ============================================================================

export interface RuntimeConfig {
  logLevel: LogLevel;
  databaseUrl?: string;
  redisUrl: string;
  cacheTtlSeconds: number;
}
