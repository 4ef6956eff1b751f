import { ConformanceOutcome, ConformanceParameters, ParameterSetRecord } from '../types/core';

/**
 * Parameter Set Store Interface
 * Persists named parameter sets and the history of checks run against them
 */
export interface IParameterSetStore {
  /**
   * Get the active version of a parameter set, or null when unknown
   */
  getParameterSet(name: string): Promise<ParameterSetRecord | null>;

  /**
   * Validate and store a new version of a parameter set
   */
  saveParameterSet(name: string, parameters: ConformanceParameters): Promise<ParameterSetRecord>;

  /**
   * List the active version of every parameter set
   */
  listParameterSets(): Promise<ParameterSetRecord[]>;

  /**
   * Append a check outcome to the run history
   */
  recordRun(name: string | undefined, outcome: ConformanceOutcome): Promise<void>;
}
