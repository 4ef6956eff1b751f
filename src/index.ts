/**
 * Constant Conformance - Main Entry Point
 */

// Export core types
export * from './types/core';

// Export interfaces
export * from './interfaces/IParameterSetStore';

// Export the check
export {
  isPowerOfTwo,
  validateParameters,
  computeResult,
  runConformanceCheck,
  runLoggedCheck,
  assertConformance
} from './conformance/check';
export { formatFixed } from './conformance/format';
export {
  ConstraintViolationError,
  ConfigurationError,
  ParameterParseError,
  FastenerBindingError,
  UsageError
} from './conformance/errors';

// Export configuration
export {
  DEFAULT_PARAMETERS,
  PARAMETER_NAMES,
  PARAMETER_ENV_KEYS,
  parseIntegerParameter,
  parametersFromEnvironment,
  mergeParameters
} from './config/parameters';
export { loadRuntimeConfig } from './config/runtime';

// Export fasteners
export { readFasteners, readSourceFile, readSourceTree, readSources, matchFastener } from './fasteners/reader';
export { writeSource, writeSourceFile, writeIndividual, describeChange, describeChanges, rebaseIndividual } from './fasteners/writer';
export { mutateValue, mutateFastener, mutateFile, mutateIndividual, seededRandom } from './fasteners/mutate';
export { resolveBinding, bindParameters, bindIndividual, applyParameters } from './fasteners/binding';

// Export sweep
export { runSweep, exploreNeighbourhood } from './sweep/sweep';
export type { ExplorationOptions } from './sweep/sweep';

// Export storage
export { ParameterSetStore } from './storage/parameter-store';
export { pgSqlClient, redisCacheClient } from './storage/clients';
export type { SqlClient, SqlConnection, SqlQueryable, CacheClient } from './storage/clients';
export { openParameterStore, redisReconnectStrategy } from './storage/connection';
export type { StoreHandle } from './storage/connection';

// Export logger
export { Logger, LogLevel, logger } from './utils/logger';

// Export CLI
export { main, parseArguments } from './cli';
