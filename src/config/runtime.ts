/**
 * Runtime settings read from the environment
 */

import { RuntimeConfig } from '../types/core';
import { ConfigurationError } from '../conformance/errors';
import { LogLevel } from '../utils/logger';

export const DEFAULT_REDIS_URL = 'redis://localhost:6379';
export const DEFAULT_CACHE_TTL_SECONDS = 3600;

function parseLogLevel(raw: string | undefined): LogLevel {
  const level = raw?.toUpperCase();
  const match = Object.values(LogLevel).find((candidate) => candidate === level);
  return match ?? LogLevel.INFO;
}

export function loadRuntimeConfig(env: NodeJS.ProcessEnv = process.env): RuntimeConfig {
  let cacheTtlSeconds = DEFAULT_CACHE_TTL_SECONDS;

  if (env.PARAMETER_CACHE_TTL !== undefined) {
    const parsed = parseInt(env.PARAMETER_CACHE_TTL, 10);
    if (isNaN(parsed) || parsed <= 0) {
      throw new ConfigurationError(
        `PARAMETER_CACHE_TTL must be a positive integer, got '${env.PARAMETER_CACHE_TTL}'`
      );
    }
    cacheTtlSeconds = parsed;
  }

  return {
    logLevel: parseLogLevel(env.LOG_LEVEL),
    databaseUrl: env.DATABASE_URL || undefined,
    redisUrl: env.REDIS_URL || DEFAULT_REDIS_URL,
    cacheTtlSeconds
  };
}
