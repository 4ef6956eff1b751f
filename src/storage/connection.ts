/**
 * Opens a ParameterSetStore backed by live PostgreSQL and Redis connections
 */

import { Pool } from 'pg';
import { createClient } from 'redis';
import { IParameterSetStore } from '../interfaces/IParameterSetStore';
import { RuntimeConfig } from '../types/core';
import { ConfigurationError } from '../conformance/errors';
import { logger } from '../utils/logger';
import { ParameterSetStore } from './parameter-store';
import { pgSqlClient, redisCacheClient } from './clients';

export interface StoreHandle {
  store: IParameterSetStore;
  close(): Promise<void>;
}

export type StoreOpener = (config: RuntimeConfig) => Promise<StoreHandle>;

export const REDIS_CONNECT_ATTEMPTS = 3;

/**
 * Backoff for the CLI's Redis client. Gives up after a few attempts so an
 * unreachable server fails the command instead of retrying forever.
 */
export function redisReconnectStrategy(retries: number): number | Error {
  if (retries >= REDIS_CONNECT_ATTEMPTS) {
    return new Error(`Redis unreachable after ${retries} reconnect attempts`);
  }
  return Math.min(retries * 50, 500);
}

export const openParameterStore: StoreOpener = async (config) => {
  if (!config.databaseUrl) {
    throw new ConfigurationError('DATABASE_URL is required for parameter set storage');
  }

  const pool = new Pool({ connectionString: config.databaseUrl });
  const redis = createClient({
    url: config.redisUrl,
    socket: { reconnectStrategy: redisReconnectStrategy }
  });

  redis.on('error', (err) => {
    logger.error('Redis error', { component: 'Redis' }, String(err));
  });

  try {
    await pool.query('SELECT 1');
    await redis.connect();
  } catch (error) {
    if (redis.isOpen) {
      await redis.disconnect();
    }
    await pool.end();
    throw error;
  }

  return {
    store: new ParameterSetStore(pgSqlClient(pool), redisCacheClient(redis), config.cacheTtlSeconds),
    close: async () => {
      await redis.quit();
      await pool.end();
    }
  };
};
