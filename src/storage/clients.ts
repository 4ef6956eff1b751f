/**
 * Narrow client interfaces the store depends on, with adapters for
 * pg and redis
 */

import { Pool } from 'pg';
import { createClient } from 'redis';

export interface SqlQueryable {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

/**
 * A connection checked out of the pool; release it when done
 */
export interface SqlConnection extends SqlQueryable {
  release(): void;
}

export interface SqlClient extends SqlQueryable {
  connect(): Promise<SqlConnection>;
}

export interface CacheSetOptions {
  EX?: number; // seconds
}

export interface CacheClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, options?: CacheSetOptions): Promise<unknown>;
  del(key: string): Promise<unknown>;
}

export type RedisClient = ReturnType<typeof createClient>;

export function pgSqlClient(pool: Pool): SqlClient {
  return {
    async query(text, values) {
      const result = await pool.query(text, values);
      return { rows: result.rows };
    },
    async connect() {
      const client = await pool.connect();
      return {
        async query(text, values) {
          const result = await client.query(text, values);
          return { rows: result.rows };
        },
        release: () => client.release()
      };
    }
  };
}

export function redisCacheClient(client: RedisClient): CacheClient {
  return {
    get: (key) => client.get(key),
    set: (key, value, options) =>
      options?.EX !== undefined ? client.set(key, value, { EX: options.EX }) : client.set(key, value),
    del: (key) => client.del(key)
  };
}
