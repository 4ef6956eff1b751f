/**
 * Parameter Set Store
 * Versioned parameter sets in PostgreSQL with a Redis read cache
 */

import { IParameterSetStore } from '../interfaces/IParameterSetStore';
import { ConformanceOutcome, ConformanceParameters, ParameterSetRecord } from '../types/core';
import { validateParameters } from '../conformance/check';
import { ConfigurationError, ConstraintViolationError } from '../conformance/errors';
import { DEFAULT_CACHE_TTL_SECONDS } from '../config/runtime';
import { logger } from '../utils/logger';
import { CacheClient, SqlClient } from './clients';

/**
 * Shape of a cached record (dates as ISO strings)
 */
interface SerializedParameterSet {
  name: string;
  parameters: ConformanceParameters;
  version: number;
  createdAt: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * BIGINT columns arrive from pg as strings
 */
function toInteger(value: unknown, column: string): number {
  const parsed = typeof value === 'string' ? Number(value) : value;
  if (typeof parsed !== 'number' || !Number.isSafeInteger(parsed)) {
    throw new Error(`Invalid ${column} value in parameter_sets row: ${String(value)}`);
  }
  return parsed;
}

function toDate(value: unknown): Date {
  if (value instanceof Date) {
    return value;
  }
  if (typeof value === 'string') {
    const date = new Date(value);
    if (!isNaN(date.getTime())) {
      return date;
    }
  }
  throw new Error(`Invalid created_at value in parameter_sets row: ${String(value)}`);
}

function rowToRecord(row: unknown): ParameterSetRecord {
  if (!isRecord(row) || typeof row.name !== 'string') {
    throw new Error('Malformed parameter_sets row');
  }
  return {
    name: row.name,
    parameters: {
      bound: toInteger(row.bound, 'bound'),
      flag: toInteger(row.flag, 'flag'),
      powerValue: toInteger(row.power_value, 'power_value')
    },
    version: toInteger(row.version, 'version'),
    createdAt: toDate(row.created_at)
  };
}

function serialize(record: ParameterSetRecord): SerializedParameterSet {
  return { ...record, createdAt: record.createdAt.toISOString() };
}

function deserialize(data: unknown): ParameterSetRecord {
  if (!isRecord(data) || !isRecord(data.parameters)) {
    throw new Error('Malformed cached parameter set');
  }
  return rowToRecord({
    name: data.name,
    bound: data.parameters.bound,
    flag: data.parameters.flag,
    power_value: data.parameters.powerValue,
    version: data.version,
    created_at: data.createdAt
  });
}

const SELECT_COLUMNS = 'name, bound, flag, power_value, version, created_at';

export class ParameterSetStore implements IParameterSetStore {
  private db: SqlClient;
  private cache: CacheClient;
  private readonly cacheTtlSeconds: number;

  constructor(db: SqlClient, cache: CacheClient, cacheTtlSeconds: number = DEFAULT_CACHE_TTL_SECONDS) {
    this.db = db;
    this.cache = cache;
    this.cacheTtlSeconds = cacheTtlSeconds;
  }

  private getCacheKey(name: string): string {
    return `parameters:${name}`;
  }

  async getParameterSet(name: string): Promise<ParameterSetRecord | null> {
    // Try cache first
    const cached = await this.cache.get(this.getCacheKey(name));
    if (cached) {
      try {
        return deserialize(JSON.parse(cached));
      } catch (error) {
        logger.warn(`Discarding unreadable cache entry for ${name}`, { component: 'ParameterStore' }, String(error));
        await this.cache.del(this.getCacheKey(name));
      }
    }

    const result = await this.db.query(
      `SELECT ${SELECT_COLUMNS} FROM parameter_sets
       WHERE name = $1 AND active = true
       ORDER BY version DESC LIMIT 1`,
      [name]
    );

    if (result.rows.length === 0) {
      return null;
    }

    const record = rowToRecord(result.rows[0]);

    await this.cache.set(this.getCacheKey(name), JSON.stringify(serialize(record)), {
      EX: this.cacheTtlSeconds
    });

    return record;
  }

  async saveParameterSet(name: string, parameters: ConformanceParameters): Promise<ParameterSetRecord> {
    if (name.trim().length === 0) {
      throw new ConfigurationError('Parameter set name is required');
    }

    // Validate before touching the database
    const violation = validateParameters(parameters);
    if (violation) {
      throw new ConstraintViolationError(violation);
    }

    // Deactivate and insert atomically so a failed insert keeps the previous version active
    const client = await this.db.connect();
    let version: number;
    try {
      await client.query('BEGIN');

      const versionResult = await client.query(
        `SELECT COALESCE(MAX(version), 0) AS max_version
         FROM parameter_sets WHERE name = $1`,
        [name]
      );
      const firstRow = versionResult.rows[0];
      const currentVersion = isRecord(firstRow) ? toInteger(firstRow.max_version, 'version') : 0;
      version = currentVersion + 1;

      await client.query(
        `UPDATE parameter_sets SET active = false
         WHERE name = $1 AND active = true`,
        [name]
      );

      await client.query(
        `INSERT INTO parameter_sets (name, bound, flag, power_value, version, created_at, active)
         VALUES ($1, $2, $3, $4, $5, NOW(), true)`,
        [name, parameters.bound, parameters.flag, parameters.powerValue, version]
      );

      await client.query('COMMIT');
    } catch (error) {
      await client.query('ROLLBACK');
      logger.error(`Error storing parameter set ${name}`, { component: 'ParameterStore', parameterSet: name }, String(error));
      throw error;
    } finally {
      client.release();
    }

    await this.cache.del(this.getCacheKey(name));

    logger.info(`Stored parameter set ${name} v${version}`, { component: 'ParameterStore', parameterSet: name });

    return {
      name,
      parameters: { ...parameters },
      version,
      createdAt: new Date()
    };
  }

  async listParameterSets(): Promise<ParameterSetRecord[]> {
    const result = await this.db.query(
      `SELECT ${SELECT_COLUMNS} FROM parameter_sets
       WHERE active = true
       ORDER BY name ASC`
    );
    return result.rows.map(rowToRecord);
  }

  async recordRun(name: string | undefined, outcome: ConformanceOutcome): Promise<void> {
    const { bound, flag, powerValue } = outcome.parameters;
    try {
      await this.db.query(
        `INSERT INTO conformance_runs (
          parameter_set, bound, flag, power_value,
          success, result, violated_constraint, created_at
        ) VALUES ($1, $2, $3, $4, $5, $6, $7, NOW())`,
        [
          name ?? null,
          bound,
          flag,
          powerValue,
          outcome.success,
          outcome.success ? outcome.result : null,
          outcome.success ? null : outcome.violation.constraint
        ]
      );
    } catch (error) {
      logger.error('Error recording conformance run', { component: 'ParameterStore', parameterSet: name }, String(error));
      throw error;
    }
  }
}
