/**
 * PostgreSQL Connection Configuration
 *
 * One pool per database: `source` holds the custody records, `reporting`
 * receives the occupancy tables. Collaborators talk to the pools through the
 * narrow `SqlPool` interface so tests can hand them an in-process fake.
 */

import { Pool, type PoolConfig } from 'pg';
import { validateEnv, type PostgresTargetConfig } from './env.js';
import { logger } from '../utils/logger.js';
import { retryWithBackoff } from '../utils/retry.js';

export type PostgresTarget = 'source' | 'reporting';

export interface SqlQueryResult {
  rows: Record<string, unknown>[];
  rowCount: number | null;
}

export interface SqlExecutor {
  query(text: string, params?: unknown[]): Promise<SqlQueryResult>;
}

/**
 * A checked-out connection; must be released exactly once
 */
export interface SqlSession extends SqlExecutor {
  release(error?: Error): void;
}

export interface SqlPool extends SqlExecutor {
  connect(): Promise<SqlSession>;
}

const pools = new Map<PostgresTarget, Pool>();

function targetConfig(target: PostgresTarget): PostgresTargetConfig {
  const env = validateEnv();
  return target === 'source' ? env.SOURCE_POSTGRES : env.REPORTING_POSTGRES;
}

/**
 * Get the connection pool for a database
 *
 * Creates a singleton pool per target on first use.
 */
export function getPostgresPool(target: PostgresTarget): Pool {
  const existing = pools.get(target);
  if (existing) {
    return existing;
  }

  const settings = targetConfig(target);
  const config: PoolConfig = {
    host: settings.host,
    port: settings.port,
    database: settings.database,
    user: settings.user,
    password: settings.password,
    max: settings.poolMax,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 10000,
    keepAlive: true,
    ...(settings.ssl && { ssl: { rejectUnauthorized: false } }),
  };

  const pool = new Pool(config);

  pool.on('error', (err) => {
    logger.error({ error: err, target }, 'Unexpected error on idle PostgreSQL client');
  });

  pool.on('connect', () => {
    logger.debug({ target }, 'PostgreSQL client connected to pool');
  });

  pools.set(target, pool);
  return pool;
}

/**
 * Wrap a pg pool in the `SqlPool` interface used by the collaborators
 */
export function asSqlPool(pool: Pool): SqlPool {
  return {
    query: async (text, params) => {
      const result = await pool.query(text, params);
      return { rows: result.rows, rowCount: result.rowCount };
    },
    connect: async () => {
      const client = await pool.connect();
      return {
        query: async (text, params) => {
          const result = await client.query(text, params);
          return { rows: result.rows, rowCount: result.rowCount };
        },
        release: (error) => client.release(error),
      };
    },
  };
}

/**
 * Verify a database is reachable, retrying transient connection failures
 */
export async function checkPostgresConnection(target: PostgresTarget, maxAttempts: number = 3): Promise<void> {
  const pool = getPostgresPool(target);
  const settings = targetConfig(target);

  try {
    await retryWithBackoff(
      async () => {
        await pool.query('SELECT 1');
      },
      { maxAttempts },
      `postgres:${target}`
    );
    logger.info(
      { target, host: settings.host, port: settings.port, database: settings.database, user: settings.user },
      'PostgreSQL connection pool established'
    );
  } catch (err: unknown) {
    const code = err && typeof err === 'object' && 'code' in err ? String(err.code) : undefined;
    const hint = code === '28P01'
      ? `Check the ${target.toUpperCase()}_POSTGRES_PASSWORD environment variable`
      : code === '3D000'
        ? `Database "${settings.database}" does not exist`
        : undefined;
    logger.error(
      { error: err instanceof Error ? err.message : String(err), code, target, host: settings.host, hint },
      'Failed to establish PostgreSQL connection'
    );
    throw err;
  }
}

/**
 * Close every pool
 *
 * Should be called before the process exits.
 */
export async function closePostgresPools(): Promise<void> {
  for (const [target, pool] of pools) {
    await pool.end();
    pools.delete(target);
    logger.info({ target }, 'PostgreSQL connection pool closed');
  }
}
