/**
 * Database connection pool utility.
 *
 * Provides a PostgreSQL connection pool using the `pg` library,
 * configured via environment variables, plus the `Queryable` seam the
 * repositories run their SQL through and a transaction helper.
 *
 * @module utils/db
 */

import pg from 'pg';

const { Pool } = pg;

export interface DbConfig {
  host: string;
  port: number;
  database: string;
  user: string;
  password: string;
  max: number;
  idleTimeoutMillis: number;
  connectionTimeoutMillis: number;
  ssl?: boolean;
}

/**
 * Anything that can run a parameterized statement: the shared pool or a
 * client checked out for a transaction.
 */
export interface Queryable {
  query<T extends pg.QueryResultRow = pg.QueryResultRow>(
    text: string,
    params?: unknown[],
  ): Promise<pg.QueryResult<T>>;
}

/**
 * Build database configuration from environment variables with sensible defaults.
 */
export function getDbConfig(env: NodeJS.ProcessEnv = process.env): DbConfig {
  return {
    host: env['DB_HOST'] ?? 'localhost',
    port: parseInt(env['DB_PORT'] ?? '5432', 10),
    database: env['DB_NAME'] ?? 'rbac',
    user: env['DB_USER'] ?? 'postgres',
    password: env['DB_PASSWORD'] ?? '',
    max: parseInt(env['DB_POOL_MAX'] ?? '20', 10),
    idleTimeoutMillis: parseInt(env['DB_IDLE_TIMEOUT'] ?? '30000', 10),
    connectionTimeoutMillis: parseInt(env['DB_CONNECT_TIMEOUT'] ?? '5000', 10),
    ssl: env['DB_SSL'] === 'true',
  };
}

/**
 * Create a new PostgreSQL connection pool with the given configuration.
 */
export function createPool(config?: Partial<DbConfig>): pg.Pool {
  const dbConfig = { ...getDbConfig(), ...config };
  return new Pool({
    host: dbConfig.host,
    port: dbConfig.port,
    database: dbConfig.database,
    user: dbConfig.user,
    password: dbConfig.password,
    max: dbConfig.max,
    idleTimeoutMillis: dbConfig.idleTimeoutMillis,
    connectionTimeoutMillis: dbConfig.connectionTimeoutMillis,
    ssl: dbConfig.ssl ? { rejectUnauthorized: false } : undefined,
  });
}

/** Singleton pool instance, lazily initialized. */
let pool: pg.Pool | null = null;

/**
 * Get the shared database connection pool.
 * Creates the pool on first call using environment-based configuration.
 */
export function getPool(): pg.Pool {
  if (!pool) {
    pool = createPool();
  }
  return pool;
}

/**
 * Wrap a pool or a checked-out client as a {@link Queryable}.
 */
export function asQueryable(target: pg.Pool | pg.PoolClient): Queryable {
  return {
    query: <T extends pg.QueryResultRow = pg.QueryResultRow>(text: string, params?: unknown[]) =>
      target.query<T>(text, params),
  };
}

/**
 * The part of a checked-out client a transaction needs. `release` with an
 * argument destroys the connection instead of returning it to the pool.
 */
export interface TransactionClient {
  query(text: string): Promise<unknown>;
  release(err?: Error | boolean): void;
}

/**
 * Run `work` between BEGIN and COMMIT on `client`, then release it.
 *
 * When `work` rejects the transaction is rolled back and the rejection is
 * rethrown unchanged. If the ROLLBACK itself fails the connection is in an
 * unknown state, so it is discarded rather than returned to the pool.
 */
export async function runInTransaction<C extends TransactionClient, T>(
  client: C,
  work: (client: C) => Promise<T>,
): Promise<T> {
  let discarded = false;
  try {
    await client.query('BEGIN');
    const result = await work(client);
    await client.query('COMMIT');
    return result;
  } catch (err) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackErr) {
      discarded = true;
      client.release(rollbackErr instanceof Error ? rollbackErr : true);
    }
    throw err;
  } finally {
    if (!discarded) {
      client.release();
    }
  }
}

/**
 * Run `work` inside a single transaction on one pooled client.
 */
export async function withTransaction<T>(
  target: pg.Pool,
  work: (db: Queryable) => Promise<T>,
): Promise<T> {
  const client = await target.connect();
  return runInTransaction(client, (tx) => work(asQueryable(tx)));
}

/**
 * Gracefully shut down the shared connection pool.
 * Should be called during application shutdown.
 */
export async function closePool(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
