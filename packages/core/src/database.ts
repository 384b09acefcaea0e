/**
 * Database Client Factory
 * Minimal pg-compatible interfaces shared by the Postgres repositories
 */

import pg from 'pg';
import type { Pool } from 'pg';
import { createLogger, type Logger } from './logger.js';
import { StorageError, toError } from './errors.js';

/**
 * Database query result type
 */
export interface QueryResult {
  rows: Record<string, unknown>[];
  rowCount: number | null;
}

/**
 * Database client interface
 * Compatible with pg.Pool and pg.Client
 */
export interface DatabaseClient {
  query(sql: string, params?: unknown[]): Promise<QueryResult>;
}

/**
 * Database pool interface for connection management
 */
export interface DatabasePool extends DatabaseClient {
  connect(): Promise<PoolClient>;
  end(): Promise<void>;
}

/**
 * Pool client interface (acquired connection)
 */
export interface PoolClient extends DatabaseClient {
  release(): void;
}

export interface DatabaseConfig {
  connectionString: string;
  maxConnections?: number;
  idleTimeoutMs?: number;
  connectionTimeoutMs?: number;
}

/**
 * PostgreSQL database pool wrapper
 */
class PostgresPool implements DatabasePool {
  private pool: Pool;
  private logger: Logger;

  constructor(config: DatabaseConfig) {
    this.logger = createLogger({ name: 'database' });
    this.pool = new pg.Pool({
      connectionString: config.connectionString,
      max: config.maxConnections ?? 10,
      idleTimeoutMillis: config.idleTimeoutMs ?? 30000,
      connectionTimeoutMillis: config.connectionTimeoutMs ?? 5000,
    });
    this.pool.on('error', (error) => {
      this.logger.error({ err: error }, 'Idle database client error');
    });
  }

  async query(sql: string, params?: unknown[]): Promise<QueryResult> {
    const result = await this.pool.query<Record<string, unknown>>(sql, params);
    return { rows: result.rows, rowCount: result.rowCount };
  }

  async connect(): Promise<PoolClient> {
    const client = await this.pool.connect();

    return {
      query: async (sql: string, params?: unknown[]): Promise<QueryResult> => {
        const result = await client.query<Record<string, unknown>>(sql, params);
        return { rows: result.rows, rowCount: result.rowCount };
      },
      release: () => client.release(),
    };
  }

  async end(): Promise<void> {
    await this.pool.end();
    this.logger.info('Database pool closed');
  }
}

/**
 * Create a PostgreSQL pool
 *
 * @example
 * ```typescript
 * const db = createDatabasePool({ connectionString: 'postgres://app@localhost:5432/events' });
 * const engine = createEventSourcingEngine({ database: db });
 * ```
 */
export function createDatabasePool(config: DatabaseConfig): DatabasePool {
  return new PostgresPool(config);
}

// =============================================================================
// TRANSACTION MANAGEMENT
// =============================================================================

/**
 * Execute a function within a database transaction
 *
 * BEGIN/COMMIT on success, ROLLBACK on any error; the connection is always
 * released.
 */
export async function withTransaction<T>(
  pool: DatabasePool,
  fn: (client: DatabaseClient) => Promise<T>
): Promise<T> {
  const client = await pool.connect();

  try {
    await client.query('BEGIN');
    const result = await fn(client);
    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      const logger = createLogger({ name: 'transaction' });
      logger.error({ err: rollbackError }, 'Rollback failed');
    }
    throw error;
  } finally {
    client.release();
  }
}

/** PostgreSQL error codes the repositories react to */
export const PG_UNIQUE_VIOLATION = '23505';

const CONNECTION_ERROR_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ETIMEDOUT',
  '57P01', // admin_shutdown
  '57P03', // cannot_connect_now
  '08000', // connection_exception
  '08003', // connection_does_not_exist
  '08006', // connection_failure
]);

/**
 * Read the `code` property of a driver error without trusting its shape
 */
export function getErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const code = error.code;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

/**
 * Wrap connectivity failures as StorageError so callers can retry them
 */
export function toStorageError(operation: string, error: unknown): unknown {
  const code = getErrorCode(error);
  if (code && CONNECTION_ERROR_CODES.has(code)) {
    const cause = toError(error);
    return new StorageError(operation, cause.message, cause);
  }
  return error;
}
