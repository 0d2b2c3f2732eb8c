import type { Pool, QueryResult, QueryResultRow } from 'pg';
import type { DatabaseConfig } from '../config/database.config';
import { connectDatabase, createPool } from './connection';
import { getLogger } from '../../utils/logging';

const log = getLogger('store');

/**
 * Anything that can run a parameterised statement: the store itself for
 * one-off reads, or the client handed to a transaction callback.
 */
export interface Queryable {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>>;
}

export interface StoreClient extends Queryable {
  release(): void;
}

/**
 * The part of a connection pool the store relies on. `fromPgPool` adapts a
 * node-postgres pool; tests supply an in-process database instead.
 */
export interface StorePool extends Queryable {
  connect(): Promise<StoreClient>;
  end(): Promise<void>;
}

export const fromPgPool = (pool: Pool): StorePool => ({
  query: <R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]) =>
    pool.query<R>(text, values),
  connect: async () => {
    const client = await pool.connect();
    return {
      query: <R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]) =>
        client.query<R>(text, values),
      release: () => client.release(),
    };
  },
  end: () => pool.end(),
});

/**
 * Explicit handle on the database. Opened once at start-up, passed to every
 * service, closed at shutdown.
 */
export class Store implements Queryable {
  constructor(private readonly pool: StorePool) {}

  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<QueryResult<R>> {
    return this.pool.query<R>(text, values);
  }

  /**
   * Runs `work` inside BEGIN/COMMIT on a dedicated client. Any error rolls the
   * whole unit back and is re-thrown as is; the client is always released.
   */
  async transaction<T>(work: (db: Queryable) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const result = await work(scopeClient(client));
      await client.query('COMMIT');
      return result;
    } catch (error) {
      await rollbackQuietly(client, error);
      throw error;
    } finally {
      client.release();
    }
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}

const scopeClient = (client: StoreClient): Queryable => ({
  query: <R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]) =>
    client.query<R>(text, values),
});

// A failed ROLLBACK must not mask the error that caused it
const rollbackQuietly = async (client: StoreClient, cause: unknown): Promise<void> => {
  try {
    await client.query('ROLLBACK');
  } catch (rollbackError: unknown) {
    log.error('Rollback failed', {
      error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
      cause: cause instanceof Error ? cause.message : String(cause),
    });
    return;
  }
  log.error('Transaction rolled back', { cause: cause instanceof Error ? cause.message : String(cause) });
};

/**
 * Opens a pool for `config`, waits until the server answers and wraps it.
 */
export const openStore = async (config: DatabaseConfig): Promise<Store> => {
  const pool = createPool(config);
  try {
    await connectDatabase(pool, config.connectRetries, config.connectRetryDelayMs);
  } catch (error) {
    await pool.end();
    throw error;
  }
  return new Store(fromPgPool(pool));
};
