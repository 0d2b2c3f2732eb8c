import { Pool } from 'pg';
import type { DatabaseConfig } from '../config/database.config';
import { logger } from '../../utils/logging';

const sleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Creates the pg pool for the given configuration. Idle-client errors are
 * logged; the pool itself replaces the broken client.
 */
export const createPool = (config: DatabaseConfig): Pool => {
  const { connectRetries, connectRetryDelayMs, ...poolConfig } = config;
  const pool = new Pool(poolConfig);

  pool.on('error', (err: Error) => {
    logger.error('Unexpected error on idle client', { error: err.message, stack: err.stack });
  });

  return pool;
};

/**
 * Connect to database and verify connection with retry logic
 * @returns Promise that resolves when database is connected
 */
export const connectDatabase = async (
  pool: Pick<Pool, 'query'>,
  maxRetries: number = 10,
  retryDelay: number = 2000
): Promise<void> => {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await pool.query('SELECT NOW()');
      logger.info('Database connected successfully');
      return;
    } catch (err: unknown) {
      const message = err instanceof Error ? err.message : String(err);
      if (attempt >= maxRetries) {
        logger.error(`Database connection error after ${maxRetries} attempts`, { error: message });
        throw err;
      }
      logger.warn(`Database connection attempt ${attempt}/${maxRetries} failed, retrying in ${retryDelay}ms...`, { error: message });
      await sleep(retryDelay);
    }
  }
};
