import type { PoolConfig } from 'pg';
import './app.config';

export interface DatabaseConfig extends PoolConfig {
  connectRetries: number;
  connectRetryDelayMs: number;
}

/**
 * Integer setting with a floor; unset or non-numeric values take the fallback.
 */
export const parseIntSetting = (value: string | undefined, fallback: number, min: number): number => {
  const parsed = parseInt(value ?? '', 10);
  return Number.isNaN(parsed) ? fallback : Math.max(min, parsed);
};

const buildDatabaseConfig = (): DatabaseConfig => {
  const shared = {
    max: parseInt(process.env.DB_POOL_MAX || '10'),
    idleTimeoutMillis: 30000,
    // At least one attempt, or start-up would skip the connectivity check
    connectRetries: parseIntSetting(process.env.DB_CONNECT_RETRIES, 10, 1),
    connectRetryDelayMs: parseIntSetting(process.env.DB_CONNECT_RETRY_DELAY_MS, 2000, 0),
  };

  if (process.env.DATABASE_URL) {
    return { ...shared, connectionString: process.env.DATABASE_URL };
  }

  return {
    ...shared,
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432'),
    user: process.env.DB_USER || 'postgres',
    password: process.env.DB_PASSWORD || 'postgres',
    database: process.env.DB_NAME || 'autoparts',
  };
};

export const dbConfig = buildDatabaseConfig();
