import dotenv from 'dotenv';

dotenv.config();

const nodeEnv = process.env.NODE_ENV || 'development';

/**
 * Parse CORS origins from environment variable
 * Supports comma or space separated values
 */
const parseCorsOrigins = (): string[] => {
  const corsOrigins = process.env.CORS_ORIGINS || '';
  if (!corsOrigins) {
    return [];
  }

  return corsOrigins
    .split(/[,\s]+/)
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
};

/**
 * Reads a boolean flag; anything other than true/1/yes counts as false.
 */
export const parseFlag = (value: string | undefined, fallback: boolean): boolean => {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  return ['true', '1', 'yes'].includes(value.trim().toLowerCase());
};

export const appConfig = {
  port: parseInt(process.env.APP_PORT || process.env.PORT || '3000'),
  nodeEnv,
  corsOrigins: parseCorsOrigins(),
  // Demo rows are only inserted into empty tables, so leaving this on is safe
  seedDemoData: parseFlag(process.env.SEED_DEMO_DATA, nodeEnv !== 'production'),
};

export const logConfig = {
  level: (process.env.LOG_LEVEL || (nodeEnv === 'test' ? 'warn' : 'info')).toLowerCase(),
  dir: process.env.LOG_DIR || './logs',
  toFile: parseFlag(process.env.LOG_TO_FILE, nodeEnv === 'production'),
  silentConsole: nodeEnv === 'test',
  maxSize: '10MB',
  retention: '30d',
  zippedArchive: true,
};
