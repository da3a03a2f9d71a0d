import dotenv from 'dotenv';
import { CONCURRENCY_MODE, ConcurrencyMode, isConcurrencyMode } from '../../constants/order.constants';

dotenv.config();

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
 * Read an integer setting, falling back to `fallback` when unset.
 * Throws at start-up when the value is present but not an integer >= `min`.
 */
export const parseIntegerSetting = (
  name: string,
  raw: string | undefined,
  fallback: number,
  min: number = 0
): number => {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  const value = Number(raw);
  if (!Number.isInteger(value) || value < min) {
    throw new Error(`${name} must be an integer >= ${min}, got "${raw}"`);
  }
  return value;
};

export const parseConcurrencyMode = (raw: string | undefined): ConcurrencyMode => {
  if (raw === undefined || raw.trim() === '') {
    return CONCURRENCY_MODE.SERIALIZABLE;
  }

  const value = raw.trim().toLowerCase();
  if (isConcurrencyMode(value)) {
    return value;
  }
  throw new Error(
    `ORDER_CONCURRENCY_MODE must be "${CONCURRENCY_MODE.SERIALIZABLE}" or "${CONCURRENCY_MODE.OPTIMISTIC}", got "${raw}"`
  );
};

export const appConfig = {
  port: parseIntegerSetting('APP_PORT', process.env.APP_PORT || process.env.PORT, 3000, 1),
  nodeEnv: process.env.NODE_ENV || 'development',
  corsOrigins: parseCorsOrigins(),
};

export const orderConfig = {
  concurrencyMode: parseConcurrencyMode(process.env.ORDER_CONCURRENCY_MODE),
  maxAttempts: parseIntegerSetting('ORDER_MAX_ATTEMPTS', process.env.ORDER_MAX_ATTEMPTS, 3, 1),
  backoffBaseMs: parseIntegerSetting('ORDER_BACKOFF_BASE_MS', process.env.ORDER_BACKOFF_BASE_MS, 25),
  backoffMaxMs: parseIntegerSetting('ORDER_BACKOFF_MAX_MS', process.env.ORDER_BACKOFF_MAX_MS, 250),
};

export const logConfig = {
  level: (process.env.LOG_LEVEL || 'info').toLowerCase(),
  dir: process.env.LOG_DIR || '',
  // File transports stay off under test runs
  toFile: appConfig.nodeEnv !== 'test' && (process.env.LOG_TO_FILE || 'true') !== 'false',
};
