import dotenv from 'dotenv';
import { PoolConfig } from 'pg';
import { parseIntegerSetting } from './app.config';

dotenv.config();

export const dbConfig = {
  host: process.env.DB_HOST || 'localhost',
  port: parseIntegerSetting('DB_PORT', process.env.DB_PORT, 5432, 1),
  user: process.env.DB_USER || 'postgres',
  password: process.env.DB_PASSWORD || 'postgres',
  database: process.env.DB_NAME || 'orders',
  max: parseIntegerSetting('DB_POOL_MAX', process.env.DB_POOL_MAX, 20, 1),
  // Server-side cap per statement; surfaces as 57014 (query_canceled)
  statement_timeout: parseIntegerSetting('DB_STATEMENT_TIMEOUT_MS', process.env.DB_STATEMENT_TIMEOUT_MS, 5000),
  // Client-side cap, covers a dead connection the server never answers on
  query_timeout: parseIntegerSetting('DB_QUERY_TIMEOUT_MS', process.env.DB_QUERY_TIMEOUT_MS, 7000),
  connectionTimeoutMillis: parseIntegerSetting(
    'DB_CONNECTION_TIMEOUT_MS',
    process.env.DB_CONNECTION_TIMEOUT_MS,
    3000
  ),
} satisfies PoolConfig;
