import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS orders (
        id SERIAL PRIMARY KEY,
        user_id VARCHAR(64) NOT NULL,
        order_number VARCHAR(50) UNIQUE NOT NULL,
        total_amount NUMERIC(30, 2) NOT NULL,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_user ON orders(user_id)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_orders_created_at ON orders(created_at DESC)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_orders_created_at');
    await client.query('DROP INDEX IF EXISTS idx_orders_user');
    await client.query('DROP TABLE IF EXISTS orders CASCADE');
  },
};
