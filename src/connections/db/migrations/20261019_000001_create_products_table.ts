import { PoolClient } from 'pg';
import { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS products (
        id SERIAL PRIMARY KEY,
        name VARCHAR(255) NOT NULL,
        price NUMERIC(12, 2) NOT NULL CHECK (price >= 0),
        -- Rejects any decrement below zero (SQLSTATE 23514)
        stock_quantity INTEGER NOT NULL DEFAULT 0 CONSTRAINT products_stock_non_negative CHECK (stock_quantity >= 0),
        version INTEGER NOT NULL DEFAULT 1,
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_products_name ON products(name)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_products_name');
    await client.query('DROP TABLE IF EXISTS products CASCADE');
  },
};
