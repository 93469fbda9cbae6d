import type { PoolClient } from 'pg';
import type { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS usage_logs (
        id SERIAL PRIMARY KEY,
        product_id INTEGER NOT NULL REFERENCES cosmetic_products(id) ON DELETE CASCADE,
        used_at TIMESTAMP NOT NULL DEFAULT CURRENT_TIMESTAMP,
        notes TEXT NOT NULL DEFAULT ''
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_usage_logs_product_used_at ON usage_logs(product_id, used_at DESC)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_usage_logs_product_used_at');
    await client.query('DROP TABLE IF EXISTS usage_logs CASCADE');
  },
};
