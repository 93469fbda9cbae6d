import type { PoolClient } from 'pg';
import type { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS categories (
        id SERIAL PRIMARY KEY,
        name VARCHAR(50) NOT NULL,
        category_type VARCHAR(20) NOT NULL
          CHECK (category_type IN ('skincare', 'makeup', 'fragrance', 'hair', 'body', 'other')),
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        CONSTRAINT uq_categories_name_type UNIQUE (name, category_type)
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_categories_type_name ON categories(category_type, name)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_categories_type_name');
    await client.query('DROP TABLE IF EXISTS categories CASCADE');
  },
};
