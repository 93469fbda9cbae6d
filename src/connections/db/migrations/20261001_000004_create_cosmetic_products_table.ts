import type { PoolClient } from 'pg';
import type { Migration } from './types';

export const migration: Migration = {
  async up(client: PoolClient) {
    await client.query(`
      CREATE TABLE IF NOT EXISTS cosmetic_products (
        id SERIAL PRIMARY KEY,
        user_id UUID NOT NULL REFERENCES users(id) ON DELETE CASCADE,
        brand_id INTEGER NOT NULL REFERENCES brands(id) ON DELETE CASCADE,
        -- Xóa category thì sản phẩm giữ lại, category_id = NULL
        category_id INTEGER REFERENCES categories(id) ON DELETE SET NULL,
        name VARCHAR(200) NOT NULL,
        shade VARCHAR(100) NOT NULL DEFAULT '',
        capacity VARCHAR(50) NOT NULL DEFAULT '',
        purchase_date DATE NOT NULL DEFAULT CURRENT_DATE,
        price NUMERIC(8, 2),
        purchase_location VARCHAR(200) NOT NULL DEFAULT '',
        production_date DATE,
        expiration_date DATE NOT NULL,
        status VARCHAR(20) NOT NULL DEFAULT 'unopened'
          CHECK (status IN ('unopened', 'opened', 'finished', 'discarded')),
        opened_date DATE,
        -- Period After Opening (months)
        pao_after_opening INTEGER DEFAULT 12 CHECK (pao_after_opening BETWEEN 0 AND 240),
        rating INTEGER CHECK (rating BETWEEN 1 AND 5),
        description TEXT NOT NULL DEFAULT '',
        ingredients TEXT NOT NULL DEFAULT '',
        notes TEXT NOT NULL DEFAULT '',
        image_url VARCHAR(500),
        created_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP,
        updated_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
      )
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_cosmetic_products_user ON cosmetic_products(user_id)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_cosmetic_products_expiration_status ON cosmetic_products(expiration_date, status)
    `);

    await client.query(`
      CREATE INDEX IF NOT EXISTS idx_cosmetic_products_brand_category ON cosmetic_products(brand_id, category_id)
    `);
  },

  async down(client: PoolClient) {
    await client.query('DROP INDEX IF EXISTS idx_cosmetic_products_brand_category');
    await client.query('DROP INDEX IF EXISTS idx_cosmetic_products_expiration_status');
    await client.query('DROP INDEX IF EXISTS idx_cosmetic_products_user');
    await client.query('DROP TABLE IF EXISTS cosmetic_products CASCADE');
  },
};
