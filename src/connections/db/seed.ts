import { z } from 'zod';
import { pool } from './connection';
import { logger } from '../../utils/logging';
import { CATEGORY_TYPE_VALUES } from '../../constants/product.constants';
import catalog from './seeds/catalog.json';

const catalogSchema = z.object({
  brands: z.array(z.object({ name: z.string().min(1), description: z.string() })),
  categories: z.array(z.object({ name: z.string().min(1), category_type: z.enum(CATEGORY_TYPE_VALUES) })),
});

export type SeedCatalog = z.infer<typeof catalogSchema>;

/**
 * Insert sample brands and categories. Chạy lại nhiều lần không tạo bản ghi trùng.
 */
export const seed = async (data: SeedCatalog = catalogSchema.parse(catalog)) => {
  const client = await pool.connect();
  try {
    await client.query('BEGIN');

    let brandCount = 0;
    for (const brand of data.brands) {
      const result = await client.query(
        'INSERT INTO brands (name, description) VALUES ($1, $2) ON CONFLICT (name) DO NOTHING',
        [brand.name, brand.description]
      );
      brandCount += result.rowCount ?? 0;
    }

    let categoryCount = 0;
    for (const category of data.categories) {
      const result = await client.query(
        'INSERT INTO categories (name, category_type) VALUES ($1, $2) ON CONFLICT (name, category_type) DO NOTHING',
        [category.name, category.category_type]
      );
      categoryCount += result.rowCount ?? 0;
    }

    await client.query('COMMIT');
    logger.info(`Seeded ${brandCount} brands and ${categoryCount} categories`);
  } catch (error) {
    await client.query('ROLLBACK');
    throw error;
  } finally {
    client.release();
  }
};

// Run if called directly
if (require.main === module) {
  const run = async () => {
    try {
      await seed();
    } catch (error) {
      logger.error('Seed error', { error: error instanceof Error ? error.stack : String(error) });
      process.exitCode = 1;
    } finally {
      await pool.end();
    }
  };

  void run();
}
