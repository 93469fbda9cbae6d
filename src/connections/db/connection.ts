import { Pool, types } from 'pg';
import { dbConfig } from '../config/database.config';
import { logger } from '../../utils/logging';

// DATE (oid 1082) giữ nguyên dạng 'YYYY-MM-DD', không convert qua timezone của server
types.setTypeParser(1082, (value: string) => value);
// NUMERIC (oid 1700, price) trả về number thay vì string
types.setTypeParser(1700, (value: string) => parseFloat(value));

export const pool = new Pool(dbConfig);

/**
 * Anything that can run a parameterized query (pool hoặc client trong transaction)
 */
export type Queryable = Pick<Pool, 'query'>;

pool.on('error', (err: Error) => {
  logger.error('Unexpected error on idle client', { error: err.message, stack: err.stack });
  process.exit(-1);
});

/**
 * Connect to database and verify connection with retry logic
 * @returns Promise that resolves when database is connected
 */
export const connectDatabase = async (maxRetries: number = 10, retryDelay: number = 2000): Promise<void> => {
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      await pool.query('SELECT NOW()');
      logger.info('Database connected successfully');
      return;
    } catch (err: unknown) {
      lastError = err;
      const message = err instanceof Error ? err.message : String(err);
      if (attempt < maxRetries) {
        logger.warn(`Database connection attempt ${attempt}/${maxRetries} failed, retrying in ${retryDelay}ms...`, { error: message });
        await new Promise(resolve => setTimeout(resolve, retryDelay));
      } else {
        logger.error(`Database connection error after ${maxRetries} attempts:`, { error: message });
      }
    }
  }

  throw lastError;
};
