// Database
export { pool, connectDatabase, migrate, rollback } from './db';
export type { Queryable } from './db';

// Config - All configurations in one place
export {
  appConfig,
  dbConfig,
} from './config';
