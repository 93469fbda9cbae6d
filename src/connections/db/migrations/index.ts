import type { MigrationInfo } from './types';

// Import all migrations
import * as migration001 from './20261001_000001_create_users_table';
import * as migration002 from './20261001_000002_create_brands_table';
import * as migration003 from './20261001_000003_create_categories_table';
import * as migration004 from './20261001_000004_create_cosmetic_products_table';
import * as migration005 from './20261001_000005_create_usage_logs_table';

export const migrations: MigrationInfo[] = [
  { name: '20261001_000001_create_users_table', migration: migration001.migration },
  { name: '20261001_000002_create_brands_table', migration: migration002.migration },
  { name: '20261001_000003_create_categories_table', migration: migration003.migration },
  { name: '20261001_000004_create_cosmetic_products_table', migration: migration004.migration },
  { name: '20261001_000005_create_usage_logs_table', migration: migration005.migration },
];
