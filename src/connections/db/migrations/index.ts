import { MigrationInfo } from './types';

import * as migration001 from './20261019_000001_create_manufacturers_table';
import * as migration002 from './20261019_000002_create_products_table';
import * as migration003 from './20261019_000003_create_product_relations_table';
import * as migration004 from './20261019_000004_create_sales_history_table';

// Order matters: each table references the ones above it
export const migrations: MigrationInfo[] = [
  { name: '20261019_000001_create_manufacturers_table', migration: migration001.migration },
  { name: '20261019_000002_create_products_table', migration: migration002.migration },
  { name: '20261019_000003_create_product_relations_table', migration: migration003.migration },
  { name: '20261019_000004_create_sales_history_table', migration: migration004.migration },
];

export type { Migration, MigrationInfo } from './types';
