export { Store, openStore, fromPgPool } from './store';
export type { Queryable, StoreClient, StorePool } from './store';
export { createPool, connectDatabase } from './connection';
export { migrate, rollbackLastMigration } from './migrate';
export { seedDemoData } from './seed';
