// Database
export { Store, openStore, migrate, rollbackLastMigration, seedDemoData } from './db';
export type { Queryable } from './db';

// Config - All configurations in one place
export { appConfig, logConfig, dbConfig } from './config';
