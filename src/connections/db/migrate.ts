import type { Queryable, Store } from './store';
import { migrations as defaultMigrations, MigrationInfo } from './migrations';
import { getLogger } from '../../utils/logging';

const log = getLogger('migrate');

// Create migrations table if not exists
const createMigrationsTable = async (db: Queryable) => {
  await db.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) UNIQUE NOT NULL,
      executed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    )
  `);
};

const isMigrationExecuted = async (db: Queryable, name: string): Promise<boolean> => {
  const result = await db.query('SELECT id FROM migrations WHERE name = $1', [name]);
  return result.rows.length > 0;
};

/**
 * Applies every pending migration in order. Each migration and its ledger row
 * commit together; executed ones are skipped, so re-running is a no-op.
 * @returns names of the migrations applied by this call
 */
export const migrate = async (
  store: Store,
  migrations: MigrationInfo[] = defaultMigrations
): Promise<string[]> => {
  await createMigrationsTable(store);

  const applied: string[] = [];
  for (const { name, migration } of migrations) {
    if (await isMigrationExecuted(store, name)) {
      log.debug(`Migration ${name} already executed, skipping`);
      continue;
    }

    await store.transaction(async (db) => {
      await migration.up(db);
      await db.query('INSERT INTO migrations (name) VALUES ($1)', [name]);
    });
    log.info(`Migration ${name} executed successfully`);
    applied.push(name);
  }

  return applied;
};

/**
 * Reverts the most recently executed migration.
 * @returns its name, or null when nothing has been executed
 */
export const rollbackLastMigration = async (
  store: Store,
  migrations: MigrationInfo[] = defaultMigrations
): Promise<string | null> => {
  await createMigrationsTable(store);

  const result = await store.query<{ name: string }>(
    'SELECT name FROM migrations ORDER BY id DESC LIMIT 1'
  );
  if (result.rows.length === 0) {
    log.info('No migrations to rollback');
    return null;
  }

  const lastMigrationName = result.rows[0].name;
  const migrationInfo = migrations.find(m => m.name === lastMigrationName);
  if (!migrationInfo) {
    throw new Error(`Migration ${lastMigrationName} not found in migrations list`);
  }

  await store.transaction(async (db) => {
    await migrationInfo.migration.down(db);
    await db.query('DELETE FROM migrations WHERE name = $1', [lastMigrationName]);
  });
  log.info(`Migration ${lastMigrationName} rolled back successfully`);

  return lastMigrationName;
};
