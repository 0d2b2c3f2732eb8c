import { dbConfig } from '../config';
import { openStore } from './store';
import { migrate, rollbackLastMigration } from './migrate';
import { seedDemoData } from './seed';
import { logger } from '../../utils/logging';

const commands = ['migrate', 'rollback', 'seed'] as const;
type Command = (typeof commands)[number];

const isCommand = (value: string): value is Command => commands.some((command) => command === value);

const run = async (command: Command) => {
  const store = await openStore(dbConfig);
  try {
    if (command === 'rollback') {
      const name = await rollbackLastMigration(store);
      logger.info(name ? `Rolled back ${name}` : 'Nothing to roll back');
      return;
    }

    const applied = await migrate(store);
    logger.info(`Applied ${applied.length} migration(s)`);

    if (command === 'seed') {
      const summary = await seedDemoData(store);
      logger.info('Seed finished', { ...summary });
    }
  } finally {
    await store.close();
  }
};

const command = process.argv[2] ?? 'migrate';

if (!isCommand(command)) {
  logger.error(`Unknown command "${command}". Expected one of: ${commands.join(', ')}`);
  process.exit(1);
}

run(command).catch((error: unknown) => {
  logger.error('Database command failed', { error: error instanceof Error ? error.stack : String(error) });
  process.exit(1);
});
