import { pool, withTransaction } from './connection';
import { migrations } from './migrations';
import { Migration } from './migrations/types';
import { logger } from '../../utils/logging';

const createMigrationsTable = async () => {
  await pool.query(`
    CREATE TABLE IF NOT EXISTS migrations (
      id SERIAL PRIMARY KEY,
      name VARCHAR(255) UNIQUE NOT NULL,
      executed_at TIMESTAMP DEFAULT CURRENT_TIMESTAMP
    )
  `);
};

const isMigrationExecuted = async (name: string): Promise<boolean> => {
  const result = await pool.query(
    'SELECT id FROM migrations WHERE name = $1',
    [name]
  );
  return result.rows.length > 0;
};

// Schema change and bookkeeping row commit together
const runMigration = async (name: string, migration: Migration) => {
  await withTransaction(async (client) => {
    await migration.up(client);
    await client.query('INSERT INTO migrations (name) VALUES ($1)', [name]);
  });
  logger.info(`Migration ${name} executed successfully`);
};

const rollbackMigration = async (name: string, migration: Migration) => {
  await withTransaction(async (client) => {
    await migration.down(client);
    await client.query('DELETE FROM migrations WHERE name = $1', [name]);
  });
  logger.info(`Migration ${name} rolled back successfully`);
};

export const migrate = async (): Promise<void> => {
  logger.info('Starting database migrations...');
  await createMigrationsTable();
  logger.info(`Found ${migrations.length} migration files`);

  for (const { name, migration } of migrations) {
    if (await isMigrationExecuted(name)) {
      logger.info(`Migration ${name} already executed, skipping`);
      continue;
    }
    await runMigration(name, migration);
  }

  logger.info('All migrations completed successfully');
};

export const rollback = async (): Promise<void> => {
  logger.info('Rolling back last migration...');
  await createMigrationsTable();

  const result = await pool.query<{ name: string }>(
    'SELECT name FROM migrations ORDER BY executed_at DESC, id DESC LIMIT 1'
  );

  if (result.rows.length === 0) {
    logger.info('No migrations to rollback');
    return;
  }

  const lastMigrationName = result.rows[0].name;
  const migrationInfo = migrations.find(m => m.name === lastMigrationName);

  if (!migrationInfo) {
    logger.error(`Migration ${lastMigrationName} not found in migrations list`);
    return;
  }

  await rollbackMigration(lastMigrationName, migrationInfo.migration);
};

if (require.main === module) {
  const command = process.argv[2];
  const task = command === 'rollback' ? rollback : migrate;

  void task()
    .catch((error: unknown) => {
      logger.error('Migration error', { error: error instanceof Error ? error.stack : error });
      process.exitCode = 1;
    })
    .finally(() => pool.end());
}
