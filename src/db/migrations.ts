import 'dotenv/config';
import { createConsoleLogger, type Logger } from '../utils/logger';
import { createDatabaseClient, DatabaseClient } from './client';

export async function runMigrations(
  db: DatabaseClient,
  logger: Logger = createConsoleLogger('Migration')
): Promise<void> {
  logger.info('Starting database migrations...');
  await db.runMigrations();
  logger.info('Database migrations completed');
}

async function main(): Promise<void> {
  const connectionString = process.env.POSTGRES_CONNECTION_STRING;
  if (!connectionString) {
    console.error('[Migration] POSTGRES_CONNECTION_STRING is not set');
    process.exit(1);
  }

  const db = createDatabaseClient(connectionString);
  try {
    await runMigrations(db);
    console.log('[Migration] Success');
  } catch (error) {
    console.error('[Migration] Failed:', error);
    process.exitCode = 1;
  } finally {
    await db.close();
  }
}

// Run if called directly
if (require.main === module) {
  main().catch((error) => {
    console.error('[Migration] Failed:', error);
    process.exit(1);
  });
}
