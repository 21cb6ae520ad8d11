import { drizzle } from 'drizzle-orm/postgres-js';
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import postgres from 'postgres';
import { resolve, dirname } from 'path';
import { fileURLToPath } from 'url';
import { config } from 'dotenv';
import { createLogger } from '@mailpilot/utils';

const logger = createLogger({ service: 'migrate' });

// Load .env from project root
const packageDir = resolve(dirname(fileURLToPath(import.meta.url)), '..');
config({ path: resolve(packageDir, '../../.env') });

async function runMigrations(): Promise<void> {
  const databaseUrl = process.env['DATABASE_URL'];

  if (!databaseUrl) {
    logger.error('DATABASE_URL environment variable is required');
    process.exitCode = 1;
    return;
  }

  logger.info('Connecting to database');
  const sql = postgres(databaseUrl, { max: 1 });
  const db = drizzle(sql);

  logger.info('Running migrations');
  try {
    await migrate(db, { migrationsFolder: resolve(packageDir, 'drizzle') });
    logger.info('Migrations completed');
  } catch (error) {
    logger.error({ error }, 'Migration failed');
    process.exitCode = 1;
  } finally {
    await sql.end();
  }
}

void runMigrations();
