import { Logger } from '@nestjs/common';
import { join } from 'path';
import { migrate } from 'drizzle-orm/postgres-js/migrator';
import { drizzle } from 'drizzle-orm/postgres-js';
import { migrationClient } from './client';

const logger = new Logger('Migrations');

async function main(): Promise<void> {
  // drizzle-kit writes migrations to apps/backend/drizzle
  const migrationsFolder = process.env.MIGRATIONS_DIR || join(process.cwd(), 'drizzle');
  logger.log(`Applying migrations from ${migrationsFolder}`);

  await migrate(drizzle(migrationClient), { migrationsFolder });
  await migrationClient.end();

  logger.log('Migrations completed');
}

main().catch((err: unknown) => {
  logger.error('Migration failed', err instanceof Error ? err.stack : String(err));
  process.exit(1);
});
