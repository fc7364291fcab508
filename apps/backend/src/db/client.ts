import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import * as schema from './schema';

function resolveConnectionString(): string {
  if (process.env.DATABASE_URL) {
    return process.env.DATABASE_URL;
  }
  const password = process.env.POSTGRES_PASSWORD || 'devpassword';
  const host = process.env.POSTGRES_HOST || 'localhost';
  return `postgresql://postgres:${password}@${host}:5432/acme`;
}

const connectionString = resolveConnectionString();

// Shared pool for the engine's queries
const queryClient = postgres(connectionString, {
  max: parseInt(process.env.DB_POOL_SIZE || '5', 10),
  onnotice: () => undefined,
});
export const db = drizzle(queryClient, { schema });

export type Database = typeof db;

// Single connection for drizzle-kit migrations
export const migrationClient = postgres(connectionString, { max: 1 });
