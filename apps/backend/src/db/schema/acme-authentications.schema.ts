import { pgTable, serial, integer, varchar, text, timestamp, index } from 'drizzle-orm/pg-core';
import { acmeTasks } from './acme-tasks.schema';

/**
 * One row per challenge token handed out by the CA. An out-of-process HTTP
 * server answers /.well-known/acme-challenge/{token} from this table.
 */
export const acmeAuthentications = pgTable(
  'acme_authentications',
  {
    id: serial('id').primaryKey(),
    taskId: integer('task_id')
      .notNull()
      .references(() => acmeTasks.id, { onDelete: 'cascade' }),
    domain: varchar('domain', { length: 255 }).notNull(),
    token: varchar('token', { length: 255 }).notNull(),
    key: text('key').notNull(),
    createdAt: timestamp('created_at').notNull().defaultNow(),
  },
  (table) => [index('acme_authentications_token_idx').on(table.token)],
);

export type AcmeAuthentication = typeof acmeAuthentications.$inferSelect;
export type NewAcmeAuthentication = typeof acmeAuthentications.$inferInsert;
