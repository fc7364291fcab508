import { pgTable, serial, integer, boolean, text, timestamp, index } from 'drizzle-orm/pg-core';
import { acmeTasks } from './acme-tasks.schema';

// Append-only: one row per execution attempt
export const acmeTaskLogs = pgTable(
  'acme_task_logs',
  {
    id: serial('id').primaryKey(),
    taskId: integer('task_id')
      .notNull()
      .references(() => acmeTasks.id, { onDelete: 'cascade' }),
    isOk: boolean('is_ok').notNull(),
    error: text('error').notNull().default(''),
    createdAt: timestamp('created_at').notNull().defaultNow(),
  },
  (table) => [
    index('acme_task_logs_task_id_idx').on(table.taskId),
    index('acme_task_logs_created_at_idx').on(table.createdAt),
  ],
);

export type AcmeTaskLog = typeof acmeTaskLogs.$inferSelect;
export type NewAcmeTaskLog = typeof acmeTaskLogs.$inferInsert;
