import {
  pgTable,
  serial,
  integer,
  varchar,
  text,
  boolean,
  smallint,
  timestamp,
  jsonb,
  index,
} from 'drizzle-orm/pg-core';

export const sslCerts = pgTable(
  'ssl_certs',
  {
    id: serial('id').primaryKey(),
    adminId: integer('admin_id').notNull().default(0),
    userId: integer('user_id').notNull().default(0),
    isOn: boolean('is_on').notNull().default(true),
    state: smallint('state').notNull().default(1),
    name: varchar('name', { length: 255 }).notNull(),
    description: text('description').notNull().default(''),
    certData: text('cert_data').notNull(),
    keyData: text('key_data').notNull(),
    timeBeginAt: timestamp('time_begin_at').notNull(),
    timeEndAt: timestamp('time_end_at').notNull(),
    dnsNames: jsonb('dns_names').$type<string[]>().notNull().default([]),
    commonNames: jsonb('common_names').$type<string[]>().notNull().default([]),
    isACME: boolean('is_acme').notNull().default(false),
    // Task that produced the certificate (null for uploaded certificates)
    acmeTaskId: integer('acme_task_id'),
    createdAt: timestamp('created_at').notNull().defaultNow(),
    updatedAt: timestamp('updated_at').notNull().defaultNow(),
  },
  (table) => [
    index('ssl_certs_user_id_idx').on(table.userId),
    index('ssl_certs_time_end_at_idx').on(table.timeEndAt),
  ],
);

export type SslCert = typeof sslCerts.$inferSelect;
export type NewSslCert = typeof sslCerts.$inferInsert;
