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
import { acmeUsers } from './acme-users.schema';
import { dnsProviders } from './dns-providers.schema';
import { sslCerts } from './ssl-certs.schema';

/**
 * Issuance tasks. A task covers an ordered list of domains and, once issued,
 * references the certificate it produced (renewals update that certificate in place).
 */
export const acmeTasks = pgTable(
  'acme_tasks',
  {
    id: serial('id').primaryKey(),
    // Owner: userId 0 means the task is admin-owned
    adminId: integer('admin_id').notNull().default(0),
    userId: integer('user_id').notNull().default(0),
    authType: varchar('auth_type', { length: 10 }).notNull().$type<'dns' | 'http'>(),
    acmeUserId: integer('acme_user_id')
      .notNull()
      .references(() => acmeUsers.id),
    // DNS-01 only
    dnsProviderId: integer('dns_provider_id').references(() => dnsProviders.id, {
      onDelete: 'set null',
    }),
    dnsDomain: varchar('dns_domain', { length: 255 }).notNull().default(''),
    domains: jsonb('domains').$type<string[]>().notNull().default([]),
    autoRenew: boolean('auto_renew').notNull().default(true),
    // HTTP-01 only: external endpoint that publishes challenge material
    authUrl: text('auth_url').notNull().default(''),
    isOn: boolean('is_on').notNull().default(true),
    // 1 = live, 0 = deleted
    state: smallint('state').notNull().default(1),
    // 0 pending, 1 done, 2 running, 3 issue failed
    status: smallint('status').notNull().default(0),
    certId: integer('cert_id').references(() => sslCerts.id, { onDelete: 'set null' }),
    async: boolean('async').notNull().default(false),
    // Set while status = running; an expired lease makes the task reclaimable
    leaseExpiresAt: timestamp('lease_expires_at'),
    createdAt: timestamp('created_at').notNull().defaultNow(),
    updatedAt: timestamp('updated_at').notNull().defaultNow(),
  },
  (table) => [
    index('acme_tasks_user_id_idx').on(table.userId),
    index('acme_tasks_cert_id_idx').on(table.certId),
    index('acme_tasks_issuable_idx').on(table.isOn, table.async, table.state, table.certId),
  ],
);


export type AcmeTask = typeof acmeTasks.$inferSelect;
