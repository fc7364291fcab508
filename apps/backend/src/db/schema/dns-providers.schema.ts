import { pgTable, serial, integer, varchar, smallint, timestamp, jsonb } from 'drizzle-orm/pg-core';

export const dnsProviders = pgTable('dns_providers', {
  id: serial('id').primaryKey(),
  adminId: integer('admin_id').notNull().default(0),
  userId: integer('user_id').notNull().default(0),
  name: varchar('name', { length: 100 }).notNull(),
  // Provider implementation code, e.g. 'cloudflare'
  type: varchar('type', { length: 50 }).notNull(),
  // Credentials as stored by the provider settings form (shape depends on type)
  apiParams: jsonb('api_params').$type<Record<string, unknown>>().notNull().default({}),
  minTtl: integer('min_ttl').notNull().default(0),
  state: smallint('state').notNull().default(1),
  createdAt: timestamp('created_at').notNull().defaultNow(),
});

export type DnsProviderRecord = typeof dnsProviders.$inferSelect;
export type NewDnsProviderRecord = typeof dnsProviders.$inferInsert;
