import { pgTable, serial, integer, varchar, text, smallint, boolean, timestamp, jsonb } from 'drizzle-orm/pg-core';

/**
 * Shared external-account-binding credentials for CAs that only accept
 * pre-provisioned accounts (e.g. ZeroSSL).
 */
export const acmeProviderAccounts = pgTable('acme_provider_accounts', {
  id: serial('id').primaryKey(),
  name: varchar('name', { length: 100 }).notNull(),
  providerCode: varchar('provider_code', { length: 50 }).notNull(),
  eabKid: varchar('eab_kid', { length: 255 }).notNull(),
  eabKey: text('eab_key').notNull(),
  isOn: boolean('is_on').notNull().default(true),
  state: smallint('state').notNull().default(1),
  createdAt: timestamp('created_at').notNull().defaultNow(),
});

/**
 * Registration resource returned by the CA after the account is created
 */
export interface AcmeRegistration {
  uri: string;
  body?: Record<string, unknown>;
}

export const acmeUsers = pgTable('acme_users', {
  id: serial('id').primaryKey(),
  adminId: integer('admin_id').notNull().default(0),
  userId: integer('user_id').notNull().default(0),
  email: varchar('email', { length: 255 }).notNull(),
  // Base64-encoded PEM private key
  privateKey: text('private_key').notNull(),
  registration: jsonb('registration').$type<AcmeRegistration>(),
  // Empty means the system default CA
  providerCode: varchar('provider_code', { length: 50 }).notNull().default(''),
  accountId: integer('account_id').references(() => acmeProviderAccounts.id),
  description: varchar('description', { length: 255 }).notNull().default(''),
  state: smallint('state').notNull().default(1),
  createdAt: timestamp('created_at').notNull().defaultNow(),
});

export type AcmeUser = typeof acmeUsers.$inferSelect;
export type NewAcmeUser = typeof acmeUsers.$inferInsert;
export type AcmeProviderAccount = typeof acmeProviderAccounts.$inferSelect;
