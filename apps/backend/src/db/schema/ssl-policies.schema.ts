import {
  pgTable,
  serial,
  integer,
  varchar,
  boolean,
  smallint,
  timestamp,
  jsonb,
} from 'drizzle-orm/pg-core';

export interface SslCertRef {
  isOn: boolean;
  certId: number;
}

export interface HstsConfig {
  isOn: boolean;
  maxAge: number;
  includeSubDomains: boolean;
  preload: boolean;
  domains?: string[];
}

/**
 * TLS policy referenced by one or more hosts. The engine only rewrites `certs`;
 * every other column belongs to the serving-configuration subsystem.
 */
export const sslPolicies = pgTable('ssl_policies', {
  id: serial('id').primaryKey(),
  adminId: integer('admin_id').notNull().default(0),
  userId: integer('user_id').notNull().default(0),
  isOn: boolean('is_on').notNull().default(true),
  state: smallint('state').notNull().default(1),
  certs: jsonb('certs').$type<SslCertRef[]>().notNull().default([]),
  minVersion: varchar('min_version', { length: 20 }).notNull().default('TLS 1.1'),
  http2Enabled: boolean('http2_enabled').notNull().default(false),
  http3Enabled: boolean('http3_enabled').notNull().default(false),
  hsts: jsonb('hsts').$type<HstsConfig>(),
  ocspIsOn: boolean('ocsp_is_on').notNull().default(false),
  clientAuthType: integer('client_auth_type').notNull().default(0),
  clientCaCerts: jsonb('client_ca_certs').$type<SslCertRef[]>(),
  cipherSuitesIsOn: boolean('cipher_suites_is_on').notNull().default(false),
  cipherSuites: jsonb('cipher_suites').$type<string[]>(),
  // Bumped on every write; updates compare-and-swap on it
  version: integer('version').notNull().default(1),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at').notNull().defaultNow(),
});

export type SslPolicy = typeof sslPolicies.$inferSelect;
export type NewSslPolicy = typeof sslPolicies.$inferInsert;
