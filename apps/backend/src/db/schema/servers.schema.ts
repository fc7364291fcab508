import { pgTable, serial, integer, varchar, boolean, smallint, timestamp, jsonb, index } from 'drizzle-orm/pg-core';

export interface SslPolicyRef {
  isOn: boolean;
  sslPolicyId: number;
}

export interface HttpsProtocolConfig {
  isOn: boolean;
  listen: { protocol: string; host: string; portRange: string }[];
  sslPolicyRef?: SslPolicyRef | null;
}

/**
 * Edge hosts as seen by this engine: their server names and HTTPS protocol config.
 * Owned by the serving-configuration subsystem.
 */
export const servers = pgTable(
  'servers',
  {
    id: serial('id').primaryKey(),
    adminId: integer('admin_id').notNull().default(0),
    userId: integer('user_id').notNull().default(0),
    name: varchar('name', { length: 255 }).notNull().default(''),
    isOn: boolean('is_on').notNull().default(true),
    state: smallint('state').notNull().default(1),
    plainServerNames: jsonb('plain_server_names').$type<string[]>().notNull().default([]),
    // null = no HTTPS configured for this host
    https: jsonb('https').$type<HttpsProtocolConfig>(),
    updatedAt: timestamp('updated_at').notNull().defaultNow(),
  },
  (table) => [index('servers_user_id_idx').on(table.userId)],
);

export type Server = typeof servers.$inferSelect;
export type NewServer = typeof servers.$inferInsert;
