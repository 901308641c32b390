/**
 * SQLite Schema Definitions
 *
 * Drizzle table definitions for the relational backend. Timestamps are
 * stored as integer milliseconds and surface as Date.
 */

import { sqliteTable, text, integer } from 'drizzle-orm/sqlite-core';

export const installations = sqliteTable('installations', {
  shop: text('shop').primaryKey(),
  accessToken: text('access_token').notNull(),
  scope: text('scope').notNull().default(''),
  installedAt: integer('installed_at', { mode: 'timestamp_ms' }).notNull(),
});

export const widgetConfigs = sqliteTable('widget_configs', {
  shop: text('shop')
    .primaryKey()
    .references(() => installations.shop, { onDelete: 'cascade' }),
  contactNumber: text('contact_number').notNull(),
  initialMessage: text('initial_message').notNull(),
  updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
});

export const analytics = sqliteTable('analytics', {
  shop: text('shop')
    .primaryKey()
    .references(() => installations.shop, { onDelete: 'cascade' }),
  clickCount: integer('click_count').notNull().default(0),
  firstClickAt: integer('first_click_at', { mode: 'timestamp_ms' }),
  lastClickAt: integer('last_click_at', { mode: 'timestamp_ms' }),
});

export const oauthStates = sqliteTable('oauth_states', {
  nonce: text('nonce').primaryKey(),
  shop: text('shop').notNull(),
  issuedAt: integer('issued_at', { mode: 'timestamp_ms' }).notNull(),
  expiresAt: integer('expires_at', { mode: 'timestamp_ms' }).notNull(),
});

/**
 * DDL matching the tables above, applied on open
 */
export const CREATE_TABLES_SQL = `
CREATE TABLE IF NOT EXISTS installations (
  shop TEXT PRIMARY KEY NOT NULL,
  access_token TEXT NOT NULL,
  scope TEXT NOT NULL DEFAULT '',
  installed_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS widget_configs (
  shop TEXT PRIMARY KEY NOT NULL REFERENCES installations(shop) ON DELETE CASCADE,
  contact_number TEXT NOT NULL,
  initial_message TEXT NOT NULL,
  updated_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS analytics (
  shop TEXT PRIMARY KEY NOT NULL REFERENCES installations(shop) ON DELETE CASCADE,
  click_count INTEGER NOT NULL DEFAULT 0,
  first_click_at INTEGER,
  last_click_at INTEGER
);

CREATE TABLE IF NOT EXISTS oauth_states (
  nonce TEXT PRIMARY KEY NOT NULL,
  shop TEXT NOT NULL,
  issued_at INTEGER NOT NULL,
  expires_at INTEGER NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_oauth_states_expires_at ON oauth_states (expires_at);
`;
