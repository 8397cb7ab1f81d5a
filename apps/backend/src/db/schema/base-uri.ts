import { pgTable, serial, varchar, timestamp } from 'drizzle-orm/pg-core';
import { URI_MAX_LENGTH } from '@dataset-lookup/shared';

// Base URIs table: storage location prefixes (bucket or directory roots) that
// datasets live under. Stored in canonical form without a trailing slash.
// Rows are never deleted in normal operation.
export const baseUris = pgTable('base_uris', {
  id: serial('id').primaryKey(),
  baseUri: varchar('base_uri', { length: URI_MAX_LENGTH }).notNull().unique(),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

export type BaseUriRow = typeof baseUris.$inferSelect;
export type NewBaseUriRow = typeof baseUris.$inferInsert;
