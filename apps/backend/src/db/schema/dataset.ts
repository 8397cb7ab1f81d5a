import { pgTable, serial, varchar, integer, timestamp, index } from 'drizzle-orm/pg-core';
import { DATASET_NAME_MAX_LENGTH, URI_MAX_LENGTH } from '@dataset-lookup/shared';
import { baseUris } from './base-uri.js';

// Datasets table: admin records. The URI is the dedup key; the same UUID may
// appear under several URIs when a dataset is copied between base URIs.
// Rows are immutable once created; only the descriptive document is refreshed.
export const datasets = pgTable(
  'datasets',
  {
    id: serial('id').primaryKey(),
    uuid: varchar('uuid', { length: 36 }).notNull(),
    // Unique constraint rejects the loser of two concurrent first registrations
    uri: varchar('uri', { length: URI_MAX_LENGTH }).notNull().unique(),
    baseUriId: integer('base_uri_id')
      .notNull()
      .references(() => baseUris.id),
    name: varchar('name', { length: DATASET_NAME_MAX_LENGTH }).notNull(),
    createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
  },
  (table) => [
    // lookup_datasets/<uuid>
    index('datasets_uuid_idx').on(table.uuid),
    // Listing the datasets of a base URI
    index('datasets_base_uri_id_idx').on(table.baseUriId),
  ],
);

export type DatasetRow = typeof datasets.$inferSelect;
export type NewDatasetRow = typeof datasets.$inferInsert;
