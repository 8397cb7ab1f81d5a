import { pgTable, integer, primaryKey, index } from 'drizzle-orm/pg-core';
import { users } from './user.js';
import { baseUris } from './base-uri.js';

// Search permissions: many-to-many between users and the base URIs they may
// list, search and look up datasets in.
// Composite primary key makes a repeated grant a no-op.
export const searchPermissions = pgTable(
  'search_permissions',
  {
    userId: integer('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    baseUriId: integer('base_uri_id')
      .notNull()
      .references(() => baseUris.id, { onDelete: 'cascade' }),
  },
  (table) => [
    primaryKey({ columns: [table.userId, table.baseUriId] }),
    index('search_permissions_base_uri_id_idx').on(table.baseUriId),
  ],
);

// Register permissions: independent of search; grants write scope.
export const registerPermissions = pgTable(
  'register_permissions',
  {
    userId: integer('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    baseUriId: integer('base_uri_id')
      .notNull()
      .references(() => baseUris.id, { onDelete: 'cascade' }),
  },
  (table) => [
    primaryKey({ columns: [table.userId, table.baseUriId] }),
    index('register_permissions_base_uri_id_idx').on(table.baseUriId),
  ],
);

export type SearchPermissionRow = typeof searchPermissions.$inferSelect;
export type RegisterPermissionRow = typeof registerPermissions.$inferSelect;
