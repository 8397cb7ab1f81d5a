import { pgTable, serial, varchar, boolean, timestamp } from 'drizzle-orm/pg-core';

// Users table: identities referenced by authentication tokens.
// Usernames are created once by bulk registration and never renamed;
// is_admin changes only through the dedicated admin-status update.
export const users = pgTable('users', {
  id: serial('id').primaryKey(),
  username: varchar('username', { length: 64 }).notNull().unique(),
  isAdmin: boolean('is_admin').notNull().default(false),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow().notNull(),
});

export type UserRow = typeof users.$inferSelect;
export type NewUserRow = typeof users.$inferInsert;
