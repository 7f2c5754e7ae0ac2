import { pgTable, text, timestamp } from 'drizzle-orm/pg-core';

export const users = pgTable('users', {
  // JWT subject
  id: text('id').primaryKey(),
  displayName: text('display_name'),
  createdAt: timestamp('created_at').defaultNow().notNull(),
});
