import {
  index,
  integer,
  jsonb,
  pgTable,
  text,
  timestamp,
  uuid,
} from 'drizzle-orm/pg-core';
import { SESSION_STATUS } from '../types/index.js';
import type { SessionState } from '../types/index.js';
import { users } from './users.js';

export const gameSessions = pgTable(
  'game_sessions',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    userId: text('user_id')
      .notNull()
      .references(() => users.id),
    status: text('status', { enum: SESSION_STATUS })
      .notNull()
      .default('SESSION_ACTIVE'),
    // optimistic concurrency: bumped on every write
    version: integer('version').notNull().default(0),
    day: integer('day').notNull().default(1),
    seed: text('seed').notNull(),
    rngCursor: integer('rng_cursor').notNull().default(0),
    state: jsonb('state').$type<SessionState>().notNull(),
    startedAt: timestamp('started_at').defaultNow().notNull(),
    updatedAt: timestamp('updated_at').defaultNow().notNull(),
  },
  (table) => [
    index('game_sessions_user_status_idx').on(table.userId, table.status),
  ],
);
