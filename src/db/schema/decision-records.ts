import {
  index,
  integer,
  pgTable,
  text,
  timestamp,
  uniqueIndex,
  uuid,
} from 'drizzle-orm/pg-core';
import { DECISION_CATEGORY, PRESSURE_LEVEL } from '../types/index.js';
import { gameSessions } from './game-sessions.js';

// Append-only audit of every recorded decision
export const decisionRecords = pgTable(
  'decision_records',
  {
    id: uuid('id').primaryKey().defaultRandom(),
    sessionId: uuid('session_id')
      .notNull()
      .references(() => gameSessions.id),
    decisionId: text('decision_id').notNull(),
    day: integer('day').notNull(),
    imperialPoints: integer('imperial_points').notNull(),
    insurgentPoints: integer('insurgent_points').notNull(),
    category: text('category', { enum: DECISION_CATEGORY }).notNull(),
    pressure: text('pressure', { enum: PRESSURE_LEVEL }).notNull(),
    context: text('context').notNull(),
    chainParentId: text('chain_parent_id'),
    recordedAt: timestamp('recorded_at').notNull(),
  },
  (table) => [
    uniqueIndex('decision_records_session_decision_uq').on(
      table.sessionId,
      table.decisionId,
    ),
    index('decision_records_session_day_idx').on(table.sessionId, table.day),
  ],
);
