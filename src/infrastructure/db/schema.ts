import { pgTable, serial, bigint, integer, varchar, timestamp, index } from 'drizzle-orm/pg-core';

/**
 * Drizzle schema for the `event_outcomes` table.
 *
 * One row per processed event. Not unique on (offset, req_id): with the
 * `after_settle` commit policy a batch is replayed after a crash, and
 * every attempt is kept.
 */
export const eventOutcomes = pgTable('event_outcomes', {
  id: serial('id').primaryKey(),
  offset: bigint('offset', { mode: 'number' }).notNull(),
  sender: varchar('sender', { length: 13 }).notNull(),
  req_id: bigint('req_id', { mode: 'number' }).notNull(),
  event_type: integer('event_type').notNull(),
  status: varchar('status', { length: 16 }).notNull(),
  stage: varchar('stage', { length: 32 }).notNull(),
  txid: varchar('txid', { length: 64 }),
  reason: varchar('reason', { length: 1024 }),
  recorded_at: timestamp('recorded_at', { withTimezone: true }).notNull(),
}, (table) => [
  index('idx_event_outcomes_offset').on(table.offset),
  index('idx_event_outcomes_status').on(table.status),
  index('idx_event_outcomes_req_id').on(table.req_id),
]);
