import type { EventOutcome, EventOutcomeRepository } from '../../domain/index.js';
import type { Database, Sql } from './client.js';
import { eventOutcomes } from './schema.js';

/**
 * Creates the outcome table if missing.
 *
 * drizzle-kit migrations (see drizzle.config.ts) are the production path;
 * this keeps a fresh local database usable on first run.
 */
export async function ensureOutcomeTable(sql: Sql): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS event_outcomes (
      id           SERIAL PRIMARY KEY,
      "offset"     BIGINT        NOT NULL,
      sender       VARCHAR(13)   NOT NULL,
      req_id       BIGINT        NOT NULL,
      event_type   INTEGER       NOT NULL,
      status       VARCHAR(16)   NOT NULL,
      stage        VARCHAR(32)   NOT NULL,
      txid         VARCHAR(64),
      reason       VARCHAR(1024),
      recorded_at  TIMESTAMPTZ   NOT NULL
    )
  `);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_event_outcomes_offset ON event_outcomes ("offset")`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_event_outcomes_status ON event_outcomes (status)`);
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_event_outcomes_req_id ON event_outcomes (req_id)`);
}

/** Appends one row per outcome. */
export class DrizzleOutcomeRepository implements EventOutcomeRepository {
  constructor(private readonly db: Database) {}

  async record(outcome: EventOutcome): Promise<void> {
    await this.db.insert(eventOutcomes).values({
      offset: outcome.offset,
      sender: outcome.sender,
      req_id: outcome.req_id,
      event_type: outcome.event_type,
      status: outcome.status,
      stage: outcome.stage,
      txid: outcome.txid,
      reason: outcome.reason === null ? null : outcome.reason.slice(0, 1024),
      recorded_at: outcome.recorded_at,
    });
  }
}
