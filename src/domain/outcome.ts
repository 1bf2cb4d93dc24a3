import type { Offset } from './offset.js';

/** Where in the processing pipeline an event stopped. */
export type ProcessingStage =
  | 'decode'
  | 'sign_digest'
  | 'fetch_state'
  | 'sign_transaction'
  | 'push'
  | 'done';

export type OutcomeStatus = 'submitted' | 'dropped';

/**
 * Per-event acknowledgment.
 *
 * With the optimistic commit policy the topic offset moves before events
 * finish; this record is what tells an operator which events of a batch
 * actually reached the chain.
 */
export interface EventOutcome {
  readonly offset: Offset;
  readonly sender: string;
  readonly req_id: number;
  readonly event_type: number;
  readonly status: OutcomeStatus;
  readonly stage: ProcessingStage;
  readonly txid: string | null;
  readonly reason: string | null;
  readonly recorded_at: Date;
}
