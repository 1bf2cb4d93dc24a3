import type { Offset } from './offset.js';

/**
 * Game event types published by the action monitor.
 * Only `SignidicePartTwoRequest` needs an answer from this service.
 */
export const EventType = {
  GameStarted: 0,
  ActionRequest: 1,
  SignidicePartOneRequest: 2,
  SignidicePartTwoRequest: 3,
  GameFinished: 4,
  GameFailed: 5,
  GameMessage: 6,
} as const;

export type EventTypeId = (typeof EventType)[keyof typeof EventType];

/**
 * One on-chain occurrence as delivered by the broker.
 *
 * `data` is the raw JSON payload the game contract emitted; it is decoded
 * per event kind by the processor.
 */
export interface BrokerEvent {
  readonly offset: Offset;
  readonly sender: string;
  readonly casino_id: number;
  readonly game_id: number;
  readonly req_id: number;
  readonly event_type: number;
  readonly data: unknown;
}

/** A delivery unit: zero or more events plus the offset of the batch itself. */
export interface EventMessage {
  readonly offset: Offset;
  readonly events: readonly BrokerEvent[];
}
