import type { Offset } from './offset.js';
import type { EventMessage } from './event.js';
import type { EventOutcome } from './outcome.js';
import type { SignedTransaction, Transaction, TransactionHeader } from './transaction.js';

/** Durable cursor into the topic. Single writer: the event loop. */
export interface OffsetStore {
  read(): Promise<Offset>;
  write(offset: Offset): Promise<void>;
  close(): Promise<void>;
}

/**
 * Receiving end of a message channel.
 *
 * `receive` resolves with the next message, or `undefined` once the channel
 * is closed or `signal` is aborted. An aborted receive consumes nothing.
 */
export interface MessageSource<T> {
  receive(signal: AbortSignal): Promise<T | undefined>;
}

/**
 * Connection to the event broker.
 *
 * `listen` resolves once the connection is established; batches for active
 * subscriptions are then delivered through `messages`.
 */
export interface EventListener {
  readonly messages: MessageSource<EventMessage>;
  listen(signal: AbortSignal): Promise<void>;
  subscribe(topicId: number, offset: Offset): Promise<boolean>;
  unsubscribe(topicId: number): Promise<boolean>;
  close(): Promise<void>;
}

/** The subset of the chain API this service needs. Safe for concurrent use. */
export interface ChainClient {
  fetchTransactionHeader(): Promise<TransactionHeader>;
  /** Serializes `tx` and signs it with the private key matching `publicKey`. */
  signTransaction(tx: Transaction, publicKey: string): Promise<SignedTransaction>;
  /** Broadcasts and returns the transaction id. */
  pushTransaction(signed: SignedTransaction): Promise<string>;
}

export interface EventOutcomeRepository {
  record(outcome: EventOutcome): Promise<void>;
}
