import type { Logger } from 'pino';
import { buildSignidiceTransaction, errorMessage } from '../domain/index.js';
import type {
  BrokerEvent,
  ChainClient,
  EventOutcomeRepository,
  KeyMaterial,
  ProcessingStage,
  TransactionHeader,
  SignedTransaction,
} from '../domain/index.js';
import { decodeEvent } from './event-payload.js';
import { rsaSign } from './signer.js';

/** Dependencies bundled for the processor. */
export interface EventProcessorDeps {
  chain: ChainClient;
  keys: KeyMaterial;
  log: Logger;
  outcomes?: EventOutcomeRepository | undefined;
}

/**
 * Answers one broker event.
 *
 * For a signidice part 2 request:
 * decode → RSA-sign digest → fetch chain state → build `sgdicesecond`
 * → sign with the signidice key → push.
 *
 * Every step may fail independently. A failure is logged, recorded as a
 * dropped outcome, and the event is abandoned: no retry, and `process()`
 * never rejects, so one event cannot affect its siblings.
 *
 * Safe to run concurrently: the only shared state is the read-only key
 * material and the chain client.
 */
export class EventProcessor {
  private readonly chain: ChainClient;
  private readonly keys: KeyMaterial;
  private readonly log: Logger;
  private readonly outcomes: EventOutcomeRepository | undefined;

  constructor(deps: EventProcessorDeps) {
    this.chain = deps.chain;
    this.keys = deps.keys;
    this.log = deps.log;
    this.outcomes = deps.outcomes;
  }

  /** Returns the pushed transaction id, or null when the event was dropped. */
  async process(event: BrokerEvent): Promise<string | null> {
    const ctx = { offset: event.offset, sender: event.sender, req_id: event.req_id };
    this.log.debug({ ...ctx, event_type: event.event_type }, 'Processing event');

    const decoded = decodeEvent(event);
    switch (decoded.kind) {
      case 'unsupported':
        return this.drop(event, 'decode', `unsupported event type ${decoded.eventType}`);
      case 'invalid':
        return this.drop(event, 'decode', `couldn't get digest from event: ${decoded.reason}`);
      case 'signidice_part_2':
        return this.answerSignidice(event, decoded.digest);
      default: {
        const unreachable: never = decoded;
        return this.drop(event, 'decode', `unhandled decode result ${String(unreachable)}`);
      }
    }
  }

  private async answerSignidice(event: BrokerEvent, digest: Buffer): Promise<string | null> {
    let signature: string;
    try {
      signature = rsaSign(digest, this.keys.rsaKey);
    } catch (err: unknown) {
      return this.drop(event, 'sign_digest', `couldn't sign signidice_part_2: ${errorMessage(err)}`, err);
    }

    let header: TransactionHeader;
    try {
      header = await this.chain.fetchTransactionHeader();
    } catch (err: unknown) {
      return this.drop(event, 'fetch_state', `failed to get blockchain state: ${errorMessage(err)}`, err);
    }

    const tx = buildSignidiceTransaction({
      header,
      gameContract: event.sender,
      casinoAccount: this.keys.casinoAccount,
      requestId: event.req_id,
      signature,
    });

    let signed: SignedTransaction;
    try {
      signed = await this.chain.signTransaction(tx, this.keys.publicKeys.signidice);
    } catch (err: unknown) {
      return this.drop(event, 'sign_transaction', `couldn't form transaction: ${errorMessage(err)}`, err);
    }

    let txid: string;
    try {
      txid = await this.chain.pushTransaction(signed);
    } catch (err: unknown) {
      return this.drop(event, 'push', `failed to send transaction: ${errorMessage(err)}`, err);
    }

    this.log.info(
      { offset: event.offset, sender: event.sender, req_id: event.req_id, txid },
      'Signed and sent signidice transaction',
    );
    await this.record(event, { status: 'submitted', stage: 'done', txid, reason: null });
    return txid;
  }

  private async drop(
    event: BrokerEvent,
    stage: ProcessingStage,
    reason: string,
    err?: unknown,
  ): Promise<null> {
    const fields = { offset: event.offset, sender: event.sender, req_id: event.req_id, stage };
    if (stage === 'decode') {
      this.log.warn(fields, `Event dropped: ${reason}`);
    } else {
      this.log.error({ ...fields, err }, `Event dropped: ${reason}`);
    }
    await this.record(event, { status: 'dropped', stage, txid: null, reason });
    return null;
  }

  private async record(
    event: BrokerEvent,
    result: { status: 'submitted' | 'dropped'; stage: ProcessingStage; txid: string | null; reason: string | null },
  ): Promise<void> {
    if (!this.outcomes) return;
    try {
      await this.outcomes.record({
        offset: event.offset,
        sender: event.sender,
        req_id: event.req_id,
        event_type: event.event_type,
        ...result,
        recorded_at: new Date(),
      });
    } catch (err: unknown) {
      this.log.error({ err, offset: event.offset, req_id: event.req_id }, 'Failed to record event outcome');
    }
  }
}
