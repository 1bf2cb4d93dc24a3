import type { Logger } from 'pino';
import { nextOffset } from '../domain/index.js';
import type { BrokerEvent, EventMessage, MessageSource, OffsetStore } from '../domain/index.js';
import type { ConcurrencyLimiter } from './concurrency-limiter.js';
import { DEFAULT_FAILURE_POLICY } from './failure-policy.js';
import type { FailurePolicy, FailureSite } from './failure-policy.js';

/**
 * When the offset of a batch is persisted.
 *
 * - `optimistic`   — as soon as every event of the batch has been launched.
 *                    A crash may lose launched-but-unfinished events (at-most-once).
 * - `after_settle` — once every launched event has finished, successfully or not.
 *                    A crash replays the whole batch (at-least-once).
 */
export type CommitPolicy = 'optimistic' | 'after_settle';

export const COMMIT_POLICIES = ['optimistic', 'after_settle'] as const satisfies readonly CommitPolicy[];

/** Anything able to handle one event without rejecting. */
export interface EventHandler {
  process(event: BrokerEvent): Promise<string | null>;
}

/** Dependencies bundled for the loop. */
export interface EventLoopDeps {
  messages: MessageSource<EventMessage>;
  handler: EventHandler;
  offsets: OffsetStore;
  limiter: ConcurrencyLimiter;
  log: Logger;
  commitPolicy: CommitPolicy;
  failurePolicy?: FailurePolicy | undefined;
}

/**
 * Raised out of the loop when a failure site's policy is not `log`;
 * the coordinator applies the policy for `site`.
 */
export class PipelineFailure extends Error {
  readonly site: FailureSite;

  constructor(site: FailureSite, cause: unknown) {
    super(`${site} failed`, { cause });
    this.name = 'PipelineFailure';
    this.site = site;
  }
}

/**
 * Main consumer loop.
 *
 * Idle: waits for the next batch or for `signal`.
 * Dispatching: starts every event of the batch as limiter slots free up,
 * then persists `batch.offset + 1` according to the commit policy.
 *
 * Returns when `signal` is aborted or the channel is closed. Events
 * already launched keep running; `limiter.drain()` waits for them.
 */
export async function runEventLoop(deps: EventLoopDeps, signal: AbortSignal): Promise<void> {
  deps.log.info({ commitPolicy: deps.commitPolicy, concurrency: deps.limiter.limit }, 'Event loop started');

  while (!signal.aborted) {
    const batch = await deps.messages.receive(signal);
    if (batch === undefined) break;
    await dispatchBatch(deps, batch, signal);
  }

  deps.log.info({ reason: signal.aborted ? 'cancelled' : 'channel closed' }, 'Event loop stopped');
}

/**
 * Launches every event of one batch and advances the offset.
 *
 * An event is launched once it holds a limiter slot, so a stalled chain
 * keeps the loop here instead of queueing later batches. If `signal`
 * aborts before every event has started, the offset is left as it was
 * and the batch is delivered again after a restart.
 *
 * An empty batch launches nothing but still advances the offset: it is
 * progress through the topic all the same.
 */
export async function dispatchBatch(
  deps: EventLoopDeps,
  batch: EventMessage,
  signal?: AbortSignal,
): Promise<void> {
  if (batch.events.length === 0) {
    deps.log.debug({ offset: batch.offset }, 'Event message with no events');
  } else {
    deps.log.debug({ offset: batch.offset, count: batch.events.length }, 'Dispatching events');
  }

  const launched: Promise<string | null>[] = [];
  for (const [index, event] of batch.events.entries()) {
    if (!(await deps.limiter.waitForSlot(signal))) {
      deps.log.info(
        { offset: batch.offset, launched: index, total: batch.events.length },
        'Dispatch interrupted, offset not committed',
      );
      return;
    }
    launched.push(
      deps.limiter
        .run(() => deps.handler.process(event))
        .catch((err: unknown) => {
          deps.log.error({ err, offset: event.offset, req_id: event.req_id }, 'Event handler rejected');
          return null;
        }),
    );
  }

  if (deps.commitPolicy === 'after_settle') {
    await Promise.all(launched);
  }

  const offset = nextOffset(batch.offset);
  try {
    await deps.offsets.write(offset);
    deps.log.debug({ offset }, 'Offset written');
  } catch (err: unknown) {
    const policy = deps.failurePolicy ?? DEFAULT_FAILURE_POLICY;
    if (policy.offset_write !== 'log') {
      throw new PipelineFailure('offset_write', err);
    }
    deps.log.error({ err, offset }, 'Failed to write offset');
  }
}
