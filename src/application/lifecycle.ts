import type { EventEmitter } from 'node:events';
import type { Logger } from 'pino';
import { BrokerError } from '../domain/index.js';
import type { EventListener, Offset, OffsetStore } from '../domain/index.js';
import { ConcurrencyLimiter } from './concurrency-limiter.js';
import { PipelineFailure, runEventLoop } from './event-loop.js';
import type { CommitPolicy, EventHandler } from './event-loop.js';
import { DEFAULT_FAILURE_POLICY } from './failure-policy.js';
import type { FailurePolicy, FailureSite } from './failure-policy.js';

/** The part of a Fastify instance the coordinator drives. */
export interface HttpServer {
  listen(options: { host: string; port: number }): Promise<string>;
  close(): PromiseLike<unknown>;
}

export interface AppSettings {
  host: string;
  port: number;
  topicId: number;
  /** When set, wins over the stored offset. */
  topicOffset?: Offset | undefined;
  commitPolicy: CommitPolicy;
  eventConcurrency: number;
}

export interface AppDeps {
  settings: AppSettings;
  server: HttpServer;
  broker: EventListener;
  offsets: OffsetStore;
  handler: EventHandler;
  log: Logger;
  failurePolicy?: FailurePolicy | undefined;
  /** Source of OS signals; `process` outside tests. */
  signals?: Pick<EventEmitter, 'once' | 'off'> | undefined;
  exit?: ((code: number) => void) | undefined;
}

const SHUTDOWN_SIGNALS = ['SIGINT', 'SIGTERM'] as const;

/**
 * Lifecycle coordinator.
 *
 * Runs three tasks under one AbortController:
 * 1) HTTP server
 * 2) broker connection → subscribe at the starting offset → event loop
 * 3) OS signal watcher
 *
 * A signal aborts cleanly. A task failure is handled per the failure
 * policy: `cancel` aborts and is rethrown from `run()`; `exit` logs fatal
 * and terminates the process without a graceful shutdown.
 */
export class App {
  private readonly settings: AppSettings;
  private readonly server: HttpServer;
  private readonly broker: EventListener;
  private readonly offsets: OffsetStore;
  private readonly handler: EventHandler;
  private readonly log: Logger;
  private readonly failurePolicy: FailurePolicy;
  private readonly signals: Pick<EventEmitter, 'once' | 'off'>;
  private readonly exit: (code: number) => void;
  private readonly limiter: ConcurrencyLimiter;

  private subscribed = false;

  constructor(deps: AppDeps) {
    this.settings = deps.settings;
    this.server = deps.server;
    this.broker = deps.broker;
    this.offsets = deps.offsets;
    this.handler = deps.handler;
    this.log = deps.log;
    this.failurePolicy = deps.failurePolicy ?? DEFAULT_FAILURE_POLICY;
    this.signals = deps.signals ?? process;
    this.exit = deps.exit ?? ((code: number) => process.exit(code));
    this.limiter = new ConcurrencyLimiter(deps.settings.eventConcurrency);
  }

  /** Event work accepted and not yet settled. */
  get inFlight(): number {
    return this.limiter.pending;
  }

  /**
   * Blocks until every task has observed cancellation.
   * Resolves on signal-driven shutdown; rejects with the first propagated error.
   */
  async run(): Promise<void> {
    const ac = new AbortController();
    const outcome: { failed: boolean; error?: unknown } = { failed: false };

    const fail = (site: FailureSite, err: unknown): void => {
      const action = this.failurePolicy[site];
      if (action === 'log') {
        this.log.error({ err, site }, 'Task failed');
        return;
      }
      if (action === 'exit') {
        this.log.fatal({ err, site }, 'Unrecoverable failure, exiting');
        this.exit(1);
      } else {
        this.log.error({ err, site }, 'Task failed, shutting down');
      }
      if (!outcome.failed) {
        outcome.failed = true;
        outcome.error = err;
      }
      ac.abort();
    };

    await Promise.all([
      this.serveHttp(ac.signal, fail),
      this.consumeEvents(ac, fail),
      this.watchSignals(ac),
    ]);

    await this.shutdown();

    if (outcome.failed) {
      throw outcome.error;
    }
  }

  private async serveHttp(
    signal: AbortSignal,
    fail: (site: FailureSite, err: unknown) => void,
  ): Promise<void> {
    this.log.debug('Starting http server');
    try {
      const address = await this.server.listen({ host: this.settings.host, port: this.settings.port });
      this.log.info({ address }, 'HTTP server listening');
    } catch (err: unknown) {
      fail('http_listen', err);
      return;
    }
    await whenAborted(signal);
  }

  private async consumeEvents(
    ac: AbortController,
    fail: (site: FailureSite, err: unknown) => void,
  ): Promise<void> {
    const { signal } = ac;

    this.log.debug('Starting event listener');
    try {
      await this.broker.listen(signal);
    } catch (err: unknown) {
      fail('broker_listen', err);
      return;
    }
    if (signal.aborted) return;

    const offset = await this.startingOffset(fail);
    if (offset === null) return;

    try {
      const accepted = await this.broker.subscribe(this.settings.topicId, offset);
      if (!accepted) {
        throw new BrokerError(`subscription to topic ${this.settings.topicId} was refused`);
      }
      this.subscribed = true;
    } catch (err: unknown) {
      fail('broker_subscribe', err);
      return;
    }

    this.log.info({ topicId: this.settings.topicId, offset }, 'Starting event processor');

    try {
      await runEventLoop(
        {
          messages: this.broker.messages,
          handler: this.handler,
          offsets: this.offsets,
          limiter: this.limiter,
          log: this.log,
          commitPolicy: this.settings.commitPolicy,
          failurePolicy: this.failurePolicy,
        },
        signal,
      );
    } catch (err: unknown) {
      if (err instanceof PipelineFailure) {
        fail(err.site, err.cause);
      } else {
        fail('broker_stream', err);
      }
      return;
    }

    // The loop only returns on its own when the broker closed the stream.
    if (!signal.aborted) {
      fail('broker_stream', new BrokerError('event stream closed by broker'));
    }
  }

  /** Returns null when reading the stored offset failed and the policy stopped startup. */
  private async startingOffset(fail: (site: FailureSite, err: unknown) => void): Promise<Offset | null> {
    if (this.settings.topicOffset !== undefined) {
      this.log.info({ offset: this.settings.topicOffset }, 'Using configured topic offset');
      return this.settings.topicOffset;
    }

    try {
      const offset = await this.offsets.read();
      this.log.debug({ offset }, 'Read stored offset');
      return offset;
    } catch (err: unknown) {
      if (this.failurePolicy.offset_read !== 'log') {
        fail('offset_read', err);
        return null;
      }
      this.log.warn({ err }, 'No usable stored offset, starting from 0');
      return 0;
    }
  }

  private async watchSignals(ac: AbortController): Promise<void> {
    const onSignal = (sig: NodeJS.Signals): void => {
      this.log.info({ signal: sig }, 'Shutdown signal received');
      ac.abort();
    };

    for (const sig of SHUTDOWN_SIGNALS) {
      this.signals.once(sig, onSignal);
    }
    await whenAborted(ac.signal);
    for (const sig of SHUTDOWN_SIGNALS) {
      this.signals.off(sig, onSignal);
    }
  }

  /**
   * Order: unsubscribe → close broker → wait for in-flight events → close HTTP.
   * Each step is best-effort; a failure is logged and the next step still runs.
   */
  private async shutdown(): Promise<void> {
    this.log.info('Shutting down...');

    if (this.subscribed) {
      try {
        await this.broker.unsubscribe(this.settings.topicId);
      } catch (err: unknown) {
        this.log.warn({ err }, 'Failed to unsubscribe from topic');
      }
      this.subscribed = false;
    }

    try {
      await this.broker.close();
    } catch (err: unknown) {
      this.log.warn({ err }, 'Failed to close broker connection');
    }

    if (this.limiter.pending > 0) {
      this.log.info({ inFlight: this.limiter.pending }, 'Waiting for in-flight events');
    }
    await this.limiter.drain();

    try {
      await this.server.close();
    } catch (err: unknown) {
      this.log.warn({ err }, 'Failed to close HTTP server');
    }

    this.log.info('Shutdown complete');
  }
}

function whenAborted(signal: AbortSignal): Promise<void> {
  if (signal.aborted) return Promise.resolve();
  return new Promise((resolve) => {
    signal.addEventListener('abort', () => resolve(), { once: true });
  });
}
