import WebSocket from 'ws';
import type { Logger } from 'pino';
import { z } from 'zod';
import { BrokerError } from '../../domain/index.js';
import type { BrokerEvent, EventListener, EventMessage, Offset } from '../../domain/index.js';
import { Channel } from './channel.js';

const DEFAULT_REQUEST_TIMEOUT_MS = 10_000;
const CLOSE_TIMEOUT_MS = 2_000;

/** `JSON.parse` rounds integers past 2^53; such values are rejected, never used. */
const uint = z.number().int().nonnegative().safe();

const brokerEventSchema = z.object({
  offset: uint,
  sender: z.string(),
  casino_id: uint,
  game_id: uint,
  req_id: uint,
  event_type: z.number().int().safe(),
  data: z.unknown(),
});

/**
 * Server push carrying one batch. An empty batch may encode `events` as null.
 * Events are validated one by one so a malformed event does not cost its
 * siblings or the batch offset.
 */
const pushSchema = z.object({
  method: z.literal('send'),
  params: z.object({
    offset: uint,
    events: z.array(z.unknown()).nullable().default([]),
  }),
});

const responseSchema = z.object({
  id: z.number().int(),
  result: z.unknown().optional(),
  error: z
    .union([z.string(), z.object({ code: z.number().optional(), message: z.string() })])
    .nullable()
    .optional(),
});

interface PendingRequest {
  method: string;
  resolve: (result: unknown) => void;
  reject: (err: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

export interface ActionMonitorClientOptions {
  url: string;
  log: Logger;
  requestTimeoutMs?: number | undefined;
}

/** Topic names are derived from the numeric event type. */
export function topicName(topicId: number): string {
  return `event_${topicId}`;
}

/**
 * WebSocket client for the action monitor.
 *
 * Requests are JSON objects `{ id, method, params }` answered by
 * `{ id, result, error }`. Batches for active subscriptions arrive as
 * `{ method: "send", params: { offset, events } }` and are pushed onto
 * `messages` in arrival order.
 *
 * The connection is never re-established: when it drops, `messages` is
 * closed and the event loop stops.
 */
export class ActionMonitorClient implements EventListener {
  readonly messages = new Channel<EventMessage>();

  private readonly url: string;
  private readonly log: Logger;
  private readonly requestTimeoutMs: number;
  private readonly pending = new Map<number, PendingRequest>();
  private socket: WebSocket | null = null;
  private nextId = 1;

  constructor(options: ActionMonitorClientOptions) {
    this.url = options.url;
    this.log = options.log;
    this.requestTimeoutMs = options.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  }

  /**
   * Connects and resolves once the socket is open.
   * Aborting `signal` before then cancels the attempt.
   */
  async listen(signal: AbortSignal): Promise<void> {
    if (this.socket !== null) {
      throw new BrokerError('action monitor client is already listening');
    }
    if (signal.aborted) {
      throw new BrokerError('connection to action monitor aborted');
    }

    const socket = new WebSocket(this.url);
    this.socket = socket;

    try {
      await new Promise<void>((resolve, reject) => {
        const cleanup = (): void => {
          socket.off('open', onOpen);
          socket.off('error', onError);
          signal.removeEventListener('abort', onAbort);
        };
        const onOpen = (): void => {
          cleanup();
          resolve();
        };
        const onError = (err: Error): void => {
          cleanup();
          reject(new BrokerError(`failed to connect to action monitor at ${this.url}`, { cause: err }));
        };
        const onAbort = (): void => {
          cleanup();
          socket.terminate();
          reject(new BrokerError('connection to action monitor aborted'));
        };
        socket.on('open', onOpen);
        socket.on('error', onError);
        signal.addEventListener('abort', onAbort, { once: true });
      });
    } catch (err: unknown) {
      this.socket = null;
      throw err;
    }

    socket.on('message', (data: WebSocket.RawData) => this.handleMessage(data));
    socket.on('error', (err: Error) => {
      this.log.error({ err }, 'Action monitor connection error');
    });
    socket.on('close', (code: number, reason: Buffer) => {
      this.log.info({ code, reason: reason.toString() }, 'Action monitor connection closed');
      this.socket = null;
      this.rejectPending(new BrokerError('action monitor connection closed'));
      this.messages.close();
    });

    this.log.info({ url: this.url }, 'Connected to action monitor');
  }

  async subscribe(topicId: number, offset: Offset): Promise<boolean> {
    const result = await this.request('subscribe', { topic: topicName(topicId), offset });
    this.log.info({ topic: topicName(topicId), offset, accepted: result === true }, 'Subscribe request answered');
    return result === true;
  }

  async unsubscribe(topicId: number): Promise<boolean> {
    const result = await this.request('unsubscribe', { topic: topicName(topicId) });
    this.log.info({ topic: topicName(topicId), accepted: result === true }, 'Unsubscribe request answered');
    return result === true;
  }

  async close(): Promise<void> {
    const socket = this.socket;
    if (socket === null) {
      this.messages.close();
      return;
    }

    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        socket.terminate();
        resolve();
      }, CLOSE_TIMEOUT_MS);
      socket.once('close', () => {
        clearTimeout(timer);
        resolve();
      });
      socket.close(1000, 'shutdown');
    });
    // Idempotent with the 'close' handler installed by listen().
    this.socket = null;
    this.rejectPending(new BrokerError('action monitor connection closed'));
    this.messages.close();
  }

  private request(method: string, params: Record<string, unknown>): Promise<unknown> {
    const socket = this.socket;
    if (socket === null || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new BrokerError(`cannot ${method}: not connected to action monitor`));
    }

    const id = this.nextId++;
    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pending.delete(id);
        reject(new BrokerError(`${method} request timed out after ${this.requestTimeoutMs}ms`));
      }, this.requestTimeoutMs);

      this.pending.set(id, { method, resolve, reject, timer });

      socket.send(JSON.stringify({ id, method, params }), (err?: Error) => {
        if (!err) return;
        clearTimeout(timer);
        this.pending.delete(id);
        reject(new BrokerError(`failed to send ${method} request`, { cause: err }));
      });
    });
  }

  private handleMessage(data: WebSocket.RawData): void {
    let message: unknown;
    try {
      message = JSON.parse(rawToString(data));
    } catch (err: unknown) {
      this.log.warn({ err }, 'Malformed action monitor message, skipping');
      return;
    }

    const push = pushSchema.safeParse(message);
    if (push.success) {
      this.deliverBatch(push.data.params.offset, push.data.params.events ?? []);
      return;
    }

    const response = responseSchema.safeParse(message);
    if (!response.success) {
      this.log.warn({ issues: push.error.issues }, 'Unrecognized action monitor message, skipping');
      return;
    }

    const pending = this.pending.get(response.data.id);
    if (!pending) {
      this.log.warn({ id: response.data.id }, 'Response for unknown request id, skipping');
      return;
    }
    this.pending.delete(response.data.id);
    clearTimeout(pending.timer);

    const { error } = response.data;
    if (error !== undefined && error !== null) {
      const reason = typeof error === 'string' ? error : error.message;
      pending.reject(new BrokerError(`${pending.method} rejected by action monitor: ${reason}`));
      return;
    }
    pending.resolve(response.data.result);
  }

  private deliverBatch(offset: Offset, raw: readonly unknown[]): void {
    const events: BrokerEvent[] = [];
    raw.forEach((candidate, index) => {
      const parsed = brokerEventSchema.safeParse(candidate);
      if (!parsed.success) {
        this.log.warn(
          { offset, index, issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`) },
          'Malformed event in batch, dropping',
        );
        return;
      }
      const event = parsed.data;
      events.push({
        offset: event.offset,
        sender: event.sender,
        casino_id: event.casino_id,
        game_id: event.game_id,
        req_id: event.req_id,
        event_type: event.event_type,
        data: event.data,
      });
    });

    this.log.debug({ offset, count: events.length }, 'Received event batch');
    if (!this.messages.send({ offset, events })) {
      this.log.warn({ offset }, 'Event batch received after channel closed, dropping');
    }
  }

  private rejectPending(err: Error): void {
    for (const request of this.pending.values()) {
      clearTimeout(request.timer);
      request.reject(err);
    }
    this.pending.clear();
  }
}

function rawToString(data: WebSocket.RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (Buffer.isBuffer(data)) return data.toString('utf8');
  return Buffer.from(data).toString('utf8');
}
