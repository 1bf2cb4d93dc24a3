import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { WebSocketServer } from 'ws';
import type WebSocket from 'ws';
import type { AddressInfo } from 'node:net';
import { BrokerError } from '../../src/domain/index.js';
import { ActionMonitorClient, topicName } from '../../src/infrastructure/broker/index.js';
import { DIGEST_HEX, fakeLogger } from '../helpers.js';

interface Request {
  id: number;
  method: string;
  params: Record<string, unknown>;
}

/** Action monitor stand-in; `reply` decides how each request is answered. */
class FakeActionMonitor {
  readonly requests: Request[] = [];
  reply: (request: Request) => object | null = (request) => ({ id: request.id, result: true, error: null });

  private socket: WebSocket | null = null;
  private readonly connected: Promise<WebSocket>;

  private constructor(readonly wss: WebSocketServer) {
    this.connected = new Promise((resolve) => {
      wss.on('connection', (socket) => {
        this.socket = socket;
        socket.on('message', (raw) => {
          const request: Request = JSON.parse(raw.toString());
          this.requests.push(request);
          const response = this.reply(request);
          if (response !== null) socket.send(JSON.stringify(response));
        });
        resolve(socket);
      });
    });
  }

  static async start(): Promise<FakeActionMonitor> {
    const wss = new WebSocketServer({ host: '127.0.0.1', port: 0 });
    await new Promise<void>((resolve) => wss.once('listening', () => resolve()));
    return new FakeActionMonitor(wss);
  }

  get url(): string {
    const address: AddressInfo | string | null = this.wss.address();
    if (address === null || typeof address === 'string') throw new Error('server not listening');
    return `ws://127.0.0.1:${address.port}`;
  }

  async push(message: object): Promise<void> {
    await this.pushRaw(JSON.stringify(message));
  }

  /** Sends a frame exactly as written, for numbers JSON.stringify cannot produce. */
  async pushRaw(frame: string): Promise<void> {
    const socket = await this.connected;
    socket.send(frame);
  }

  async disconnect(): Promise<void> {
    const socket = await this.connected;
    socket.close(1001, 'going away');
  }

  async stop(): Promise<void> {
    this.socket?.terminate();
    for (const client of this.wss.clients) client.terminate();
    await new Promise<void>((resolve) => this.wss.close(() => resolve()));
  }
}

describe('ActionMonitorClient', () => {
  let monitor: FakeActionMonitor;
  let client: ActionMonitorClient;
  let log: ReturnType<typeof fakeLogger>;

  beforeEach(async () => {
    monitor = await FakeActionMonitor.start();
    log = fakeLogger();
    client = new ActionMonitorClient({ url: monitor.url, log, requestTimeoutMs: 1_000 });
  });

  afterEach(async () => {
    await client.close();
    await monitor.stop();
  });

  it('names topics after the event type', () => {
    expect(topicName(3)).toBe('event_3');
  });

  it('sends a subscribe request and reports acceptance', async () => {
    await client.listen(new AbortController().signal);

    await expect(client.subscribe(3, 10)).resolves.toBe(true);
    expect(monitor.requests).toEqual([
      { id: 1, method: 'subscribe', params: { topic: 'event_3', offset: 10 } },
    ]);
  });

  it('reports a refused request as false', async () => {
    monitor.reply = (request) => ({ id: request.id, result: false });
    await client.listen(new AbortController().signal);

    await expect(client.unsubscribe(3)).resolves.toBe(false);
    expect(monitor.requests[0]).toEqual({ id: 1, method: 'unsubscribe', params: { topic: 'event_3' } });
  });

  it('rejects when the monitor answers with an error', async () => {
    monitor.reply = (request) => ({ id: request.id, result: null, error: 'topic unknown' });
    await client.listen(new AbortController().signal);

    const subscribing = client.subscribe(9, 0);
    await expect(subscribing).rejects.toBeInstanceOf(BrokerError);
    await expect(subscribing).rejects.toThrow('subscribe rejected by action monitor: topic unknown');
  });

  it('pushes batches onto the message channel', async () => {
    await client.listen(new AbortController().signal);
    const { signal } = new AbortController();

    await monitor.push({ method: 'send', params: { offset: 4, events: null } });
    await monitor.push({
      method: 'send',
      params: {
        offset: 5,
        events: [
          { offset: 5, sender: 'dicegame', casino_id: 1, game_id: 2, req_id: 9, event_type: 3, data: { digest: DIGEST_HEX } },
        ],
      },
    });

    await expect(client.messages.receive(signal)).resolves.toEqual({ offset: 4, events: [] });
    await expect(client.messages.receive(signal)).resolves.toEqual({
      offset: 5,
      events: [
        { offset: 5, sender: 'dicegame', casino_id: 1, game_id: 2, req_id: 9, event_type: 3, data: { digest: DIGEST_HEX } },
      ],
    });
  });

  it('drops a malformed event but keeps its siblings and the batch', async () => {
    await client.listen(new AbortController().signal);
    const { signal } = new AbortController();
    const valid = { offset: 6, sender: 'dicegame', casino_id: 1, game_id: 2, req_id: 10, event_type: 3, data: { digest: DIGEST_HEX } };

    await monitor.push({ method: 'send', params: { offset: 6, events: [valid, { ...valid, req_id: 11, casino_id: -1 }] } });
    await monitor.push({ method: 'send', params: { offset: 7, events: [] } });

    await expect(client.messages.receive(signal)).resolves.toEqual({ offset: 6, events: [valid] });
    await expect(client.messages.receive(signal)).resolves.toEqual({ offset: 7, events: [] });
    expect(log.warn).toHaveBeenCalledWith(
      { offset: 6, index: 1, issues: [expect.stringMatching(/^casino_id: /)] },
      'Malformed event in batch, dropping',
    );
  });

  it('drops an event whose req_id does not fit a safe integer', async () => {
    await client.listen(new AbortController().signal);
    const event = (reqId: string): string =>
      `{"offset":8,"sender":"dicegame","casino_id":1,"game_id":2,"req_id":${reqId},"event_type":3,"data":{"digest":"${DIGEST_HEX}"}}`;

    await monitor.pushRaw(`{"method":"send","params":{"offset":8,"events":[${event('9007199254740993')},${event('12')}]}}`);

    const batch = await client.messages.receive(new AbortController().signal);
    expect(batch?.offset).toBe(8);
    expect(batch?.events.map((e) => e.req_id)).toEqual([12]);
    expect(log.warn).toHaveBeenCalledWith(
      { offset: 8, index: 0, issues: [expect.stringMatching(/^req_id: /)] },
      'Malformed event in batch, dropping',
    );
  });

  it('closes the channel and fails pending requests when the connection drops', async () => {
    monitor.reply = () => null;
    await client.listen(new AbortController().signal);

    const subscribing = client.subscribe(3, 0);
    const receiving = client.messages.receive(new AbortController().signal);
    await monitor.disconnect();

    await expect(subscribing).rejects.toThrow('action monitor connection closed');
    await expect(receiving).resolves.toBeUndefined();
    expect(client.messages.isClosed).toBe(true);
  });

  it('rejects requests before it is connected', async () => {
    await expect(client.subscribe(3, 0)).rejects.toThrow('cannot subscribe: not connected to action monitor');
  });

  it('does not connect with an aborted signal', async () => {
    const ac = new AbortController();
    ac.abort();

    await expect(client.listen(ac.signal)).rejects.toThrow('connection to action monitor aborted');
  });

  it('rejects when the monitor is unreachable', async () => {
    const url = monitor.url;
    await monitor.stop();
    const unreachable = new ActionMonitorClient({ url, log: fakeLogger() });

    await expect(unreachable.listen(new AbortController().signal)).rejects.toThrow(
      `failed to connect to action monitor at ${url}`,
    );
  });
});
