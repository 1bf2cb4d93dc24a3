import type { MessageSource } from '../../domain/index.js';

interface Receiver<T> {
  resolve: (value: T | undefined) => void;
  detach: () => void;
}

/**
 * Unbounded FIFO channel between the broker connection and the event loop.
 *
 * `send` never blocks. `receive` waits for the next value; it resolves
 * `undefined` once the channel is closed and drained, or as soon as the
 * caller's signal aborts, in which case nothing is consumed.
 */
export class Channel<T> implements MessageSource<T> {
  private readonly buffer: T[] = [];
  private readonly receivers: Receiver<T>[] = [];
  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  /** Values buffered and not yet received. */
  get size(): number {
    return this.buffer.length;
  }

  /** Returns false when the channel is already closed and the value was discarded. */
  send(value: T): boolean {
    if (this.closed) return false;

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.detach();
      receiver.resolve(value);
    } else {
      this.buffer.push(value);
    }
    return true;
  }

  /** Buffered values stay receivable; waiting receivers get `undefined`. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const receiver of this.receivers.splice(0)) {
      receiver.detach();
      receiver.resolve(undefined);
    }
  }

  receive(signal: AbortSignal): Promise<T | undefined> {
    if (signal.aborted) return Promise.resolve(undefined);
    if (this.buffer.length > 0) return Promise.resolve(this.buffer.shift());
    if (this.closed) return Promise.resolve(undefined);

    return new Promise((resolve) => {
      const onAbort = (): void => {
        const index = this.receivers.indexOf(receiver);
        if (index !== -1) this.receivers.splice(index, 1);
        resolve(undefined);
      };
      const receiver: Receiver<T> = {
        resolve,
        detach: () => signal.removeEventListener('abort', onAbort),
      };
      signal.addEventListener('abort', onAbort, { once: true });
      this.receivers.push(receiver);
    });
  }
}
