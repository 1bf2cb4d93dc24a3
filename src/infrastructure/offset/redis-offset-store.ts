import { Redis } from 'ioredis';
import { isOffset, OffsetStoreError } from '../../domain/index.js';
import type { Offset, OffsetStore } from '../../domain/index.js';
import { parseOffset } from './file-offset-store.js';

/**
 * Offset kept as a decimal string under a single Redis key.
 *
 * `SET` replaces the whole value, which gives the same
 * truncate-and-rewrite semantics as the file store.
 */
export class RedisOffsetStore implements OffsetStore {
  constructor(
    private readonly redis: Redis,
    readonly key: string,
  ) {}

  /** Opens a dedicated connection; `close()` quits it. */
  static async connect(redisUrl: string, key: string): Promise<RedisOffsetStore> {
    const redis = new Redis(redisUrl, {
      maxRetriesPerRequest: 3,
      enableReadyCheck: true,
      lazyConnect: true,
    });
    try {
      await redis.connect();
    } catch (err: unknown) {
      redis.disconnect();
      throw new OffsetStoreError(`failed to connect to redis for offset key ${key}`, { cause: err });
    }
    return new RedisOffsetStore(redis, key);
  }

  async read(): Promise<Offset> {
    let value: string | null;
    try {
      value = await this.redis.get(this.key);
    } catch (err: unknown) {
      throw new OffsetStoreError(`failed to read offset key ${this.key}`, { cause: err });
    }
    return parseOffset((value ?? '').trim(), `redis key ${this.key}`);
  }

  async write(offset: Offset): Promise<void> {
    if (!isOffset(offset)) {
      throw new OffsetStoreError(`refusing to write invalid offset ${String(offset)}`);
    }
    try {
      await this.redis.set(this.key, String(offset));
    } catch (err: unknown) {
      throw new OffsetStoreError(`failed to write offset key ${this.key}`, { cause: err });
    }
  }

  async close(): Promise<void> {
    await this.redis.quit();
  }
}
