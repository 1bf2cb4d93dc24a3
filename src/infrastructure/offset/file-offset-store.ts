import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { isOffset, OffsetStoreError } from '../../domain/index.js';
import type { Offset, OffsetStore } from '../../domain/index.js';

/**
 * Offset kept as plain decimal ASCII in a single file.
 *
 * The file handle stays open for the life of the process. Every write
 * truncates first, so a shorter value never leaves stale trailing digits.
 * Reads and writes use explicit positions and never depend on the
 * handle's cursor.
 */
export class FileOffsetStore implements OffsetStore {
  private constructor(
    private readonly handle: FileHandle,
    readonly path: string,
  ) {}

  /** Opens `path` for read/write, creating an empty file if it does not exist. */
  static async open(path: string): Promise<FileOffsetStore> {
    try {
      return new FileOffsetStore(await open(path, 'r+'), path);
    } catch (err: unknown) {
      if (!isNotFound(err)) {
        throw new OffsetStoreError(`failed to open offset file ${path}`, { cause: err });
      }
    }
    try {
      return new FileOffsetStore(await open(path, 'w+'), path);
    } catch (err: unknown) {
      throw new OffsetStoreError(`failed to create offset file ${path}`, { cause: err });
    }
  }

  async read(): Promise<Offset> {
    let text: string;
    try {
      const { size } = await this.handle.stat();
      const buffer = Buffer.alloc(size);
      const { bytesRead } = await this.handle.read(buffer, 0, size, 0);
      text = buffer.subarray(0, bytesRead).toString('ascii').trim();
    } catch (err: unknown) {
      throw new OffsetStoreError(`failed to read offset file ${this.path}`, { cause: err });
    }

    return parseOffset(text, this.path);
  }

  async write(offset: Offset): Promise<void> {
    if (!isOffset(offset)) {
      throw new OffsetStoreError(`refusing to write invalid offset ${String(offset)}`);
    }
    try {
      await this.handle.truncate(0);
      await this.handle.write(String(offset), 0, 'ascii');
    } catch (err: unknown) {
      throw new OffsetStoreError(`failed to write offset file ${this.path}`, { cause: err });
    }
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

/** Parses stored offset text; `source` only labels the error. */
export function parseOffset(text: string, source: string): Offset {
  if (text === '') {
    throw new OffsetStoreError(`no offset stored in ${source}`);
  }
  if (!/^\d+$/.test(text)) {
    throw new OffsetStoreError(`corrupt offset in ${source}: ${JSON.stringify(text.slice(0, 32))}`);
  }
  const value = Number(text);
  if (!isOffset(value)) {
    throw new OffsetStoreError(`offset in ${source} is out of range: ${text}`);
  }
  return value;
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
