import { ChainError } from '../../domain/index.js';
import type { TransactionHeader } from '../../domain/index.js';

/** Fields of `get_info` a transaction header is derived from. */
export interface ChainHead {
  head_block_id: string;
  head_block_time: string;
}

export const DEFAULT_EXPIRE_SECONDS = 30;

/**
 * Derives TAPoS fields from the head block:
 * - `ref_block_num`    — low 16 bits of the block number (first 4 bytes of the id, big-endian)
 * - `ref_block_prefix` — bytes 8..11 of the id, little-endian
 * - `expiration`       — head block time + `expireSeconds`, second precision, no zone suffix
 */
export function headerFromChainHead(head: ChainHead, expireSeconds = DEFAULT_EXPIRE_SECONDS): TransactionHeader {
  if (!/^[0-9a-fA-F]{64}$/.test(head.head_block_id)) {
    throw new ChainError(`invalid head_block_id: ${head.head_block_id}`);
  }
  const id = Buffer.from(head.head_block_id, 'hex');

  // Chain timestamps are UTC without a zone designator.
  const time = head.head_block_time.endsWith('Z') ? head.head_block_time : `${head.head_block_time}Z`;
  const headMs = Date.parse(time);
  if (Number.isNaN(headMs)) {
    throw new ChainError(`invalid head_block_time: ${head.head_block_time}`);
  }

  return {
    expiration: new Date(headMs + expireSeconds * 1000).toISOString().slice(0, 19),
    ref_block_num: id.readUInt32BE(0) & 0xffff,
    ref_block_prefix: id.readUInt32LE(8),
  };
}
