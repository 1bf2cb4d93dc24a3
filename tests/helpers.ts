import { generateKeyPairSync } from 'node:crypto';
import type { KeyObject } from 'node:crypto';
import { vi } from 'vitest';
import type { Logger } from 'pino';
import { createKeyMaterial, EventType } from '../src/domain/index.js';
import type {
  BrokerEvent,
  ChainClient,
  KeyMaterial,
  Offset,
  OffsetStore,
  SignedTransaction,
  Transaction,
  TransactionHeader,
} from '../src/domain/index.js';

/** Minimal fake logger; `child` returns the same fake so calls stay observable. */
export function fakeLogger() {
  const log = {
    fatal: vi.fn(),
    error: vi.fn(),
    warn: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    trace: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger & typeof log;
}

let rsaPair: { privateKey: KeyObject; publicKey: KeyObject } | null = null;

/** One RSA pair per test file; generation is slow. */
export function testRsaKeys(): { privateKey: KeyObject; publicKey: KeyObject } {
  rsaPair ??= generateKeyPairSync('rsa', { modulusLength: 2048 });
  return rsaPair;
}

export const DEPOSIT_KEY = 'EOS_TEST_DEPOSIT_PUBLIC_KEY';
export const SIGNIDICE_KEY = 'EOS_TEST_SIGNIDICE_PUBLIC_KEY';
export const CHAIN_ID = 'ab'.repeat(32);

export function makeKeys(): KeyMaterial {
  return createKeyMaterial({
    chainId: CHAIN_ID,
    casinoAccount: 'testcasino',
    publicKeys: { deposit: DEPOSIT_KEY, signidice: SIGNIDICE_KEY },
    rsaKey: testRsaKeys().privateKey,
  });
}

export const DIGEST_HEX = '0f'.repeat(32);

let counter = 0;

/**
 * Factory for signidice part 2 request events with sensible defaults.
 * Override any field via the partial parameter.
 */
export function makeEvent(overrides: Partial<BrokerEvent> = {}): BrokerEvent {
  counter++;
  return {
    offset: overrides.offset ?? counter,
    sender: overrides.sender ?? 'dicegame',
    casino_id: overrides.casino_id ?? 1,
    game_id: overrides.game_id ?? 7,
    req_id: overrides.req_id ?? counter,
    event_type: overrides.event_type ?? EventType.SignidicePartTwoRequest,
    data: 'data' in overrides ? overrides.data : { digest: DIGEST_HEX },
  };
}

export const HEADER: TransactionHeader = {
  expiration: '2026-01-02T03:04:35',
  ref_block_num: 8000,
  ref_block_prefix: 305419896,
};

/** Chain collaborator fake: every method is a vi.fn with a succeeding default. */
export function fakeChain() {
  let pushed = 0;
  return {
    fetchTransactionHeader: vi.fn(async (): Promise<TransactionHeader> => HEADER),
    signTransaction: vi.fn(async (_tx: Transaction, publicKey: string): Promise<SignedTransaction> => ({
      signatures: [`SIG_K1_${publicKey}`],
      serializedTransaction: new Uint8Array([1, 2, 3]),
    })),
    pushTransaction: vi.fn(async (_signed: SignedTransaction): Promise<string> => {
      pushed++;
      return `tx-${pushed}`;
    }),
  } satisfies ChainClient;
}

/** Offset store that keeps the value in memory and records every write. */
export class MemoryOffsetStore implements OffsetStore {
  readonly writes: Offset[] = [];
  failWrites = false;

  constructor(private value: Offset | null = null) {}

  async read(): Promise<Offset> {
    if (this.value === null) throw new Error('no offset stored');
    return this.value;
  }

  async write(offset: Offset): Promise<void> {
    if (this.failWrites) throw new Error('disk full');
    this.writes.push(offset);
    this.value = offset;
  }

  async close(): Promise<void> {}
}

/** Resolves after pending microtasks and one macrotask turn. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

/** A promise plus the functions that settle it. */
export function deferred<T = void>() {
  let resolve!: (value: T) => void;
  let reject!: (err: unknown) => void;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}
