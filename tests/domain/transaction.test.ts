import { describe, it, expect } from 'vitest';
import {
  buildSignidiceTransaction,
  createKeyMaterial,
  isOffset,
  nextOffset,
  SIGNIDICE_ACTION,
} from '../../src/domain/index.js';
import { HEADER, testRsaKeys } from '../helpers.js';

describe('buildSignidiceTransaction', () => {
  it('targets the game contract with the casino signidice permission', () => {
    const tx = buildSignidiceTransaction({
      header: HEADER,
      gameContract: 'dicegame',
      casinoAccount: 'testcasino',
      requestId: 42,
      signature: 'c2lnbmF0dXJl',
    });

    expect(tx.expiration).toBe('2026-01-02T03:04:35');
    expect(tx.ref_block_num).toBe(8000);
    expect(tx.ref_block_prefix).toBe(305419896);
    expect(tx.actions).toEqual([
      {
        account: 'dicegame',
        name: SIGNIDICE_ACTION,
        authorization: [{ actor: 'testcasino', permission: 'signidice' }],
        data: { req_id: 42, sign: 'c2lnbmF0dXJl' },
      },
    ]);
  });

  it('leaves resource limits and extensions at their defaults', () => {
    const tx = buildSignidiceTransaction({
      header: HEADER,
      gameContract: 'dicegame',
      casinoAccount: 'testcasino',
      requestId: 1,
      signature: 'x',
    });

    expect(tx.max_net_usage_words).toBe(0);
    expect(tx.max_cpu_usage_ms).toBe(0);
    expect(tx.delay_sec).toBe(0);
    expect(tx.context_free_actions).toEqual([]);
    expect(tx.transaction_extensions).toEqual([]);
  });
});

describe('offsets', () => {
  it('accepts non-negative safe integers only', () => {
    expect(isOffset(0)).toBe(true);
    expect(isOffset(123456)).toBe(true);
    expect(isOffset(-1)).toBe(false);
    expect(isOffset(1.5)).toBe(false);
    expect(isOffset(Number.MAX_SAFE_INTEGER + 1)).toBe(false);
  });

  it('next offset follows the batch', () => {
    expect(nextOffset(41)).toBe(42);
  });
});

describe('createKeyMaterial', () => {
  it('freezes the material and its public keys', () => {
    const keys = createKeyMaterial({
      chainId: 'ab'.repeat(32),
      casinoAccount: 'testcasino',
      publicKeys: { deposit: 'D', signidice: 'S' },
      rsaKey: testRsaKeys().privateKey,
    });

    expect(Object.isFrozen(keys)).toBe(true);
    expect(Object.isFrozen(keys.publicKeys)).toBe(true);
  });
});
