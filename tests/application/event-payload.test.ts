import { describe, it, expect } from 'vitest';
import { decodeEvent } from '../../src/application/event-payload.js';
import { EventType } from '../../src/domain/index.js';
import { DIGEST_HEX, makeEvent } from '../helpers.js';

describe('decodeEvent', () => {
  it('decodes the digest of a signidice part 2 request', () => {
    const decoded = decodeEvent(makeEvent({ data: { digest: DIGEST_HEX } }));

    expect(decoded.kind).toBe('signidice_part_2');
    if (decoded.kind === 'signidice_part_2') {
      expect(decoded.digest.toString('hex')).toBe(DIGEST_HEX);
    }
  });

  it('accepts the payload as a JSON string', () => {
    const decoded = decodeEvent(makeEvent({ data: JSON.stringify({ digest: DIGEST_HEX, extra: 1 }) }));
    expect(decoded.kind).toBe('signidice_part_2');
  });

  it('reports a payload string that is not JSON', () => {
    const decoded = decodeEvent(makeEvent({ data: '{digest' }));

    expect(decoded.kind).toBe('invalid');
    if (decoded.kind === 'invalid') {
      expect(decoded.reason.startsWith('payload is not valid JSON: ')).toBe(true);
    }
  });

  it('reports a missing digest', () => {
    expect(decodeEvent(makeEvent({ data: { seed: 'x' } }))).toEqual({
      kind: 'invalid',
      reason: 'digest: Required',
    });
  });

  it('reports a digest that is not 64 hex characters', () => {
    expect(decodeEvent(makeEvent({ data: { digest: 'abc' } }))).toEqual({
      kind: 'invalid',
      reason: 'digest: Must be a 64-character hex checksum',
    });
  });

  it('reports a payload that is not an object', () => {
    expect(decodeEvent(makeEvent({ data: null }))).toEqual({
      kind: 'invalid',
      reason: 'data: Expected object, received null',
    });
  });

  it('marks other event types as unsupported', () => {
    expect(decodeEvent(makeEvent({ event_type: EventType.GameStarted }))).toEqual({
      kind: 'unsupported',
      eventType: 0,
    });
  });
});
