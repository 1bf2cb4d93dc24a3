import { z } from 'zod';
import { EventType } from '../domain/index.js';
import type { BrokerEvent } from '../domain/index.js';

/** Checksum256 as the chain serializes it to JSON: 64 hex characters. */
const checksum256 = z
  .string()
  .regex(/^[0-9a-fA-F]{64}$/, 'Must be a 64-character hex checksum');

/** Payload of a signidice part 2 request. Extra fields are ignored. */
export const signidiceRequestSchema = z.object({
  digest: checksum256,
});

export type SignidiceRequestData = z.infer<typeof signidiceRequestSchema>;

/**
 * Result of decoding an event's payload according to its type.
 *
 * Every variant is handled by the processor; `unsupported` and `invalid`
 * end in a logged drop.
 */
export type DecodedEvent =
  | { kind: 'signidice_part_2'; digest: Buffer }
  | { kind: 'unsupported'; eventType: number }
  | { kind: 'invalid'; reason: string };

/**
 * Some broker deployments deliver `data` as a JSON string rather than an
 * embedded object; both forms are accepted.
 */
function payloadOf(data: unknown): { ok: true; value: unknown } | { ok: false; reason: string } {
  if (typeof data !== 'string') return { ok: true, value: data };
  try {
    const value: unknown = JSON.parse(data);
    return { ok: true, value };
  } catch (err: unknown) {
    return { ok: false, reason: `payload is not valid JSON: ${err instanceof Error ? err.message : String(err)}` };
  }
}

export function decodeEvent(event: BrokerEvent): DecodedEvent {
  switch (event.event_type) {
    case EventType.SignidicePartTwoRequest: {
      const payload = payloadOf(event.data);
      if (!payload.ok) return { kind: 'invalid', reason: payload.reason };

      const parsed = signidiceRequestSchema.safeParse(payload.value);
      if (!parsed.success) {
        const reason = parsed.error.issues
          .map((issue) => `${issue.path.join('.') || 'data'}: ${issue.message}`)
          .join(', ');
        return { kind: 'invalid', reason };
      }
      return { kind: 'signidice_part_2', digest: Buffer.from(parsed.data.digest, 'hex') };
    }
    default:
      return { kind: 'unsupported', eventType: event.event_type };
  }
}
