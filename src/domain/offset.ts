/**
 * Position in the broker topic.
 *
 * The stored value always names the next unread position, so a consumer
 * that restarts resubscribes from exactly that point.
 */
export type Offset = number;

/** True for non-negative safe integers — the only values the broker can carry in JSON. */
export function isOffset(value: unknown): value is Offset {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

/** Offset to persist once the batch at `batchOffset` has been dispatched. */
export function nextOffset(batchOffset: Offset): Offset {
  return batchOffset + 1;
}
