/**
 * What the process does when a given site fails.
 *
 * - `exit`   — unrecoverable: log fatal and terminate immediately.
 * - `cancel` — abort the shared signal and surface the error from `App.run()`.
 * - `log`    — log and carry on.
 *
 * Per-event and per-request failures never reach this table: they are
 * logged and dropped where they happen.
 */
export type FailureAction = 'exit' | 'cancel' | 'log';

export type FailureSite =
  | 'http_listen'
  | 'broker_listen'
  | 'broker_subscribe'
  | 'broker_stream'
  | 'offset_read'
  | 'offset_write';

export type FailurePolicy = Readonly<Record<FailureSite, FailureAction>>;

export const DEFAULT_FAILURE_POLICY = {
  http_listen: 'exit',
  broker_listen: 'cancel',
  broker_subscribe: 'cancel',
  broker_stream: 'cancel',
  offset_read: 'log',
  offset_write: 'log',
} as const satisfies FailurePolicy;
