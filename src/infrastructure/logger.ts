import pino from 'pino';
import type { Logger } from 'pino';

/** Paths pino masks wherever they appear in a log object. */
const REDACT_PATHS = [
  'rsaKey',
  '*.rsaKey',
  'privateKeys',
  '*.privateKeys',
  'RSA_KEY',
  '*.RSA_KEY',
];

export function createLogger(level: string): Logger {
  return pino({
    level,
    redact: { paths: REDACT_PATHS, censor: '[redacted]' },
  });
}
