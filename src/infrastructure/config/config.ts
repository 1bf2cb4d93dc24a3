import { z } from 'zod';
import { ConfigError } from '../../domain/index.js';
import { COMMIT_POLICIES } from '../../application/index.js';

const nonEmpty = z.string().trim().min(1);

const intFromEnv = (min: number, max = Number.MAX_SAFE_INTEGER) =>
  z
    .string()
    .trim()
    .regex(/^\d+$/, 'Must be a non-negative integer')
    .transform(Number)
    .pipe(z.number().int().min(min).max(max));

/**
 * Zod schema over `process.env`.
 *
 * Secrets and endpoints have no defaults; everything else does.
 */
export const configSchema = z.object({
  HOST: nonEmpty.default('0.0.0.0'),
  PORT: intFromEnv(0, 65535).default('8080'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  BROKER_URL: z.string().url(),
  TOPIC_ID: intFromEnv(0).default('3'),
  TOPIC_OFFSET: intFromEnv(0).optional(),
  OFFSET_STORE: z.enum(['file', 'redis']).default('file'),
  OFFSET_FILE: nonEmpty.default('./offset.txt'),
  REDIS_URL: z.string().url().default('redis://localhost:6379'),
  OFFSET_REDIS_KEY: nonEmpty.default('casino-signer:offset'),
  COMMIT_POLICY: z.enum(COMMIT_POLICIES).default('optimistic'),
  EVENT_CONCURRENCY: intFromEnv(1, 1024).default('16'),

  CHAIN_URL: z.string().url(),
  CHAIN_ID: z.string().regex(/^[0-9a-fA-F]{64}$/, 'Must be a 64-character hex chain id'),
  CASINO_ACCOUNT: z.string().regex(/^[a-z1-5.]{1,12}$/, 'Must be an EOS account name'),
  DEPOSIT_PUBLIC_KEY: nonEmpty,
  SIGNIDICE_PUBLIC_KEY: nonEmpty,
  EOS_KEYS_FILE: nonEmpty,
  RSA_KEY: nonEmpty,

  DATABASE_URL: z.string().url().optional(),
});

export type AppConfig = z.infer<typeof configSchema>;

/**
 * Validates the environment. Throws ConfigError listing every invalid or
 * missing variable at once.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = configSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    );
  }
  return parsed.data;
}
