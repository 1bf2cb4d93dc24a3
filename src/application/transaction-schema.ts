import { z } from 'zod';

const name = z.string().min(1).max(13);

const permissionLevelSchema = z.object({
  actor: name,
  permission: name,
});

/** Hex-encoded action data, as produced by the chain's `abi_json_to_bin`. */
const hexData = z
  .string()
  .regex(/^(?:[0-9a-fA-F]{2})*$/, 'Must be hex-encoded bytes');

const actionSchema = z.object({
  account: name,
  name,
  authorization: z.array(permissionLevelSchema),
  data: hexData,
});

/**
 * Zod schema for an unsigned transaction posted to `/sign_transaction`.
 *
 * Actions must carry serialized (hex) data, so signing needs no ABI
 * lookup. Fields a client may omit get the chain's defaults; any
 * `signatures` sent along are ignored. Extensions are refused.
 */
export const transactionSchema = z.object({
  expiration: z.string().regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(?:\.\d{1,3})?$/, 'Must be YYYY-MM-DDTHH:MM:SS'),
  ref_block_num: z.number().int().min(0).max(0xffff),
  ref_block_prefix: z.number().int().min(0).max(0xffffffff),
  max_net_usage_words: z.number().int().min(0).default(0),
  max_cpu_usage_ms: z.number().int().min(0).max(0xff).default(0),
  delay_sec: z.number().int().min(0).default(0),
  context_free_actions: z.array(actionSchema).default([]),
  actions: z.array(actionSchema).min(1, 'Transaction must contain at least one action'),
  transaction_extensions: z.array(z.unknown()).max(0, 'Transaction extensions are not supported').default([]),
});

export type TransactionInput = z.infer<typeof transactionSchema>;
