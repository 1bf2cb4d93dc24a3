/**
 * EOSIO transaction shapes, as accepted by the chain's JSON API.
 */

export interface PermissionLevel {
  readonly actor: string;
  readonly permission: string;
}

/**
 * `data` is either already-serialized hex, or an object the chain client
 * serializes through the contract ABI.
 */
export interface Action {
  readonly account: string;
  readonly name: string;
  readonly authorization: readonly PermissionLevel[];
  readonly data: string | Readonly<Record<string, unknown>>;
}

/** Reference block and expiration — the part of a transaction taken from chain state. */
export interface TransactionHeader {
  readonly expiration: string; // YYYY-MM-DDTHH:MM:SS, UTC
  readonly ref_block_num: number;
  readonly ref_block_prefix: number;
}

export interface Transaction extends TransactionHeader {
  readonly max_net_usage_words: number;
  readonly max_cpu_usage_ms: number;
  readonly delay_sec: number;
  readonly context_free_actions: readonly Action[];
  readonly actions: readonly Action[];
  readonly transaction_extensions: readonly unknown[];
}

export interface SignedTransaction {
  readonly signatures: readonly string[];
  readonly serializedTransaction: Uint8Array;
}

export const SIGNIDICE_ACTION = 'sgdicesecond';
export const SIGNIDICE_PERMISSION = 'signidice';

/**
 * Builds the transaction that completes a signidice round: the game
 * contract that emitted the request receives the casino's signature for
 * `req_id`, authorized by the casino's `signidice` permission.
 */
export function buildSignidiceTransaction(params: {
  header: TransactionHeader;
  gameContract: string;
  casinoAccount: string;
  requestId: number;
  signature: string;
}): Transaction {
  return {
    ...params.header,
    max_net_usage_words: 0,
    max_cpu_usage_ms: 0,
    delay_sec: 0,
    context_free_actions: [],
    actions: [
      {
        account: params.gameContract,
        name: SIGNIDICE_ACTION,
        authorization: [{ actor: params.casinoAccount, permission: SIGNIDICE_PERMISSION }],
        data: { req_id: params.requestId, sign: params.signature },
      },
    ],
    transaction_extensions: [],
  };
}
