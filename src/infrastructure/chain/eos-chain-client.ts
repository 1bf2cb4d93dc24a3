import { Api, JsonRpc } from 'eosjs';
import { JsSignatureProvider } from 'eosjs/dist/eosjs-jssig.js';
import type { SerializedAction } from 'eosjs/dist/eosjs-serialize.js';
import { ChainError } from '../../domain/index.js';
import type {
  Action,
  ChainClient,
  SignedTransaction,
  Transaction,
  TransactionHeader,
} from '../../domain/index.js';
import { DEFAULT_EXPIRE_SECONDS, headerFromChainHead } from './transaction-header.js';

export interface EosChainClientOptions {
  /** Node API endpoint, e.g. http://127.0.0.1:8888 */
  endpoint: string;
  chainId: string;
  /** WIF / PVT_K1 keys the client may sign with. */
  privateKeys: readonly string[];
  expireSeconds?: number | undefined;
}

/**
 * ChainClient backed by eosjs.
 *
 * Signing is local (JsSignatureProvider) and names the exact public key to
 * use, so no `get_required_keys` round-trip is made. Actions whose data is
 * an object are serialized through the contract ABI, which eosjs fetches
 * and caches; hex data is used as is.
 */
export class EosChainClient implements ChainClient {
  private readonly rpc: JsonRpc;
  private readonly api: Api;
  private readonly signatureProvider: JsSignatureProvider;
  private readonly chainId: string;
  private readonly expireSeconds: number;

  constructor(options: EosChainClientOptions) {
    this.chainId = options.chainId;
    this.expireSeconds = options.expireSeconds ?? DEFAULT_EXPIRE_SECONDS;
    this.rpc = new JsonRpc(options.endpoint);
    this.signatureProvider = new JsSignatureProvider([...options.privateKeys]);
    this.api = new Api({
      rpc: this.rpc,
      signatureProvider: this.signatureProvider,
      chainId: options.chainId,
      textEncoder: new TextEncoder(),
      textDecoder: new TextDecoder(),
    });
  }

  async fetchTransactionHeader(): Promise<TransactionHeader> {
    let head: { head_block_id: string; head_block_time: string };
    try {
      head = await this.rpc.get_info();
    } catch (err: unknown) {
      throw new ChainError('get_info failed', { cause: err });
    }
    return headerFromChainHead(head, this.expireSeconds);
  }

  async signTransaction(tx: Transaction, publicKey: string): Promise<SignedTransaction> {
    const [contextFreeActions, actions] = await Promise.all([
      this.serializeActions(tx.context_free_actions),
      this.serializeActions(tx.actions),
    ]);

    const serializedTransaction = this.api.serializeTransaction({
      ...tx,
      context_free_actions: contextFreeActions,
      actions,
    });

    const { signatures } = await this.signatureProvider.sign({
      chainId: this.chainId,
      requiredKeys: [publicKey],
      serializedTransaction,
      abis: [],
    });

    return { signatures, serializedTransaction };
  }

  async pushTransaction(signed: SignedTransaction): Promise<string> {
    const result = await this.rpc.push_transaction({
      signatures: [...signed.signatures],
      serializedTransaction: signed.serializedTransaction,
    });
    return result.transaction_id;
  }

  private async serializeActions(actions: readonly Action[]): Promise<SerializedAction[]> {
    return Promise.all(
      actions.map(async (action) => {
        const base = {
          account: action.account,
          name: action.name,
          authorization: action.authorization.map((level) => ({ ...level })),
        };
        if (typeof action.data === 'string') {
          return { ...base, data: action.data };
        }

        let serialized: SerializedAction[];
        try {
          serialized = await this.api.serializeActions([{ ...base, data: action.data }]);
        } catch (err: unknown) {
          throw new ChainError(`failed to serialize ${action.account}::${action.name}`, { cause: err });
        }
        const [first] = serialized;
        if (first === undefined) {
          throw new ChainError(`no serialized output for ${action.account}::${action.name}`);
        }
        return first;
      }),
    );
  }
}
