export { EosChainClient } from './eos-chain-client.js';
export type { EosChainClientOptions } from './eos-chain-client.js';
export { headerFromChainHead, DEFAULT_EXPIRE_SECONDS } from './transaction-header.js';
export type { ChainHead } from './transaction-header.js';
