export type { Offset } from './offset.js';
export { isOffset, nextOffset } from './offset.js';
export type { BrokerEvent, EventMessage, EventTypeId } from './event.js';
export { EventType } from './event.js';
export type { KeyMaterial, RolePublicKeys } from './keys.js';
export { createKeyMaterial } from './keys.js';
export type {
  Action,
  PermissionLevel,
  SignedTransaction,
  Transaction,
  TransactionHeader,
} from './transaction.js';
export { buildSignidiceTransaction, SIGNIDICE_ACTION, SIGNIDICE_PERMISSION } from './transaction.js';
export type { EventOutcome, OutcomeStatus, ProcessingStage } from './outcome.js';
export type { OffsetStore, MessageSource, EventListener, ChainClient, EventOutcomeRepository } from './ports.js';
export {
  OffsetStoreError,
  ConfigError,
  KeyMaterialError,
  BrokerError,
  ChainError,
  errorMessage,
} from './errors.js';
