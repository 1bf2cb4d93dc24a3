export { rsaSign } from './signer.js';
export { decodeEvent, signidiceRequestSchema } from './event-payload.js';
export type { DecodedEvent, SignidiceRequestData } from './event-payload.js';
export { ConcurrencyLimiter } from './concurrency-limiter.js';
export { DEFAULT_FAILURE_POLICY } from './failure-policy.js';
export type { FailureAction, FailurePolicy, FailureSite } from './failure-policy.js';
export { EventProcessor } from './event-processor.js';
export type { EventProcessorDeps } from './event-processor.js';
export { runEventLoop, dispatchBatch, PipelineFailure, COMMIT_POLICIES } from './event-loop.js';
export type { CommitPolicy, EventHandler, EventLoopDeps } from './event-loop.js';
export { App } from './lifecycle.js';
export type { AppDeps, AppSettings, HttpServer } from './lifecycle.js';
export { transactionSchema } from './transaction-schema.js';
export type { TransactionInput } from './transaction-schema.js';
