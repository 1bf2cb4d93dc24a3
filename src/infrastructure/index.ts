export { createLogger } from './logger.js';
export { loadConfig, configSchema } from './config/index.js';
export type { AppConfig } from './config/index.js';
export { parseRsaKey, readEosKeys, loadKeyMaterial } from './keys/index.js';
export { FileOffsetStore, RedisOffsetStore, parseOffset } from './offset/index.js';
export { Channel, ActionMonitorClient, topicName } from './broker/index.js';
export { EosChainClient, headerFromChainHead } from './chain/index.js';
export { createDbClient, DrizzleOutcomeRepository, ensureOutcomeTable, eventOutcomes } from './db/index.js';
export type { Database, Sql } from './db/index.js';
export { InMemoryOutcomeRepository } from './outcomes/index.js';
