export { eventOutcomes } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, Sql } from './client.js';
export { DrizzleOutcomeRepository, ensureOutcomeTable } from './outcome-repository.js';
