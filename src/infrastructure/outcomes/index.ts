export { InMemoryOutcomeRepository } from './in-memory-outcome-repo.js';
