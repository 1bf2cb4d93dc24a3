export { configSchema, loadConfig } from './config.js';
export type { AppConfig } from './config.js';
