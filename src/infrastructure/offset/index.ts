export { FileOffsetStore, parseOffset } from './file-offset-store.js';
export { RedisOffsetStore } from './redis-offset-store.js';
