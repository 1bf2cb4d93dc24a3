export { parseRsaKey, readEosKeys, loadKeyMaterial } from './key-loader.js';
