export { buildServer } from './server.js';
export type { ServerOptions } from './server.js';
export { default as signerPlugin } from './signer-plugin.js';
export type { SignerPluginOptions } from './signer-plugin.js';
export { default as pingRoutes } from './ping-routes.js';
export { default as signRoutes } from './sign-routes.js';
