import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { ChainClient, KeyMaterial } from '../../domain/index.js';

export interface SignerPluginOptions {
  chain: ChainClient;
  keys: KeyMaterial;
}

/**
 * Fastify plugin exposing the chain client and key material to routes.
 *
 * Both are shared with the event processor; the plugin only decorates,
 * it owns neither.
 */
async function signerPlugin(fastify: FastifyInstance, opts: SignerPluginOptions): Promise<void> {
  fastify.decorate('chain', opts.chain);
  fastify.decorate('keys', opts.keys);
}

export default fp<SignerPluginOptions>(signerPlugin, {
  name: 'signer',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.chain` / `fastify.keys` are available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    chain: ChainClient;
    keys: KeyMaterial;
  }
}
