import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { ChainClient, KeyMaterial } from '../../domain/index.js';
import signerPlugin from './signer-plugin.js';
import pingRoutes from './ping-routes.js';
import signRoutes from './sign-routes.js';

export interface ServerOptions {
  chain: ChainClient;
  keys: KeyMaterial;
  logLevel: string;
}

/**
 * Builds the Fastify app without listening; the lifecycle coordinator
 * owns `listen()` and `close()`. Plugins load on `ready()` / `listen()`.
 *
 * Order:
 * 1) Shared collaborators
 * 2) Routes
 * 3) Not-found handler
 */
export function buildServer(options: ServerOptions): FastifyInstance {
  const fastify = Fastify({
    logger: {
      level: options.logLevel,
    },
  });

  fastify.register(signerPlugin, { chain: options.chain, keys: options.keys });

  fastify.register(pingRoutes);
  fastify.register(signRoutes);

  fastify.setNotFoundHandler((_request, reply) => {
    return reply.status(404).send({ error: 'not found' });
  });

  return fastify;
}
