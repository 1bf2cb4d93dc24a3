import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

/**
 * GET /ping — liveness. Answers regardless of broker or chain state.
 */
async function pingRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/ping',
    async (request: FastifyRequest, reply: FastifyReply) => {
      request.log.info('Called /ping');
      return reply.status(200).send({ result: 'pong' });
    },
  );
}

export default fp(pingRoutes, {
  name: 'ping-routes',
  fastify: '5.x',
});
