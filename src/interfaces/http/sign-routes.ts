import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { transactionSchema } from '../../application/index.js';
import type { TransactionInput } from '../../application/index.js';
import { errorMessage } from '../../domain/index.js';
import type { SignedTransaction } from '../../domain/index.js';

type ParseResult =
  | { success: true; data: TransactionInput }
  | { success: false; reason: string };

function parseTransaction(body: unknown): ParseResult {
  if (typeof body !== 'string' || body.trim() === '') {
    return { success: false, reason: 'empty body' };
  }

  let json: unknown;
  try {
    json = JSON.parse(body);
  } catch (err: unknown) {
    return { success: false, reason: errorMessage(err) };
  }

  const parsed = transactionSchema.safeParse(json);
  if (!parsed.success) {
    return {
      success: false,
      reason: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', '),
    };
  }
  return { success: true, data: parsed.data };
}

/**
 * POST /sign_transaction — co-signs a player transaction with the deposit
 * key and pushes it.
 *
 * 200 { txid }
 * 400 { error } — body is not a transaction, or the chain rejected it
 * 500 { error } — signing failed
 *
 * Not wrapped in fastify-plugin: the raw-body parser below must stay
 * scoped to this route so the exact error body is ours, not Fastify's.
 */
export default async function signRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.removeAllContentTypeParsers();
  fastify.addContentTypeParser('*', { parseAs: 'string' }, (_request, body, done) => {
    done(null, body);
  });

  fastify.post(
    '/sign_transaction',
    async (request: FastifyRequest, reply: FastifyReply) => {
      request.log.info('Called /sign_transaction');

      const parsed = parseTransaction(request.body);
      if (!parsed.success) {
        request.log.debug({ reason: parsed.reason }, 'failed to deserialize transaction');
        return reply.status(400).send({ error: 'failed to deserialize transaction' });
      }

      let signed: SignedTransaction;
      try {
        signed = await fastify.chain.signTransaction(parsed.data, fastify.keys.publicKeys.deposit);
      } catch (err: unknown) {
        request.log.warn({ err }, 'failed to sign transaction');
        return reply.status(500).send({ error: 'failed to sign transaction' });
      }

      let txid: string;
      try {
        txid = await fastify.chain.pushTransaction(signed);
      } catch (err: unknown) {
        request.log.debug({ err }, 'failed to send transaction to the blockchain');
        return reply.status(400).send({
          error: `failed to send transaction to the blockchain, reason: ${errorMessage(err)}`,
        });
      }

      request.log.info({ txid }, 'Deposit transaction sent');
      return reply.status(200).send({ txid });
    },
  );
}
