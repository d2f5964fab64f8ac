import type { FastifyInstance, FastifyReply } from "fastify";
import { BlockConflictError, NonceNotFoundError, StoreUnavailableError } from "../errors";

export function replyWithError(app: FastifyInstance, reply: FastifyReply, error: unknown, message: string) {
  app.log.error({ err: error }, message);

  if (error instanceof StoreUnavailableError) {
    return reply.status(503).send({ error: 'Block store unavailable', details: error.message });
  }
  if (error instanceof BlockConflictError) {
    return reply.status(409).send({ error: 'Block conflict', details: error.message, height: error.height });
  }
  if (error instanceof NonceNotFoundError) {
    return reply.status(500).send({
      error: 'Nonce not found',
      details: error.message,
      height: error.height,
      difficultyBits: error.difficultyBits,
    });
  }
  return reply.status(500).send({ error: message, details: String(error) });
}
