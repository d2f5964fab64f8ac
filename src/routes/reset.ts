import type { FastifyInstance } from "fastify";
import type { Ledger } from "../chain/ledger";
import { replyWithError } from "./errorReply";

export async function registerResetRoutes(app: FastifyInstance, ledger: Ledger) {
  app.post('/reset', async (_request, reply) => {
    try {
      const genesis = await ledger.reset();

      return {
        status: 'Reset successful',
        currentHeight: genesis.height,
        genesis,
      };
    } catch (error) {
      return replyWithError(app, reply, error, 'Reset failed');
    }
  });
}
