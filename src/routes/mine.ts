import type { FastifyInstance } from "fastify";
import type { Ledger } from "../chain/ledger";
import { replyWithError } from "./errorReply";

export async function registerMineRoutes(app: FastifyInstance, ledger: Ledger) {
  app.post('/mine', async (_request, reply) => {
    try {
      const block = await ledger.mine();
      return { status: 'Block mined', height: block.height, block };
    } catch (error) {
      return replyWithError(app, reply, error, 'Mining failed');
    }
  });
}
