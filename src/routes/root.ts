import type { FastifyInstance } from "fastify";
import type { Ledger } from "../chain/ledger";
import { replyWithError } from "./errorReply";

export async function registerRootRoutes(app: FastifyInstance, ledger: Ledger) {
  app.get('/', async (_request, reply) => {
    try {
      return { welcome: 'in blockchain', length: await ledger.length() };
    } catch (error) {
      return replyWithError(app, reply, error, 'Database error');
    }
  });
}
