import type { FastifyInstance } from "fastify";
import type { Ledger } from "../chain/ledger";
import { replyWithError } from "./errorReply";

const limitQuerySchema = {
  type: 'object',
  properties: {
    limit: { type: 'integer', minimum: 1, maximum: 1000, default: 10 },
  },
} as const;

export async function registerBlocksRoutes(app: FastifyInstance, ledger: Ledger) {
  app.get('/blocks', async (_request, reply) => {
    try {
      const blocks = await ledger.allBlocks();
      return { blocks, count: blocks.length, currentHeight: blocks.length };
    } catch (error) {
      return replyWithError(app, reply, error, 'Database error');
    }
  });

  app.get('/blocks/genesis', async (_request, reply) => {
    try {
      const genesis = await ledger.genesisBlock();
      if (!genesis) {
        return reply.status(404).send({ error: 'Chain is empty' });
      }
      return genesis;
    } catch (error) {
      return replyWithError(app, reply, error, 'Database error');
    }
  });

  app.get<{ Querystring: { limit: number } }>(
    '/blocks/latest',
    { schema: { querystring: limitQuerySchema } },
    async (request, reply) => {
      try {
        const blocks = await ledger.latestBlocks(request.query.limit);
        return { blocks, count: blocks.length };
      } catch (error) {
        return replyWithError(app, reply, error, 'Database error');
      }
    },
  );

  // Unknown fields are not an error: they just match nothing.
  app.get<{ Params: { field: string }; Querystring: { limit: number } }>(
    '/blocks/top/:field',
    { schema: { querystring: limitQuerySchema } },
    async (request, reply) => {
      try {
        const blocks = await ledger.topBlocks(request.params.field, request.query.limit);
        return { field: request.params.field, blocks, count: blocks.length };
      } catch (error) {
        return replyWithError(app, reply, error, 'Database error');
      }
    },
  );

  app.get<{ Params: { height: number } }>(
    '/blocks/:height',
    {
      schema: {
        params: {
          type: 'object',
          required: ['height'],
          properties: { height: { type: 'integer' } },
        },
      },
    },
    async (request, reply) => {
      try {
        const block = await ledger.getBlock(request.params.height);
        if (!block) {
          return reply.status(404).send({ error: `Block not found at height ${request.params.height}` });
        }
        return block;
      } catch (error) {
        return replyWithError(app, reply, error, 'Database error');
      }
    },
  );
}
