import Fastify from 'fastify';
import type { FastifyServerOptions } from 'fastify';
import { Ledger } from './chain/ledger';
import type { LedgerOptions } from './chain/ledger';
import type { LedgerConfig } from './config';
import type { BlockStore } from './interfaces';
import { registerRootRoutes } from './routes/root';
import { registerTransactionRoutes } from './routes/transactions';
import { registerMineRoutes } from './routes/mine';
import { registerBlocksRoutes } from './routes/blocks';
import { registerResetRoutes } from './routes/reset';

export interface BuildAppOptions {
  store: BlockStore;
  ledger: LedgerConfig;
  logger?: FastifyServerOptions['logger'];
  now?: LedgerOptions['now'];
  timer?: LedgerOptions['timer'];
}

export async function buildApp(options: BuildAppOptions) {
  const fastify = Fastify({ logger: options.logger ?? true });

  const ledger = new Ledger({
    store: options.store,
    config: options.ledger,
    logger: fastify.log.child({ module: 'ledger' }),
    now: options.now,
    timer: options.timer,
  });

  await registerRootRoutes(fastify, ledger);
  await registerTransactionRoutes(fastify, ledger);
  await registerMineRoutes(fastify, ledger);
  await registerBlocksRoutes(fastify, ledger);
  await registerResetRoutes(fastify, ledger);

  return fastify;
}
