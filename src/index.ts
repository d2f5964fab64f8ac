import { buildApp } from './app';
import { loadConfig } from './config';
import { openBlockDatabase } from './db/pool';
import { PgBlockStore } from './db/blockStore';

const config = loadConfig();

const pool = await openBlockDatabase(config.databaseUrl);

const fastify = await buildApp({
  store: new PgBlockStore(pool),
  ledger: config.ledger,
  logger: { level: config.logLevel },
});

fastify.addHook('onClose', async () => {
  await pool.end();
});

try {
  await fastify.listen({ port: config.port, host: config.host });
} catch (err) {
  fastify.log.error(err);
  process.exit(1);
}
