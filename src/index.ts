import Fastify from 'fastify';

import {
  redisPlugin,
  dbPlugin,
  loadServerConfig,
} from './infrastructure/index.js';
import { eventTypeRoutes } from './interfaces/http/index.js';
import { SchemaEvolutionService } from './application/index.js';

/**
 * Bootstrap Fastify server.
 *
 * Order:
 * 1) Configuration
 * 2) Infrastructure plugins
 * 3) HTTP routes
 * 4) listen()
 */
async function main(): Promise<void> {
  const config = loadServerConfig();

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
    },
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(dbPlugin, {
    databaseUrl: config.databaseUrl,
    poolSize: config.dbPoolSize,
  });

  if (config.notifyChanges) {
    await fastify.register(redisPlugin, { redisUrl: config.redisUrl });
  }

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(eventTypeRoutes, {
    service: new SchemaEvolutionService(),
    publisher: config.notifyChanges ? fastify.redis : null,
  });

  // --------------------------------------------------
  // Graceful shutdown
  // --------------------------------------------------

  const shutdown = (signal: NodeJS.Signals): void => {
    fastify.log.info({ signal }, 'Shutting down server...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({
    host: config.host,
    port: config.port,
  });
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
