import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import { createDbClient } from './client.js';
import type { Database } from './client.js';
import { ensureTables } from './migrate.js';

export interface DbPluginOptions {
  databaseUrl: string;
  poolSize: number;
}

/**
 * Fastify plugin that manages the Drizzle/postgres.js connection lifecycle.
 *
 * Creates the tables when missing, decorates `fastify.db` for use by
 * the event-type routes and closes the connection pool on server shutdown.
 */
async function dbPlugin(fastify: FastifyInstance, opts: DbPluginOptions): Promise<void> {
  const { sql, db } = createDbClient(opts.databaseUrl, {
    maxConnections: opts.poolSize,
    onNotice: (message) => fastify.log.debug({ notice: message }, 'Postgres notice'),
  });
  await ensureTables(sql);
  fastify.log.info('Database ready (event_types + event_type_schemas tables)');

  fastify.decorate('db', db);

  fastify.addHook('onClose', async () => {
    await sql.end();
    fastify.log.info('Database disconnected');
  });
}

export default fp(dbPlugin, {
  name: 'db',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.db` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    db: Database;
  }
}
