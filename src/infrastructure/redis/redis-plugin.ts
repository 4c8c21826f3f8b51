import fp from 'fastify-plugin';
import { Redis } from 'ioredis';
import type { FastifyInstance } from 'fastify';

export interface RedisPluginOptions {
  redisUrl: string;
  /** Shown in `CLIENT LIST` on the Redis side. */
  connectionName?: string;
}

/**
 * Fastify plugin owning the ioredis connection used to publish
 * event-type change notifications.
 *
 * Connects before the server starts listening and quits on close;
 * connection errors after startup are logged, never thrown.
 */
async function redisPlugin(fastify: FastifyInstance, opts: RedisPluginOptions): Promise<void> {
  const redis = new Redis(opts.redisUrl, {
    connectionName: opts.connectionName ?? 'schemagate',
    maxRetriesPerRequest: 3,
    lazyConnect: true,
  });

  redis.on('error', (err: Error) => {
    fastify.log.error({ err }, 'Redis connection error');
  });

  await redis.connect();
  fastify.log.info({ url: opts.redisUrl.replace(/\/\/[^@]*@/, '//***@') }, 'Redis connected');

  fastify.decorate('redis', redis);

  fastify.addHook('onClose', async () => {
    await redis.quit();
    fastify.log.info('Redis disconnected');
  });
}

export default fp(redisPlugin, {
  name: 'redis',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    redis: Redis;
  }
}
