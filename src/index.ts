import Fastify from 'fastify';
import { pino } from 'pino';

import { loadCollectorConfig, redisPlugin } from './infrastructure/index.js';
import { collectorRoutes } from './interfaces/http/index.js';
import {
  createDefaultAdapterRegistry,
  createDefaultSchemaRegistry,
} from './application/index.js';

/**
 * Bootstrap the collector.
 *
 * Order:
 * 1) Configuration (fails fast on invalid env)
 * 2) Infrastructure plugins
 * 3) Collector routes
 * 4) listen()
 */
async function main(): Promise<void> {
  const config = loadCollectorConfig();

  const fastify = Fastify({
    logger: {
      level: config.logLevel,
    },
    bodyLimit: config.bodyLimit,
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  await fastify.register(redisPlugin, { url: config.redisUrl });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  const registry = createDefaultAdapterRegistry();

  await fastify.register(collectorRoutes, {
    registry,
    validator: createDefaultSchemaRegistry(),
    streamKey: config.streamKey,
  });

  fastify.log.info(
    { adapters: registry.adapters.map((a) => `${a.vendor}/${a.version}`) },
    'Adapters registered',
  );

  // --------------------------------------------------
  // Shutdown
  // --------------------------------------------------

  const shutdown = (signal: string): void => {
    fastify.log.info({ signal }, 'Shutting down');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  await fastify.listen({
    host: config.host,
    port: config.port,
  });
}

main().catch((err: unknown) => {
  pino().fatal({ err }, 'Fatal: failed to start collector');
  process.exit(1);
});
