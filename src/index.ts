import Fastify from 'fastify';
import pino from 'pino';
import type { Redis } from 'ioredis';

import { loadAppConfig } from './config.js';
import {
  ServiceRegistry,
  createNotificationDispatcher,
} from './application/index.js';
import { createDbClient, PostgresStorage } from './infrastructure/db/index.js';
import { createRedisClient } from './infrastructure/redis/client.js';
import { createNotifiers, loadNotificationConfig } from './infrastructure/notifications/index.js';
import { registryPlugin, serviceRoutes } from './interfaces/http/index.js';

/**
 * Bootstrap.
 *
 * Order:
 * 1) Config + logger
 * 2) Collaborators (storage, redis), each optional; failures degrade to in-memory
 * 3) Registry (single instance, passed by reference)
 * 4) HTTP routes + shutdown hooks
 * 5) listen(), then start the stale monitor
 */
async function main(): Promise<void> {
  const config = loadAppConfig();
  const log = pino({ level: config.logLevel });

  // --------------------------------------------------
  // Storage (optional)
  // --------------------------------------------------

  let storage: PostgresStorage | null = null;

  if (config.databaseUrl) {
    const client = createDbClient(config.databaseUrl);
    const candidate = new PostgresStorage(client, log);
    try {
      await candidate.connect();
      storage = candidate;
    } catch (err: unknown) {
      log.warn({ err }, 'Storage unavailable, running in memory only');
      await client.sql.end().catch((endErr: unknown) => {
        log.debug({ err: endErr }, 'Failed to close database pool');
      });
    }
  }

  // --------------------------------------------------
  // Redis (optional, status-change publishing)
  // --------------------------------------------------

  let redis: Redis | null = null;

  if (config.redisUrl) {
    const candidate = createRedisClient(config.redisUrl);
    try {
      await candidate.connect();
      redis = candidate;
      log.info('Redis connected');
    } catch (err: unknown) {
      log.warn({ err }, 'Redis unavailable, status publishing disabled');
      candidate.disconnect();
    }
  }

  // --------------------------------------------------
  // Notifications + registry
  // --------------------------------------------------

  const notifConfig = loadNotificationConfig(config.notificationsConfigPath);
  log.info(
    {
      discord: notifConfig.discord.enabled,
      slack: notifConfig.slack.enabled,
      redis: notifConfig.redis.enabled,
    },
    'Notification config loaded',
  );

  const dispatch = createNotificationDispatcher({
    notifiers: createNotifiers(notifConfig, log, redis),
    storage,
    log,
    timeoutMs: config.collaboratorTimeoutMs,
  });

  const registry = new ServiceRegistry({
    log,
    storage,
    dispatch,
    checkIntervalMs: config.checkIntervalMs,
    staleThresholdMs: config.staleThresholdMs,
    collaboratorTimeoutMs: config.collaboratorTimeoutMs,
  });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  const fastify = Fastify({ loggerInstance: log });

  await fastify.register(registryPlugin, { registry });
  await fastify.register(serviceRoutes);

  /**
   * IMPORTANT:
   * onClose MUST be registered BEFORE listen()
   */
  fastify.addHook('onClose', async () => {
    if (redis) {
      await redis.quit();
      log.info('Redis disconnected');
    }
    if (storage) {
      await storage.close();
    }
  });

  await fastify.listen({ host: config.host, port: config.port });

  registry.start();

  // --------------------------------------------------
  // Graceful shutdown
  // --------------------------------------------------

  const shutdown = (signal: NodeJS.Signals): void => {
    log.info({ signal }, 'Shutting down...');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Error during shutdown');
        process.exit(1);
      },
    );
  };

  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((err: unknown) => {

  console.error(
    'Fatal: failed to start server',
    err,
  );

  process.exit(1);

});
