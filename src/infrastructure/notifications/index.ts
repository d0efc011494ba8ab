import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { Notifier } from '../../application/index.js';
import type { NotificationConfig } from './config.js';
import { DiscordNotifier } from './discord.js';
import { SlackNotifier } from './slack.js';
import { RedisStatusNotifier } from '../redis/status-notifier.js';

export { loadNotificationConfig, DEFAULT_CONFIG } from './config.js';
export type { NotificationConfig } from './config.js';
export { SlackNotifier, formatSlackText } from './slack.js';
export { DiscordNotifier, buildDiscordEmbed } from './discord.js';
export type { DiscordEmbed, DiscordEmbedField } from './discord.js';

/**
 * Builds the enabled notifier channels.
 *
 * The Redis channel is only created when a client is supplied; without
 * one, an enabled `redis` section is logged and skipped.
 */
export function createNotifiers(
  config: NotificationConfig,
  log: Logger,
  redis: Pick<Redis, 'publish'> | null = null,
): Notifier[] {
  const notifiers: Notifier[] = [];

  if (config.discord.enabled) {
    notifiers.push(new DiscordNotifier(config.discord, log));
  }

  if (config.slack.enabled) {
    notifiers.push(new SlackNotifier(config.slack, log));
  }

  if (config.redis.enabled) {
    if (redis) {
      notifiers.push(new RedisStatusNotifier(redis, log, config.redis.channel));
    } else {
      log.warn('Redis notifications enabled but REDIS_URL is not set, skipping');
    }
  }

  log.debug({ notifiers: notifiers.map((n) => n.name) }, 'Notifiers configured');
  return notifiers;
}
