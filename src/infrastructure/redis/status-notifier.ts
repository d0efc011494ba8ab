import type { Redis } from 'ioredis';
import type { Logger } from 'pino';
import type { NotificationLevel, ServiceRecord } from '../../domain/index.js';
import type { Notifier } from '../../application/index.js';

export const DEFAULT_STATUS_CHANNEL = 'service_status_changes';

export interface StatusChangePayload {
  service_id: string;
  name: string;
  status: string;
  level: NotificationLevel;
  title: string;
  message: string;
  last_heartbeat_at: string | null;
  published_at: string;
}

/**
 * Publishes status changes to a Redis Pub/Sub channel so other processes
 * (dashboards, relays) can subscribe. A publish reaching zero
 * subscribers still counts as delivered.
 */
export class RedisStatusNotifier implements Notifier {
  readonly name = 'redis';

  constructor(
    private readonly redis: Pick<Redis, 'publish'>,
    private readonly log: Logger,
    private readonly channel: string = DEFAULT_STATUS_CHANNEL,
  ) {}

  async sendNotification(
    title: string,
    message: string,
    service: ServiceRecord,
    level: NotificationLevel,
  ): Promise<boolean> {
    const payload: StatusChangePayload = {
      service_id: service.id,
      name: service.name,
      status: service.status,
      level,
      title,
      message,
      last_heartbeat_at: service.last_heartbeat_at?.toISOString() ?? null,
      published_at: new Date().toISOString(),
    };

    const receivers = await this.redis.publish(this.channel, JSON.stringify(payload));
    this.log.debug(
      { channel: this.channel, service_id: service.id, receivers },
      'Status change published',
    );
    return true;
  }
}
