import type { Logger } from 'pino';
import type { NotificationLevel, ServiceRecord } from '../../domain/index.js';
import type { Notifier } from '../../application/index.js';
import type { NotificationConfig } from './config.js';

const LEVEL_COLORS: Record<NotificationLevel, number> = {
  info: 0x3498db,
  success: 0x2ecc71,
  warning: 0xf39c12,
  error: 0xe74c3c,
};

/** Metadata keys never echoed into a Discord channel. */
const REDACTED_KEYS = new Set(['password', 'token', 'secret', 'key']);

export interface DiscordEmbedField {
  name: string;
  value: string;
  inline: boolean;
}

export interface DiscordEmbed {
  title: string;
  description: string;
  color: number;
  timestamp: string;
  fields: DiscordEmbedField[];
}

export function buildDiscordEmbed(
  title: string,
  message: string,
  service: ServiceRecord,
  level: NotificationLevel,
  now: Date = new Date(),
): DiscordEmbed {
  const fields: DiscordEmbedField[] = [
    { name: 'Service Name', value: service.name, inline: true },
    { name: 'Status', value: service.status, inline: true },
  ];

  if (service.last_heartbeat_at) {
    fields.push({
      name: 'Last Heartbeat',
      value: service.last_heartbeat_at.toISOString(),
      inline: true,
    });
  }

  const metadataLines = Object.entries(service.metadata)
    .filter(([key]) => !REDACTED_KEYS.has(key.toLowerCase()))
    .map(([key, value]) => `**${key}**: ${typeof value === 'string' ? value : JSON.stringify(value)}`);

  if (metadataLines.length > 0) {
    fields.push({ name: 'Metadata', value: metadataLines.join('\n'), inline: false });
  }

  return {
    title,
    description: message,
    color: LEVEL_COLORS[level],
    timestamp: now.toISOString(),
    fields,
  };
}

/**
 * Discord webhook notifier: one embed per status change.
 */
export class DiscordNotifier implements Notifier {
  readonly name = 'discord';

  constructor(
    private readonly config: NotificationConfig['discord'],
    private readonly log: Logger,
  ) {}

  async sendNotification(
    title: string,
    message: string,
    service: ServiceRecord,
    level: NotificationLevel,
  ): Promise<boolean> {
    if (!this.config.webhook_url) {
      this.log.warn('Discord enabled but webhook_url is empty, skipping');
      return false;
    }

    const payload: Record<string, unknown> = {
      username: this.config.username,
      embeds: [buildDiscordEmbed(title, message, service, level)],
    };
    if (this.config.avatar_url) {
      payload['avatar_url'] = this.config.avatar_url;
    }

    const response = await fetch(this.config.webhook_url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(payload),
    });

    if (!response.ok) {
      this.log.warn(
        { status: response.status, service_id: service.id },
        'Discord webhook returned non-OK status',
      );
      return false;
    }

    this.log.info({ service_id: service.id, level }, 'Discord notification sent');
    return true;
  }
}
