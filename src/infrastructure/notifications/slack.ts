import type { Logger } from 'pino';
import type { NotificationLevel, ServiceRecord } from '../../domain/index.js';
import type { Notifier } from '../../application/index.js';
import type { NotificationConfig } from './config.js';

const LEVEL_EMOJI: Record<NotificationLevel, string> = {
  success: ':white_check_mark:',
  info: ':information_source:',
  warning: ':warning:',
  error: ':rotating_light:',
};

export function formatSlackText(
  title: string,
  message: string,
  service: ServiceRecord,
  level: NotificationLevel,
): string {
  return `${LEVEL_EMOJI[level]} *[${level.toUpperCase()}] ${title}*\n>${message}\nService: \`${service.id}\` | Status: ${service.status}`;
}

/**
 * Slack incoming-webhook notifier.
 *
 * Resolves false (delivery failure) on an empty webhook URL or a non-OK
 * response; network errors propagate to the dispatcher.
 */
export class SlackNotifier implements Notifier {
  readonly name = 'slack';

  constructor(
    private readonly config: NotificationConfig['slack'],
    private readonly log: Logger,
  ) {}

  async sendNotification(
    title: string,
    message: string,
    service: ServiceRecord,
    level: NotificationLevel,
  ): Promise<boolean> {
    if (!this.config.webhook_url) {
      this.log.warn('Slack enabled but webhook_url is empty, skipping');
      return false;
    }

    const response = await fetch(this.config.webhook_url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ text: formatSlackText(title, message, service, level) }),
    });

    if (!response.ok) {
      this.log.warn(
        { status: response.status, service_id: service.id },
        'Slack webhook returned non-OK status',
      );
      return false;
    }

    this.log.info({ service_id: service.id, level }, 'Slack notification sent');
    return true;
  }
}
