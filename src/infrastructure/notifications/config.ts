import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';

/**
 * Notification channel configuration loaded from YAML.
 */
export interface NotificationConfig {
  discord: { enabled: boolean; webhook_url: string; username: string; avatar_url: string };
  slack: { enabled: boolean; webhook_url: string };
  redis: { enabled: boolean; channel: string };
}

/**
 * Default configuration: every channel disabled.
 */
export const DEFAULT_CONFIG: NotificationConfig = {
  discord: { enabled: false, webhook_url: '', username: 'Heartbeat Monitor', avatar_url: '' },
  slack: { enabled: false, webhook_url: '' },
  redis: { enabled: false, channel: 'service_status_changes' },
};

/**
 * Minimal YAML parser for the flat notification config structure.
 *
 * Handles only the subset used in config/notifications.yaml: top-level
 * section keys with indented scalar values. Not a general-purpose YAML
 * parser.
 */
function parseSimpleYaml(content: string): Record<string, Record<string, unknown>> {
  const result: Record<string, Record<string, unknown>> = {};
  let section: Record<string, unknown> | null = null;

  for (const rawLine of content.split('\n')) {
    const line = rawLine.trimEnd();
    if (line.trim() === '' || line.trimStart().startsWith('#')) continue;

    const colonIdx = line.indexOf(':');
    if (colonIdx === -1) continue;

    // Top-level key (no leading whitespace)
    if (!line.startsWith(' ') && !line.startsWith('\t')) {
      section = {};
      result[line.slice(0, colonIdx).trim()] = section;
      continue;
    }

    if (section) {
      section[line.slice(0, colonIdx).trim()] = parseScalar(line.slice(colonIdx + 1).trim());
    }
  }

  return result;
}

function parseScalar(raw: string): unknown {
  if (raw === 'true') return true;
  if (raw === 'false') return false;
  if (raw === '""' || raw === "''") return '';
  if (raw.length >= 2 && ((raw.startsWith('"') && raw.endsWith('"')) || (raw.startsWith("'") && raw.endsWith("'")))) {
    return raw.slice(1, -1);
  }
  return raw;
}

function bool(section: Record<string, unknown>, key: string, fallback: boolean): boolean {
  const value = section[key];
  return typeof value === 'boolean' ? value : fallback;
}

function str(section: Record<string, unknown>, key: string, fallback: string): string {
  const value = section[key];
  return typeof value === 'string' ? value : fallback;
}

/**
 * Loads notification configuration from the YAML file.
 *
 * Falls back to DEFAULT_CONFIG if the file is missing or unreadable.
 * Merges loaded values over defaults so missing keys get default values.
 */
export function loadNotificationConfig(
  configPath?: string,
): NotificationConfig {
  const filePath = configPath ?? resolve(process.cwd(), 'config', 'notifications.yaml');

  let content: string;
  try {
    content = readFileSync(filePath, 'utf-8');
  } catch {
    return structuredClone(DEFAULT_CONFIG);
  }

  const parsed = parseSimpleYaml(content);
  const discord = parsed['discord'] ?? {};
  const slack = parsed['slack'] ?? {};
  const redis = parsed['redis'] ?? {};

  return {
    discord: {
      enabled: bool(discord, 'enabled', DEFAULT_CONFIG.discord.enabled),
      webhook_url: str(discord, 'webhook_url', DEFAULT_CONFIG.discord.webhook_url),
      username: str(discord, 'username', DEFAULT_CONFIG.discord.username),
      avatar_url: str(discord, 'avatar_url', DEFAULT_CONFIG.discord.avatar_url),
    },
    slack: {
      enabled: bool(slack, 'enabled', DEFAULT_CONFIG.slack.enabled),
      webhook_url: str(slack, 'webhook_url', DEFAULT_CONFIG.slack.webhook_url),
    },
    redis: {
      enabled: bool(redis, 'enabled', DEFAULT_CONFIG.redis.enabled),
      channel: str(redis, 'channel', DEFAULT_CONFIG.redis.channel) || DEFAULT_CONFIG.redis.channel,
    },
  };
}
