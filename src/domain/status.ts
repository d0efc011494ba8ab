import { InvalidStatusError } from './errors.js';

/**
 * Closed set of health states a service can report.
 *
 * `stale` is never reported by a service itself; the stale detector
 * assigns it when heartbeats stop arriving.
 */
export const HEARTBEAT_STATUSES = [
  'unknown',
  'healthy',
  'busy',
  'warning',
  'error',
  'stale',
] as const;

export type HeartbeatStatus = (typeof HEARTBEAT_STATUSES)[number];

const KNOWN_STATUSES: ReadonlySet<string> = new Set(HEARTBEAT_STATUSES);

/** The only status treated as nominal by the notification rules. */
export const NOMINAL_STATUS: HeartbeatStatus = 'healthy';

/** Alert level attached to outgoing notifications. */
export type NotificationLevel = 'success' | 'info' | 'warning' | 'error';

export function isHeartbeatStatus(value: unknown): value is HeartbeatStatus {
  return typeof value === 'string' && KNOWN_STATUSES.has(value);
}

/**
 * Normalises an externally supplied status (case-insensitive, trimmed).
 * Throws InvalidStatusError for anything outside the enumeration.
 */
export function parseHeartbeatStatus(value: unknown): HeartbeatStatus {
  const normalised = typeof value === 'string' ? value.trim().toLowerCase() : value;
  if (!isHeartbeatStatus(normalised)) {
    throw new InvalidStatusError(value);
  }
  return normalised;
}

export function notificationLevelFor(status: HeartbeatStatus): NotificationLevel {
  if (status === NOMINAL_STATUS) return 'success';
  if (status === 'error') return 'error';
  return 'warning';
}
