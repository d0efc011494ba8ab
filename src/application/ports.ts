import type { ErrorRecord, NotificationLevel, ServiceRecord } from '../domain/index.js';

/**
 * Persistence collaborator. Optional: the registry runs entirely in
 * memory without one. Every call is best-effort from the core's side.
 */
export interface Storage {
  connect(): Promise<void>;
  storeHeartbeat(serviceId: string, snapshot: ServiceRecord): Promise<void>;
  storeError(record: ErrorRecord): Promise<void>;
}

/**
 * Human-facing alert channel (webhook, pub/sub, ...).
 *
 * Resolving `false` is an explicit delivery failure; throwing is treated
 * the same way.
 */
export interface Notifier {
  readonly name: string;
  sendNotification(
    title: string,
    message: string,
    service: ServiceRecord,
    level: NotificationLevel,
  ): Promise<boolean>;
}
