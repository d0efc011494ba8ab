import type { Logger } from 'pino';
import type { HeartbeatStatus, NotificationLevel, ServiceRecord } from '../domain/index.js';
import { NOMINAL_STATUS, NotifierError, errorMessage, notificationLevelFor } from '../domain/index.js';
import type { Notifier, Storage } from './ports.js';
import { DEFAULT_COLLABORATOR_TIMEOUT_MS, withTimeout } from './with-timeout.js';

export interface StatusNotification {
  readonly title: string;
  readonly message: string;
  readonly level: NotificationLevel;
}

export type DispatchOutcome =
  | { readonly notified: false }
  | { readonly notified: true; readonly delivered: readonly string[]; readonly failed: readonly string[] };

export type StatusChangeDispatcher = (
  record: ServiceRecord,
  previousStatus: HeartbeatStatus,
) => Promise<DispatchOutcome>;

export interface NotificationDispatcherOptions {
  notifiers: readonly Notifier[];
  log: Logger;
  storage?: Storage | null | undefined;
  timeoutMs?: number | undefined;
  now?: (() => Date) | undefined;
}

/**
 * Every transition is announced except healthy → healthy.
 * A repeated non-nominal status (warning → warning) is not a transition.
 */
export function shouldNotify(previous: HeartbeatStatus, current: HeartbeatStatus): boolean {
  if (previous === current) return false;
  return !(previous === NOMINAL_STATUS && current === NOMINAL_STATUS);
}

export function buildStatusNotification(
  record: ServiceRecord,
  previousStatus: HeartbeatStatus,
): StatusNotification {
  const base = `Status changed from ${previousStatus} to ${record.status}`;
  return {
    title: `Service Status Change - ${record.name}`,
    message: record.last_message ? `${base}: ${record.last_message}` : base,
    level: notificationLevelFor(record.status),
  };
}

/**
 * Builds the status-change fan-out.
 *
 * Each notifier is invoked independently and concurrently. A throw, a
 * `false` result or a timeout is logged, recorded through
 * `storage.storeError` when storage is configured, and otherwise
 * contained: the returned promise never rejects.
 */
export function createNotificationDispatcher(
  options: NotificationDispatcherOptions,
): StatusChangeDispatcher {
  const { notifiers, log, storage } = options;
  const timeoutMs = options.timeoutMs ?? DEFAULT_COLLABORATOR_TIMEOUT_MS;
  const now = options.now ?? (() => new Date());

  async function recordFailure(failure: NotifierError, record: ServiceRecord): Promise<void> {
    if (!storage) return;
    try {
      await withTimeout(
        Promise.resolve().then(() => storage.storeError({
          error_type: failure.code,
          message: failure.message,
          service_id: record.id,
          metadata: { notifier: failure.notifier, status: record.status },
          occurred_at: now(),
        })),
        timeoutMs,
        'storage.storeError',
      );
    } catch (err: unknown) {
      log.warn({ err, service_id: record.id }, 'Failed to record notifier error');
    }
  }

  async function deliver(
    notifier: Notifier,
    notification: StatusNotification,
    record: ServiceRecord,
  ): Promise<boolean> {
    try {
      const ok = await withTimeout(
        Promise.resolve().then(() => notifier.sendNotification(
          notification.title,
          notification.message,
          record,
          notification.level,
        )),
        timeoutMs,
        `notifier ${notifier.name}`,
      );
      if (!ok) {
        throw new NotifierError(notifier.name, `Notifier ${notifier.name} reported delivery failure`);
      }
      return true;
    } catch (err: unknown) {
      const failure = err instanceof NotifierError
        ? err
        : new NotifierError(notifier.name, `Notifier ${notifier.name} failed: ${errorMessage(err)}`, { cause: err });

      log.warn(
        { err: failure, notifier: notifier.name, service_id: record.id },
        'Notification delivery failed',
      );
      await recordFailure(failure, record);
      return false;
    }
  }

  return async (record, previousStatus) => {
    if (!shouldNotify(previousStatus, record.status)) {
      log.debug(
        { service_id: record.id, status: record.status },
        'No status transition, notification skipped',
      );
      return { notified: false };
    }

    const notification = buildStatusNotification(record, previousStatus);
    const results = await Promise.all(
      notifiers.map(async (notifier) => ({
        name: notifier.name,
        ok: await deliver(notifier, notification, record),
      })),
    );

    const delivered = results.filter((r) => r.ok).map((r) => r.name);
    const failed = results.filter((r) => !r.ok).map((r) => r.name);

    log.info(
      {
        service_id: record.id,
        from: previousStatus,
        to: record.status,
        level: notification.level,
        delivered: delivered.length,
        failed: failed.length,
      },
      'Status change dispatched',
    );

    return { notified: true, delivered, failed };
  };
}
