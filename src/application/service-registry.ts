import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type {
  HeartbeatEvent,
  HeartbeatStatus,
  ServiceMetadata,
  ServiceRecord,
  ServiceSummary,
} from '../domain/index.js';
import {
  DuplicateServiceError,
  ServiceNotFoundError,
  parseHeartbeatStatus,
} from '../domain/index.js';
import { EventLog, DEFAULT_EVENT_LOG_CAPACITY } from './event-log.js';
import { KeyedLock } from './keyed-lock.js';
import type { MonitorState } from './monitor-controller.js';
import { MonitorController } from './monitor-controller.js';
import type { StatusChangeDispatcher } from './notification-dispatcher.js';
import { createNotificationDispatcher } from './notification-dispatcher.js';
import type { Storage } from './ports.js';
import { summarizeServices } from './service-summary.js';
import type { StaleSweepTarget } from './stale-detector.js';
import {
  DEFAULT_CHECK_INTERVAL_MS,
  StaleDetector,
  staleElapsedMs,
  staleMessage,
} from './stale-detector.js';
import { DEFAULT_COLLABORATOR_TIMEOUT_MS, withTimeout } from './with-timeout.js';

export const REGISTERED_MESSAGE = 'Service registered';

export interface ServiceRegistryOptions {
  log: Logger;
  storage?: Storage | null | undefined;
  /** Defaults to a dispatcher with no notifiers. */
  dispatch?: StatusChangeDispatcher | undefined;
  checkIntervalMs?: number | undefined;
  staleThresholdMs?: number | undefined;
  collaboratorTimeoutMs?: number | undefined;
  eventLogCapacity?: number | undefined;
  now?: (() => Date) | undefined;
  generateId?: (() => string) | undefined;
}

/** Mutable registry-side state; never handed out directly. */
interface ServiceState {
  readonly id: string;
  readonly name: string;
  readonly created_at: Date;
  readonly events: EventLog;
  status: HeartbeatStatus;
  last_message: string | null;
  metadata: ServiceMetadata;
  last_heartbeat_at: Date | null;
}

function copyEvent(event: HeartbeatEvent): HeartbeatEvent {
  return {
    timestamp: new Date(event.timestamp.getTime()),
    status: event.status,
    message: event.message,
    metadata: event.metadata ? { ...event.metadata } : null,
  };
}

/** Detached copy: no Date, map or event is shared with registry state. */
function toSnapshot(state: ServiceState): ServiceRecord {
  return {
    id: state.id,
    name: state.name,
    status: state.status,
    last_message: state.last_message,
    metadata: { ...state.metadata },
    last_heartbeat_at: state.last_heartbeat_at ? new Date(state.last_heartbeat_at.getTime()) : null,
    created_at: new Date(state.created_at.getTime()),
    events: state.events.toArray().map(copyEvent),
  };
}

/**
 * Authoritative in-memory map of registered services.
 *
 * Every write for a given id runs inside that id's KeyedLock chain, so
 * read-modify-append, persistence and notification for one service are
 * strictly ordered while other services proceed independently. State is
 * mutated synchronously at the top of the critical section; `get` and
 * `list` therefore need no lock to observe whole updates.
 *
 * Constructed once by the entry point and passed to whoever needs it.
 * The stale monitor is owned by the instance (`start` / `stop`).
 */
export class ServiceRegistry implements StaleSweepTarget {
  private readonly services = new Map<string, ServiceState>();
  private readonly lock = new KeyedLock();
  private readonly log: Logger;
  private readonly storage: Storage | null;
  private readonly dispatch: StatusChangeDispatcher;
  private readonly timeoutMs: number;
  private readonly eventLogCapacity: number;
  private readonly now: () => Date;
  private readonly generateId: () => string;
  private readonly monitor: MonitorController;

  readonly staleDetector: StaleDetector;

  constructor(options: ServiceRegistryOptions) {
    this.log = options.log;
    this.storage = options.storage ?? null;
    this.timeoutMs = options.collaboratorTimeoutMs ?? DEFAULT_COLLABORATOR_TIMEOUT_MS;
    this.eventLogCapacity = options.eventLogCapacity ?? DEFAULT_EVENT_LOG_CAPACITY;
    this.now = options.now ?? (() => new Date());
    this.generateId = options.generateId ?? randomUUID;
    this.dispatch = options.dispatch ?? createNotificationDispatcher({
      notifiers: [],
      log: this.log,
      storage: this.storage,
      timeoutMs: this.timeoutMs,
      now: this.now,
    });

    this.staleDetector = new StaleDetector(this, {
      log: this.log,
      staleThresholdMs: options.staleThresholdMs,
      now: this.now,
    });
    this.monitor = new MonitorController(
      (signal) => this.staleDetector.sweep(signal),
      options.checkIntervalMs ?? DEFAULT_CHECK_INTERVAL_MS,
      this.log,
    );
  }

  // ── Registration ─────────────────────────────────────────

  async register(
    name: string,
    id?: string | null,
    metadata?: ServiceMetadata | null,
  ): Promise<string> {
    const serviceId = id ?? this.uniqueId();

    // check-and-insert happens before the first await, so two concurrent
    // registrations of the same id cannot both pass
    if (this.services.has(serviceId)) {
      throw new DuplicateServiceError(serviceId);
    }

    const createdAt = new Date(this.now().getTime());
    const state: ServiceState = {
      id: serviceId,
      name,
      created_at: createdAt,
      events: new EventLog(this.eventLogCapacity),
      status: 'unknown',
      last_message: REGISTERED_MESSAGE,
      metadata: { ...(metadata ?? {}) },
      last_heartbeat_at: null,
    };
    state.events.append({
      timestamp: createdAt,
      status: 'unknown',
      message: REGISTERED_MESSAGE,
      metadata: metadata ? { ...metadata } : null,
    });
    this.services.set(serviceId, state);

    this.log.info({ service_id: serviceId, name }, 'Service registered');

    await this.lock.run(serviceId, () => this.persist(toSnapshot(state)));
    return serviceId;
  }

  // ── Heartbeats ───────────────────────────────────────────

  /**
   * Records a heartbeat and returns the post-update snapshot.
   *
   * The status is validated before anything is queued: an invalid value
   * rejects with InvalidStatusError and leaves the record untouched.
   */
  async heartbeat(
    serviceId: string,
    status: string,
    message?: string | null,
    metadata?: ServiceMetadata | null,
  ): Promise<ServiceRecord> {
    const parsed = parseHeartbeatStatus(status);
    return this.lock.run(
      serviceId,
      () => this.applyHeartbeat(serviceId, parsed, message ?? null, metadata ?? null),
    );
  }

  /**
   * Scheduler entry point. Re-checks eligibility inside the record's
   * critical section and applies a `stale` heartbeat through the same
   * path as any other heartbeat. Returns null when the record no longer
   * qualifies.
   */
  async markStale(serviceId: string, thresholdMs: number, now?: Date): Promise<ServiceRecord | null> {
    return this.lock.run(serviceId, async () => {
      const state = this.services.get(serviceId);
      if (!state) return null;

      const elapsed = staleElapsedMs(state, now ?? this.now(), thresholdMs);
      if (elapsed === null) return null;

      return this.applyHeartbeat(serviceId, 'stale', staleMessage(elapsed), null);
    });
  }

  /** Must only run inside `lock.run(serviceId, ...)`. */
  private async applyHeartbeat(
    serviceId: string,
    status: HeartbeatStatus,
    message: string | null,
    metadata: ServiceMetadata | null,
  ): Promise<ServiceRecord> {
    const state = this.services.get(serviceId);
    if (!state) {
      throw new ServiceNotFoundError(serviceId);
    }

    const previousStatus = state.status;
    const now = this.now();
    const at = new Date(
      Math.max(now.getTime(), state.last_heartbeat_at?.getTime() ?? Number.NEGATIVE_INFINITY),
    );

    state.status = status;
    state.last_message = message;
    state.last_heartbeat_at = at;
    if (metadata) {
      state.metadata = { ...state.metadata, ...metadata };
    }
    state.events.append({
      timestamp: at,
      status,
      message,
      metadata: metadata ? { ...metadata } : null,
    });

    const snapshot = toSnapshot(state);
    this.log.debug(
      { service_id: serviceId, from: previousStatus, to: status },
      'Heartbeat recorded',
    );

    await this.persist(snapshot);
    try {
      await this.dispatch(snapshot, previousStatus);
    } catch (err: unknown) {
      this.log.error({ err, service_id: serviceId }, 'Status change dispatch failed');
    }

    // collaborators may have touched `snapshot`; the caller gets its own copy
    return toSnapshot(state);
  }

  // ── Reads ────────────────────────────────────────────────

  get(serviceId: string): ServiceRecord {
    const state = this.services.get(serviceId);
    if (!state) {
      throw new ServiceNotFoundError(serviceId);
    }
    return toSnapshot(state);
  }

  has(serviceId: string): boolean {
    return this.services.has(serviceId);
  }

  /** Insertion order is incidental; sort if order matters. */
  list(): ServiceRecord[] {
    return [...this.services.values()].map(toSnapshot);
  }

  summary(): ServiceSummary {
    return summarizeServices(this.list());
  }

  // ── Monitor lifecycle ────────────────────────────────────

  start(): void {
    this.monitor.start();
  }

  stop(): Promise<void> {
    return this.monitor.stop();
  }

  get monitorState(): MonitorState {
    return this.monitor.state;
  }

  get isRunning(): boolean {
    return this.monitor.state === 'running';
  }

  // ── Internals ────────────────────────────────────────────

  private uniqueId(): string {
    let candidate = this.generateId();
    while (this.services.has(candidate)) {
      candidate = this.generateId();
    }
    return candidate;
  }

  /** Best-effort: failures and timeouts are logged, never raised. */
  private async persist(snapshot: ServiceRecord): Promise<void> {
    const storage = this.storage;
    if (!storage) return;

    try {
      await withTimeout(
        Promise.resolve().then(() => storage.storeHeartbeat(snapshot.id, snapshot)),
        this.timeoutMs,
        'storage.storeHeartbeat',
      );
    } catch (err: unknown) {
      this.log.warn({ err, service_id: snapshot.id }, 'Failed to persist service snapshot');
    }
  }
}
