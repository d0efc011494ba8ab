import type { HeartbeatStatus } from './status.js';

/** Open-ended key/value data attached to a service or a single heartbeat. */
export type ServiceMetadata = Record<string, unknown>;

/**
 * One entry in a service's event history.
 *
 * Events are frozen on creation; the log only ever appends or drops
 * the oldest entries.
 */
export interface HeartbeatEvent {
  readonly timestamp: Date;
  readonly status: HeartbeatStatus;
  readonly message: string | null;
  readonly metadata: ServiceMetadata | null;
}

/**
 * Point-in-time copy of a registered service.
 *
 * `last_heartbeat_at` stays null until the first heartbeat after
 * registration, which keeps freshly registered services out of the
 * stale sweep.
 */
export interface ServiceRecord {
  readonly id: string;
  readonly name: string;
  readonly status: HeartbeatStatus;
  readonly last_message: string | null;
  readonly metadata: ServiceMetadata;
  readonly last_heartbeat_at: Date | null;
  readonly created_at: Date;
  readonly events: readonly HeartbeatEvent[];
}

/** Per-status counts across the registry. */
export interface ServiceSummary {
  readonly total: number;
  readonly status_counts: Readonly<Record<HeartbeatStatus, number>>;
}
