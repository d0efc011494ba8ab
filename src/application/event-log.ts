import type { HeartbeatEvent } from '../domain/index.js';

export const DEFAULT_EVENT_LOG_CAPACITY = 100;

/**
 * Bounded, append-only history of heartbeat events for one service.
 *
 * Oldest entries are dropped once capacity is exceeded; retained
 * entries are never reordered or modified.
 */
export class EventLog {
  private entries: HeartbeatEvent[] = [];

  constructor(readonly capacity: number = DEFAULT_EVENT_LOG_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Event log capacity must be a positive integer, got ${capacity}`);
    }
  }

  /** Stores a frozen copy; the caller's objects are never retained. */
  append(event: HeartbeatEvent): void {
    this.entries.push(Object.freeze({
      timestamp: new Date(event.timestamp.getTime()),
      status: event.status,
      message: event.message,
      metadata: event.metadata ? Object.freeze({ ...event.metadata }) : null,
    }));
    const overflow = this.entries.length - this.capacity;
    if (overflow > 0) {
      this.entries = this.entries.slice(overflow);
    }
  }

  latest(): HeartbeatEvent | undefined {
    return this.entries.at(-1);
  }

  /** Oldest → newest copy. */
  toArray(): HeartbeatEvent[] {
    return [...this.entries];
  }

  get size(): number {
    return this.entries.length;
  }
}
