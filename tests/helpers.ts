import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { ServiceRecord } from '../src/domain/index.js';
import type { Notifier, Storage } from '../src/application/index.js';

/** Minimal fake logger. */
export function fakeLogger() {
  return {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
  } as unknown as Logger;
}

/** Fixed start time for deterministic timestamps. */
export const FIXED_NOW = new Date('2026-02-18T12:00:00Z');

/** Manually advanced clock. */
export function fakeClock(start: Date = FIXED_NOW) {
  let current = start.getTime();
  return {
    now: () => new Date(current),
    advance(ms: number): void {
      current += ms;
    },
    set(date: Date): void {
      current = date.getTime();
    },
  };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
  reject: (reason: unknown) => void;
}

export function deferred<T = void>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  let reject: (reason: unknown) => void = () => {};
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/** Lets pending promise callbacks run. */
export function flushPromises(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export function fakeStorage(): Storage & {
  connect: ReturnType<typeof vi.fn>;
  storeHeartbeat: ReturnType<typeof vi.fn>;
  storeError: ReturnType<typeof vi.fn>;
} {
  return {
    connect: vi.fn().mockResolvedValue(undefined),
    storeHeartbeat: vi.fn().mockResolvedValue(undefined),
    storeError: vi.fn().mockResolvedValue(undefined),
  };
}

export function fakeNotifier(name: string): Notifier & { sendNotification: ReturnType<typeof vi.fn> } {
  return {
    name,
    sendNotification: vi.fn().mockResolvedValue(true),
  };
}

/** ServiceRecord factory with sensible defaults. */
export function makeRecord(overrides: Partial<ServiceRecord> = {}): ServiceRecord {
  return {
    id: overrides.id ?? 'svc-A',
    name: overrides.name ?? 'svc-A',
    status: overrides.status ?? 'healthy',
    last_message: overrides.last_message ?? null,
    metadata: overrides.metadata ?? {},
    last_heartbeat_at: overrides.last_heartbeat_at === undefined ? FIXED_NOW : overrides.last_heartbeat_at,
    created_at: overrides.created_at ?? FIXED_NOW,
    events: overrides.events ?? [],
  };
}
