import { describe, it, expect, vi } from 'vitest';
import type { Database } from '../../src/infrastructure/db/client.js';
import {
  insertServiceError,
  toStoredEvents,
  upsertServiceSnapshot,
} from '../../src/infrastructure/db/service-repository.js';
import { services, serviceErrors } from '../../src/infrastructure/db/schema.js';
import { FIXED_NOW, makeRecord } from '../helpers.js';

function fakeDb() {
  const onConflictDoUpdate = vi.fn().mockResolvedValue(undefined);
  const values = vi.fn(() => {
    const pending = Promise.resolve(undefined);
    return Object.assign(pending, { onConflictDoUpdate });
  });
  const insert = vi.fn(() => ({ values }));
  return { insert, values, onConflictDoUpdate, db: { insert } as unknown as Database };
}

describe('toStoredEvents', () => {
  it('serialises timestamps as ISO strings', () => {
    expect(
      toStoredEvents([{ timestamp: FIXED_NOW, status: 'busy', message: 'job', metadata: { n: 1 } }]),
    ).toEqual([{ timestamp: '2026-02-18T12:00:00.000Z', status: 'busy', message: 'job', metadata: { n: 1 } }]);
  });
});

describe('upsertServiceSnapshot', () => {
  it('inserts the snapshot and updates on service_id conflict', async () => {
    const { insert, values, onConflictDoUpdate, db } = fakeDb();
    const snapshot = makeRecord({
      id: 'svc-A',
      name: 'billing',
      status: 'warning',
      last_message: 'high load',
      metadata: { region: 'eu' },
      events: [{ timestamp: FIXED_NOW, status: 'warning', message: 'high load', metadata: null }],
    });

    await upsertServiceSnapshot(db, snapshot);

    expect(insert).toHaveBeenCalledWith(services);
    expect(values).toHaveBeenCalledWith(expect.objectContaining({
      service_id: 'svc-A',
      created_at: FIXED_NOW,
      name: 'billing',
      status: 'warning',
      last_message: 'high load',
      metadata: { region: 'eu' },
      events: [{ timestamp: '2026-02-18T12:00:00.000Z', status: 'warning', message: 'high load', metadata: null }],
      last_heartbeat_at: FIXED_NOW,
    }));
    expect(onConflictDoUpdate).toHaveBeenCalledWith(expect.objectContaining({
      target: services.service_id,
      set: expect.objectContaining({ status: 'warning', last_message: 'high load' }),
    }));
  });
});

describe('insertServiceError', () => {
  it('inserts a row with a generated id and a bounded message', async () => {
    const { insert, values, db } = fakeDb();

    const id = await insertServiceError(db, {
      error_type: 'NOTIFIER_FAILED',
      message: 'x'.repeat(2000),
      service_id: 'svc-A',
      metadata: { notifier: 'slack' },
      occurred_at: FIXED_NOW,
    });

    expect(id).toMatch(/^[0-9a-f-]{36}$/);
    expect(insert).toHaveBeenCalledWith(serviceErrors);
    expect(values).toHaveBeenCalledWith({
      error_id: id,
      service_id: 'svc-A',
      error_type: 'NOTIFIER_FAILED',
      message: 'x'.repeat(1024),
      metadata: { notifier: 'slack' },
      occurred_at: FIXED_NOW,
    });
  });
});
