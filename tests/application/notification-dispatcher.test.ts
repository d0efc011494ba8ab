import { describe, it, expect } from 'vitest';
import {
  buildStatusNotification,
  createNotificationDispatcher,
  shouldNotify,
} from '../../src/application/index.js';
import { NotifierError } from '../../src/domain/index.js';
import type { HeartbeatStatus } from '../../src/domain/index.js';
import { FIXED_NOW, fakeLogger, fakeNotifier, fakeStorage, makeRecord } from '../helpers.js';

describe('shouldNotify', () => {
  const cases: Array<[HeartbeatStatus, HeartbeatStatus, boolean]> = [
    ['healthy', 'healthy', false],
    ['warning', 'warning', false],
    ['unknown', 'healthy', true],
    ['healthy', 'warning', true],
    ['warning', 'error', true],
    ['error', 'healthy', true],
    ['healthy', 'stale', true],
    ['stale', 'healthy', true],
  ];

  it.each(cases)('%s -> %s notifies: %s', (previous, current, expected) => {
    expect(shouldNotify(previous, current)).toBe(expected);
  });
});

describe('buildStatusNotification', () => {
  it('includes the last message when present', () => {
    const record = makeRecord({ name: 'svc-A', status: 'warning', last_message: 'high load' });

    expect(buildStatusNotification(record, 'healthy')).toEqual({
      title: 'Service Status Change - svc-A',
      message: 'Status changed from healthy to warning: high load',
      level: 'warning',
    });
  });

  it('omits the suffix when there is no message', () => {
    const record = makeRecord({ name: 'svc-A', status: 'healthy', last_message: null });

    expect(buildStatusNotification(record, 'error')).toEqual({
      title: 'Service Status Change - svc-A',
      message: 'Status changed from error to healthy',
      level: 'success',
    });
  });

  it('uses the error level for error transitions', () => {
    const record = makeRecord({ status: 'error', last_message: 'crashed' });

    expect(buildStatusNotification(record, 'healthy').level).toBe('error');
  });
});

describe('createNotificationDispatcher', () => {
  it('calls every notifier once per transition with the built notification', async () => {
    const slack = fakeNotifier('slack');
    const discord = fakeNotifier('discord');
    const dispatch = createNotificationDispatcher({ notifiers: [slack, discord], log: fakeLogger() });
    const record = makeRecord({ name: 'billing', status: 'warning', last_message: 'high load' });

    const outcome = await dispatch(record, 'healthy');

    expect(outcome).toEqual({ notified: true, delivered: ['slack', 'discord'], failed: [] });
    for (const notifier of [slack, discord]) {
      expect(notifier.sendNotification).toHaveBeenCalledTimes(1);
      expect(notifier.sendNotification).toHaveBeenCalledWith(
        'Service Status Change - billing',
        'Status changed from healthy to warning: high load',
        record,
        'warning',
      );
    }
  });

  it('stays silent for healthy to healthy', async () => {
    const notifier = fakeNotifier('slack');
    const log = fakeLogger();
    const dispatch = createNotificationDispatcher({ notifiers: [notifier], log });

    const outcome = await dispatch(makeRecord({ status: 'healthy' }), 'healthy');

    expect(outcome).toEqual({ notified: false });
    expect(notifier.sendNotification).not.toHaveBeenCalled();
    expect(log.debug).toHaveBeenCalledWith(
      { service_id: 'svc-A', status: 'healthy' },
      'No status transition, notification skipped',
    );
  });

  it('keeps delivering to the others when one notifier throws', async () => {
    const broken = fakeNotifier('broken');
    broken.sendNotification.mockRejectedValue(new Error('webhook 500'));
    const healthy = fakeNotifier('healthy');
    const storage = fakeStorage();
    const log = fakeLogger();
    const dispatch = createNotificationDispatcher({
      notifiers: [broken, healthy],
      log,
      storage,
      now: () => FIXED_NOW,
    });

    const outcome = await dispatch(makeRecord({ status: 'error', last_message: 'crashed' }), 'healthy');

    expect(outcome).toEqual({ notified: true, delivered: ['healthy'], failed: ['broken'] });
    expect(healthy.sendNotification).toHaveBeenCalledTimes(1);
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ notifier: 'broken', service_id: 'svc-A', err: expect.any(NotifierError) }),
      'Notification delivery failed',
    );
    expect(storage.storeError).toHaveBeenCalledWith({
      error_type: 'NOTIFIER_FAILED',
      message: 'Notifier broken failed: webhook 500',
      service_id: 'svc-A',
      metadata: { notifier: 'broken', status: 'error' },
      occurred_at: FIXED_NOW,
    });
  });

  it('treats a false result as a delivery failure', async () => {
    const notifier = fakeNotifier('slack');
    notifier.sendNotification.mockResolvedValue(false);
    const storage = fakeStorage();
    const dispatch = createNotificationDispatcher({ notifiers: [notifier], log: fakeLogger(), storage });

    const outcome = await dispatch(makeRecord({ status: 'warning' }), 'healthy');

    expect(outcome).toEqual({ notified: true, delivered: [], failed: ['slack'] });
    expect(storage.storeError).toHaveBeenCalledWith(
      expect.objectContaining({ message: 'Notifier slack reported delivery failure' }),
    );
  });

  it('contains a notifier that throws synchronously', async () => {
    const notifier = fakeNotifier('sync');
    notifier.sendNotification.mockImplementation(() => {
      throw new Error('bad config');
    });
    const dispatch = createNotificationDispatcher({ notifiers: [notifier], log: fakeLogger() });

    await expect(dispatch(makeRecord({ status: 'error' }), 'healthy')).resolves.toEqual({
      notified: true,
      delivered: [],
      failed: ['sync'],
    });
  });

  it('gives up on a notifier that exceeds the timeout', async () => {
    const slow = fakeNotifier('slow');
    slow.sendNotification.mockImplementation(() => new Promise<boolean>(() => {}));
    const storage = fakeStorage();
    const dispatch = createNotificationDispatcher({
      notifiers: [slow],
      log: fakeLogger(),
      storage,
      timeoutMs: 10,
    });

    const outcome = await dispatch(makeRecord({ status: 'stale' }), 'healthy');

    expect(outcome).toEqual({ notified: true, delivered: [], failed: ['slow'] });
    expect(storage.storeError).toHaveBeenCalledWith(
      expect.objectContaining({ message: 'Notifier slow failed: notifier slow timed out after 10ms' }),
    );
  });

  it('logs but does not raise when recording the failure also fails', async () => {
    const notifier = fakeNotifier('slack');
    notifier.sendNotification.mockResolvedValue(false);
    const storage = fakeStorage();
    storage.storeError.mockRejectedValue(new Error('db down'));
    const log = fakeLogger();
    const dispatch = createNotificationDispatcher({ notifiers: [notifier], log, storage });

    await expect(dispatch(makeRecord({ status: 'warning' }), 'healthy')).resolves.toMatchObject({
      notified: true,
    });
    expect(log.warn).toHaveBeenCalledWith(
      expect.objectContaining({ service_id: 'svc-A' }),
      'Failed to record notifier error',
    );
  });

  it('runs without storage', async () => {
    const notifier = fakeNotifier('slack');
    notifier.sendNotification.mockRejectedValue(new Error('down'));
    const dispatch = createNotificationDispatcher({ notifiers: [notifier], log: fakeLogger() });

    await expect(dispatch(makeRecord({ status: 'warning' }), 'healthy')).resolves.toEqual({
      notified: true,
      delivered: [],
      failed: ['slack'],
    });
  });

  it('reports success with no notifiers configured', async () => {
    const log = fakeLogger();
    const dispatch = createNotificationDispatcher({ notifiers: [], log });

    const outcome = await dispatch(makeRecord({ status: 'warning' }), 'healthy');

    expect(outcome).toEqual({ notified: true, delivered: [], failed: [] });
    expect(log.info).toHaveBeenCalledWith(
      expect.objectContaining({ from: 'healthy', to: 'warning', level: 'warning' }),
      'Status change dispatched',
    );
  });

  it('invokes notifiers concurrently', async () => {
    let inFlight = 0;
    let peak = 0;
    const make = (name: string) => {
      const notifier = fakeNotifier(name);
      notifier.sendNotification.mockImplementation(async () => {
        inFlight += 1;
        peak = Math.max(peak, inFlight);
        await new Promise((resolve) => setTimeout(resolve, 5));
        inFlight -= 1;
        return true;
      });
      return notifier;
    };
    const dispatch = createNotificationDispatcher({
      notifiers: [make('a'), make('b'), make('c')],
      log: fakeLogger(),
    });

    await dispatch(makeRecord({ status: 'error' }), 'healthy');

    expect(peak).toBe(3);
  });
});
