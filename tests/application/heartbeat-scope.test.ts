import { describe, it, expect } from 'vitest';
import { ServiceRegistry, withHeartbeatScope } from '../../src/application/index.js';
import { fakeLogger } from '../helpers.js';

async function registryWith(id: string): Promise<ServiceRegistry> {
  const registry = new ServiceRegistry({ log: fakeLogger() });
  await registry.register('worker', id);
  return registry;
}

describe('withHeartbeatScope', () => {
  it('reports busy then healthy around successful work', async () => {
    const registry = await registryWith('job-1');

    const result = await withHeartbeatScope(registry, 'job-1', async () => 'done', {
      busyMessage: 'processing batch',
    });

    expect(result).toBe('done');
    const events = registry.get('job-1').events;
    expect(events.map((e) => [e.status, e.message])).toEqual([
      ['unknown', 'Service registered'],
      ['busy', 'processing batch'],
      ['healthy', null],
    ]);
  });

  it('reports the error and rethrows the original failure', async () => {
    const registry = await registryWith('job-1');
    const failure = new Error('disk full');

    await expect(
      withHeartbeatScope(registry, 'job-1', () => {
        throw failure;
      }),
    ).rejects.toBe(failure);

    const record = registry.get('job-1');
    expect(record.status).toBe('error');
    expect(record.last_message).toBe('disk full');
    expect(record.events.map((e) => e.status)).toEqual(['unknown', 'busy', 'error']);
  });

  it('honours custom statuses, messages and metadata', async () => {
    const registry = await registryWith('job-1');

    await withHeartbeatScope(registry, 'job-1', () => 1, {
      successStatus: 'warning',
      successMessage: 'finished with retries',
      metadata: { batch: 7 },
    });

    const record = registry.get('job-1');
    expect(record.status).toBe('warning');
    expect(record.last_message).toBe('finished with retries');
    expect(record.metadata).toEqual({ batch: 7 });
  });

  it('does not run the work when the service is unknown', async () => {
    const registry = new ServiceRegistry({ log: fakeLogger() });
    let ran = false;

    await expect(
      withHeartbeatScope(registry, 'ghost', () => {
        ran = true;
      }),
    ).rejects.toThrow('Service ghost not found');
    expect(ran).toBe(false);
  });
});
