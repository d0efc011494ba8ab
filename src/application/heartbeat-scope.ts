import type { HeartbeatStatus, ServiceMetadata, ServiceRecord } from '../domain/index.js';
import { errorMessage } from '../domain/index.js';

export interface HeartbeatReporter {
  heartbeat(
    serviceId: string,
    status: string,
    message?: string | null,
    metadata?: ServiceMetadata | null,
  ): Promise<ServiceRecord>;
}

export interface HeartbeatScopeOptions {
  busyMessage?: string;
  successStatus?: HeartbeatStatus;
  successMessage?: string;
  errorStatus?: HeartbeatStatus;
  metadata?: ServiceMetadata;
}

/**
 * Brackets a unit of work with heartbeats: `busy` on entry, the success
 * status on normal completion, the error status (with the error's
 * message) on failure. The original error is re-thrown.
 */
export async function withHeartbeatScope<T>(
  reporter: HeartbeatReporter,
  serviceId: string,
  work: () => Promise<T> | T,
  options: HeartbeatScopeOptions = {},
): Promise<T> {
  await reporter.heartbeat(serviceId, 'busy', options.busyMessage ?? null, options.metadata ?? null);

  let result: T;
  try {
    result = await work();
  } catch (err: unknown) {
    await reporter.heartbeat(serviceId, options.errorStatus ?? 'error', errorMessage(err));
    throw err;
  }

  await reporter.heartbeat(serviceId, options.successStatus ?? 'healthy', options.successMessage ?? null);
  return result;
}
