import type { Logger } from 'pino';
import type { ServiceRecord } from '../domain/index.js';

export const DEFAULT_STALE_THRESHOLD_MS = 60_000;
export const DEFAULT_CHECK_INTERVAL_MS = 30_000;

/** What the sweep needs from the registry. */
export interface StaleSweepTarget {
  list(): ServiceRecord[];
  markStale(serviceId: string, thresholdMs: number, now?: Date): Promise<ServiceRecord | null>;
}

/**
 * Milliseconds since the last heartbeat when the record qualifies as
 * stale, otherwise null. Never-heartbeated and already-stale records
 * never qualify.
 */
export function staleElapsedMs(
  record: Pick<ServiceRecord, 'status' | 'last_heartbeat_at'>,
  now: Date,
  thresholdMs: number,
): number | null {
  if (record.last_heartbeat_at === null || record.status === 'stale') return null;
  const elapsed = now.getTime() - record.last_heartbeat_at.getTime();
  return elapsed > thresholdMs ? elapsed : null;
}

export function findStaleServices(
  records: readonly ServiceRecord[],
  now: Date,
  thresholdMs: number,
): ServiceRecord[] {
  return records.filter((r) => staleElapsedMs(r, now, thresholdMs) !== null);
}

export function staleMessage(elapsedMs: number): string {
  return `No heartbeat received in ${Math.floor(elapsedMs / 1000)}s`;
}

export interface StaleDetectorOptions {
  log: Logger;
  staleThresholdMs?: number | undefined;
  now?: (() => Date) | undefined;
}

/**
 * One pass of the staleness sweep.
 *
 * Candidates come from a registry snapshot; each demotion goes through
 * `markStale`, which re-checks eligibility under the record's lock, so
 * a heartbeat that lands mid-sweep wins.
 */
export class StaleDetector {
  readonly thresholdMs: number;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(
    private readonly target: StaleSweepTarget,
    options: StaleDetectorOptions,
  ) {
    this.thresholdMs = options.staleThresholdMs ?? DEFAULT_STALE_THRESHOLD_MS;
    this.log = options.log;
    this.now = options.now ?? (() => new Date());
  }

  async sweep(signal?: AbortSignal): Promise<string[]> {
    const now = this.now();
    const candidates = findStaleServices(this.target.list(), now, this.thresholdMs);
    const demoted: string[] = [];

    for (const candidate of candidates) {
      if (signal?.aborted) {
        this.log.debug({ remaining: candidates.length - demoted.length }, 'Stale sweep interrupted');
        break;
      }

      try {
        const updated = await this.target.markStale(candidate.id, this.thresholdMs, now);
        if (updated) {
          demoted.push(candidate.id);
          this.log.warn(
            { service_id: candidate.id, name: candidate.name, message: updated.last_message },
            'Service marked stale',
          );
        }
      } catch (err: unknown) {
        this.log.error({ err, service_id: candidate.id }, 'Failed to mark service stale');
      }
    }

    this.log.debug(
      { checked: candidates.length, demoted: demoted.length },
      'Stale sweep completed',
    );
    return demoted;
  }
}
