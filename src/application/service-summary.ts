import type { HeartbeatStatus, ServiceRecord, ServiceSummary } from '../domain/index.js';

/** Counts services per status; every status appears, zero or not. */
export function summarizeServices(records: readonly ServiceRecord[]): ServiceSummary {
  const counts: Record<HeartbeatStatus, number> = {
    unknown: 0,
    healthy: 0,
    busy: 0,
    warning: 0,
    error: 0,
    stale: 0,
  };

  for (const record of records) {
    counts[record.status] += 1;
  }

  return { total: records.length, status_counts: counts };
}
