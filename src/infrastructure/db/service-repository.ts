import { randomUUID } from 'node:crypto';
import type { ErrorRecord, HeartbeatEvent, ServiceRecord } from '../../domain/index.js';
import type { Database } from './client.js';
import { services, serviceErrors } from './schema.js';
import type { StoredHeartbeatEvent } from './schema.js';

export function toStoredEvents(events: readonly HeartbeatEvent[]): StoredHeartbeatEvent[] {
  return events.map((e) => ({
    timestamp: e.timestamp.toISOString(),
    status: e.status,
    message: e.message,
    metadata: e.metadata,
  }));
}

/**
 * Writes the latest snapshot of a service.
 * ON CONFLICT on service_id turns repeat writes into updates.
 */
export async function upsertServiceSnapshot(
  db: Database,
  snapshot: ServiceRecord,
): Promise<void> {
  const row = {
    name: snapshot.name,
    status: snapshot.status,
    last_message: snapshot.last_message,
    metadata: snapshot.metadata,
    events: toStoredEvents(snapshot.events),
    last_heartbeat_at: snapshot.last_heartbeat_at,
    updated_at: new Date(),
  };

  await db
    .insert(services)
    .values({ service_id: snapshot.id, created_at: snapshot.created_at, ...row })
    .onConflictDoUpdate({ target: services.service_id, set: row });
}

/** Inserts an error record. Returns the generated error_id. */
export async function insertServiceError(
  db: Database,
  record: ErrorRecord,
): Promise<string> {
  const errorId = randomUUID();
  await db.insert(serviceErrors).values({
    error_id: errorId,
    service_id: record.service_id,
    error_type: record.error_type,
    message: record.message.slice(0, 1024),
    metadata: record.metadata,
    occurred_at: record.occurred_at,
  });
  return errorId;
}
