export { services, serviceErrors } from './schema.js';
export type { StoredHeartbeatEvent } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, DbClient } from './client.js';
export { upsertServiceSnapshot, insertServiceError, toStoredEvents } from './service-repository.js';
export { PostgresStorage } from './postgres-storage.js';
