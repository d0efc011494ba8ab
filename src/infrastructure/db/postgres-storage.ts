import type { Logger } from 'pino';
import type { ErrorRecord, ServiceRecord } from '../../domain/index.js';
import { StorageUnavailableError, errorMessage } from '../../domain/index.js';
import type { Storage } from '../../application/index.js';
import type { DbClient } from './client.js';
import { upsertServiceSnapshot, insertServiceError } from './service-repository.js';

/**
 * Lightweight migration, run on connect. In production the schema would
 * come from drizzle-kit migrations; this keeps local runs self-contained.
 */
const DDL = [
  `CREATE TABLE IF NOT EXISTS services (
    service_id         VARCHAR(255) PRIMARY KEY,
    name               VARCHAR(255) NOT NULL,
    status             VARCHAR(20)  NOT NULL,
    last_message       VARCHAR(1024),
    metadata           JSONB        NOT NULL DEFAULT '{}',
    events             JSONB        NOT NULL DEFAULT '[]',
    last_heartbeat_at  TIMESTAMPTZ,
    created_at         TIMESTAMPTZ  NOT NULL,
    updated_at         TIMESTAMPTZ  NOT NULL DEFAULT NOW()
  )`,
  `CREATE TABLE IF NOT EXISTS service_errors (
    error_id     UUID PRIMARY KEY,
    service_id   VARCHAR(255),
    error_type   VARCHAR(64)   NOT NULL,
    message      VARCHAR(1024) NOT NULL,
    metadata     JSONB         NOT NULL DEFAULT '{}',
    occurred_at  TIMESTAMPTZ   NOT NULL
  )`,
  'CREATE INDEX IF NOT EXISTS idx_services_status ON services (status)',
  'CREATE INDEX IF NOT EXISTS idx_services_last_heartbeat_at ON services (last_heartbeat_at)',
  'CREATE INDEX IF NOT EXISTS idx_service_errors_service_id ON service_errors (service_id)',
  'CREATE INDEX IF NOT EXISTS idx_service_errors_occurred_at ON service_errors (occurred_at)',
];

/**
 * Storage collaborator backed by PostgreSQL.
 *
 * Every failure is rethrown as StorageUnavailableError; the registry
 * and dispatcher contain it.
 */
export class PostgresStorage implements Storage {
  private connected = false;

  constructor(
    private readonly client: Pick<DbClient, 'sql' | 'db'>,
    private readonly log: Logger,
  ) {}

  async connect(): Promise<void> {
    if (this.connected) return;

    try {
      for (const statement of DDL) {
        await this.client.sql.unsafe(statement);
      }
    } catch (err: unknown) {
      throw new StorageUnavailableError(`PostgreSQL unavailable: ${errorMessage(err)}`, { cause: err });
    }

    this.connected = true;
    this.log.info('Database ready (services + service_errors tables)');
  }

  async storeHeartbeat(serviceId: string, snapshot: ServiceRecord): Promise<void> {
    try {
      await upsertServiceSnapshot(this.client.db, snapshot);
    } catch (err: unknown) {
      throw new StorageUnavailableError(
        `Failed to store snapshot for ${serviceId}: ${errorMessage(err)}`,
        { cause: err },
      );
    }
  }

  async storeError(record: ErrorRecord): Promise<void> {
    try {
      await insertServiceError(this.client.db, record);
    } catch (err: unknown) {
      throw new StorageUnavailableError(`Failed to store error record: ${errorMessage(err)}`, { cause: err });
    }
  }

  async close(): Promise<void> {
    await this.client.sql.end();
    this.connected = false;
    this.log.info('Database disconnected');
  }
}
