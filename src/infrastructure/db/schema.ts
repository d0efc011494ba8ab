import { pgTable, uuid, varchar, timestamp, jsonb, index } from 'drizzle-orm/pg-core';

/** Stored form of a single heartbeat event (dates as ISO-8601 strings). */
export interface StoredHeartbeatEvent {
  timestamp: string;
  status: string;
  message: string | null;
  metadata: Record<string, unknown> | null;
}

/**
 * Latest known state of every registered service.
 *
 * One row per service, upserted on each registration and heartbeat.
 * The bounded event history travels along as a JSONB array.
 */
export const services = pgTable('services', {
  service_id: varchar('service_id', { length: 255 }).primaryKey(),
  name: varchar('name', { length: 255 }).notNull(),
  status: varchar('status', { length: 20 }).notNull(),
  last_message: varchar('last_message', { length: 1024 }),
  metadata: jsonb('metadata').$type<Record<string, unknown>>().notNull().default({}),
  events: jsonb('events').$type<StoredHeartbeatEvent[]>().notNull().default([]),
  last_heartbeat_at: timestamp('last_heartbeat_at', { withTimezone: true }),
  created_at: timestamp('created_at', { withTimezone: true }).notNull(),
  updated_at: timestamp('updated_at', { withTimezone: true }).notNull().defaultNow(),
}, (table) => [
  index('idx_services_status').on(table.status),
  index('idx_services_last_heartbeat_at').on(table.last_heartbeat_at),
]);

/**
 * Collaborator failures recorded by the core (notifier errors, mostly).
 *
 * `service_id` is not a foreign key; error rows insert even when the
 * service row never reached the database.
 */
export const serviceErrors = pgTable('service_errors', {
  error_id: uuid('error_id').primaryKey(),
  service_id: varchar('service_id', { length: 255 }),
  error_type: varchar('error_type', { length: 64 }).notNull(),
  message: varchar('message', { length: 1024 }).notNull(),
  metadata: jsonb('metadata').$type<Record<string, unknown>>().notNull().default({}),
  occurred_at: timestamp('occurred_at', { withTimezone: true }).notNull(),
}, (table) => [
  index('idx_service_errors_service_id').on(table.service_id),
  index('idx_service_errors_occurred_at').on(table.occurred_at),
]);
