import { z } from 'zod';
import { HEARTBEAT_STATUSES } from '../domain/index.js';

/**
 * Response shapes of the heartbeat HTTP API, as the client reads them.
 * Timestamps arrive as ISO-8601 strings and are parsed back into Dates.
 */
const statusSchema = z.enum(HEARTBEAT_STATUSES);

const metadataSchema = z.record(z.string(), z.unknown());

const eventSchema = z.object({
  timestamp: z.coerce.date(),
  status: statusSchema,
  message: z.string().nullable(),
  metadata: metadataSchema.nullable(),
});

export const serviceResponseSchema = z.object({
  id: z.string(),
  name: z.string(),
  status: statusSchema,
  last_message: z.string().nullable(),
  metadata: metadataSchema,
  last_heartbeat_at: z.coerce.date().nullable(),
  created_at: z.coerce.date(),
  events: z.array(eventSchema),
});

export const serviceListResponseSchema = z.object({
  services: z.array(serviceResponseSchema),
  summary: z.object({
    total: z.number().int(),
    status_counts: z.object({
      unknown: z.number().int(),
      healthy: z.number().int(),
      busy: z.number().int(),
      warning: z.number().int(),
      error: z.number().int(),
      stale: z.number().int(),
    }),
  }),
});

export type ServiceListResponse = z.infer<typeof serviceListResponseSchema>;

export const registerResponseSchema = z.object({
  service_id: z.string(),
});

/** `{ error, code }` body the routes send with 4xx answers. */
export const errorResponseSchema = z.object({
  error: z.string(),
  code: z.string().optional(),
});
