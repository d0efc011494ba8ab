import { z } from 'zod';

/**
 * Request-body schemas for the HTTP boundary.
 *
 * `status` is accepted as any string here and validated by the registry,
 * so an unknown value surfaces as InvalidStatusError in one place.
 */
export const registerServiceSchema = z.object({
  service_name: z.string().trim().min(1).max(255),
  service_id: z.string().trim().min(1).max(255).optional(),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

export type RegisterServiceInput = z.infer<typeof registerServiceSchema>;

export const heartbeatSchema = z.object({
  status: z.string().min(1).default('healthy'),
  message: z.string().max(1024).optional(),
  metadata: z.record(z.string(), z.unknown()).optional(),
});

export type HeartbeatInput = z.infer<typeof heartbeatSchema>;

export const serviceIdParamsSchema = z.object({
  service_id: z.string().min(1).max(255),
});

