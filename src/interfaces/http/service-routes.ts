import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import {
  DuplicateServiceError,
  HEARTBEAT_STATUSES,
  InvalidStatusError,
  ServiceNotFoundError,
} from '../../domain/index.js';
import {
  heartbeatSchema,
  registerServiceSchema,
  serviceIdParamsSchema,
} from '../../application/index.js';

/**
 * Translates caller-facing registry errors into responses.
 * Anything else is rethrown to Fastify's default 500 handling.
 */
function sendRegistryError(reply: FastifyReply, err: unknown): FastifyReply {
  if (err instanceof ServiceNotFoundError) {
    return reply.status(404).send({ error: err.message, code: err.code });
  }
  if (err instanceof DuplicateServiceError) {
    return reply.status(409).send({ error: err.message, code: err.code });
  }
  if (err instanceof InvalidStatusError) {
    return reply.status(400).send({ error: err.message, code: err.code, allowed: HEARTBEAT_STATUSES });
  }
  throw err;
}

/**
 * Service heartbeat routes.
 *
 * POST /api/v1/services                          register
 * POST /api/v1/services/:service_id/heartbeat    heartbeat
 * GET  /api/v1/services/:service_id              single service
 * GET  /api/v1/services                          all services + summary
 * GET  /api/v1/health                            liveness of this process
 */
async function serviceRoutes(fastify: FastifyInstance): Promise<void> {

  // ── POST /api/v1/services ────────────────────────────────
  fastify.post(
    '/api/v1/services',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = registerServiceSchema.safeParse(request.body);
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      try {
        const serviceId = await fastify.registry.register(
          parsed.data.service_name,
          parsed.data.service_id,
          parsed.data.metadata,
        );
        return reply.status(201).send({ service_id: serviceId });
      } catch (err: unknown) {
        return sendRegistryError(reply, err);
      }
    },
  );

  // ── POST /api/v1/services/:service_id/heartbeat ──────────
  fastify.post(
    '/api/v1/services/:service_id/heartbeat',
    async (
      request: FastifyRequest<{ Params: { service_id: string }; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const params = serviceIdParamsSchema.safeParse(request.params);
      if (!params.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: params.error.issues });
      }

      const parsed = heartbeatSchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        return reply.status(400).send({ error: 'Validation failed', issues: parsed.error.issues });
      }

      try {
        const record = await fastify.registry.heartbeat(
          params.data.service_id,
          parsed.data.status,
          parsed.data.message,
          parsed.data.metadata,
        );
        return reply.status(200).send(record);
      } catch (err: unknown) {
        return sendRegistryError(reply, err);
      }
    },
  );

  // ── GET /api/v1/services/:service_id ─────────────────────
  fastify.get(
    '/api/v1/services/:service_id',
    async (
      request: FastifyRequest<{ Params: { service_id: string } }>,
      reply: FastifyReply,
    ) => {
      try {
        return reply.status(200).send(fastify.registry.get(request.params.service_id));
      } catch (err: unknown) {
        return sendRegistryError(reply, err);
      }
    },
  );

  // ── GET /api/v1/services ─────────────────────────────────
  fastify.get(
    '/api/v1/services',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const services = fastify.registry
        .list()
        .sort((a, b) => a.name.localeCompare(b.name) || a.id.localeCompare(b.id));
      return reply.status(200).send({ services, summary: fastify.registry.summary() });
    },
  );

  // ── GET /api/v1/health ───────────────────────────────────
  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send({
        status: 'ok',
        monitor: fastify.registry.monitorState,
        services: fastify.registry.summary().total,
      });
    },
  );
}

export default fp(serviceRoutes, {
  name: 'service-routes',
  dependencies: ['registry'],
  fastify: '5.x',
});
