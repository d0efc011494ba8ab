import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { ServiceRegistry } from '../../application/index.js';

export interface RegistryPluginOptions {
  registry: ServiceRegistry;
}

/**
 * Fastify plugin that exposes the process's registry instance.
 *
 * - Decorates `fastify.registry` for routes.
 * - Stops the stale monitor when the server closes.
 */
async function registryPlugin(
  fastify: FastifyInstance,
  options: RegistryPluginOptions,
): Promise<void> {
  fastify.decorate('registry', options.registry);

  fastify.addHook('onClose', async () => {
    await options.registry.stop();
    fastify.log.info('Registry monitor stopped');
  });
}

export default fp(registryPlugin, {
  name: 'registry',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.registry` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    registry: ServiceRegistry;
  }
}
