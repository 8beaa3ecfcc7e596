import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { RegistryServices } from '../../app.js';

export interface RegistryPluginOptions {
  services: RegistryServices;
}

/**
 * Decorates `fastify.registry` with the process-wide services and ties
 * their lifecycle to the server's.
 *
 * preClose ends live event streams so in-flight SSE responses finish.
 * onClose stops the scheduler and the window pruner, lets spawned webhook
 * deliveries settle, then releases the store handles.
 */
async function registryPlugin(fastify: FastifyInstance, opts: RegistryPluginOptions): Promise<void> {
  const { services } = opts;

  fastify.decorate('registry', services);

  // Rolled-over rate windows are dropped once per window length.
  const { windowSeconds } = services.config.rateLimit;
  const pruner = setInterval(() => {
    const removed = services.limiter.prune(windowSeconds);
    if (removed > 0) fastify.log.debug({ removed }, 'Pruned idle rate-limit windows');
  }, windowSeconds * 1000);
  pruner.unref();

  fastify.addHook('preClose', async () => {
    services.bus.shutdown();
  });

  fastify.addHook('onClose', async () => {
    clearInterval(pruner);
    await services.scheduler.stop();
    await services.dispatcher.drain();
    await services.stores.close();
    fastify.log.info('Registry services stopped');
  });
}

export default fp<RegistryPluginOptions>(registryPlugin, {
  name: 'registry',
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyInstance {
    registry: RegistryServices;
  }
}
