import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { pumpSubscription, streamWriterFor } from '../sse/event-stream.js';

const startedAt = Date.now();

/**
 * System routes.
 *
 * GET /api/v1/health         — liveness
 * GET /api/v1/events/stream  — live event stream (server-sent events)
 */
async function systemRoutes(fastify: FastifyInstance): Promise<void> {

  // ── GET /api/v1/health ───────────────────────────────────
  fastify.get(
    '/api/v1/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send({
        status: 'ok',
        uptime_seconds: Math.floor((Date.now() - startedAt) / 1000),
        subscribers: fastify.registry.bus.subscriberCount,
      });
    },
  );

  // ── GET /api/v1/events/stream ────────────────────────────
  fastify.get(
    '/api/v1/events/stream',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const subscription = fastify.registry.bus.subscribe();
      const raw = reply.raw;

      reply.hijack();
      raw.writeHead(200, {
        ...reply.getHeaders(),
        'Content-Type': 'text/event-stream',
        'Cache-Control': 'no-cache',
        Connection: 'keep-alive',
        'X-Accel-Buffering': 'no',
      });
      // Commits the headers before the first event.
      raw.write(': stream open\n\n');

      // A client disconnect closes only this subscription.
      raw.once('close', () => subscription.close());

      void pumpSubscription(subscription, streamWriterFor(raw))
        .then((written) => {
          request.log.debug({ subscriptionId: subscription.id, written }, 'Event stream ended');
        })
        .catch((err: unknown) => {
          request.log.warn({ err, subscriptionId: subscription.id }, 'Event stream failed');
        })
        .finally(() => {
          subscription.close();
          raw.end();
        });

      return reply;
    },
  );
}

export default fp(systemRoutes, {
  name: 'system-routes',
  dependencies: ['registry', 'admission'],
  fastify: '5.x',
});
