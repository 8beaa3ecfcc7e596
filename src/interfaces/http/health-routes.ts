import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { HealthStatus } from '../../domain/index.js';
import { paginationSchema } from '../../application/registry-schema.js';
import { isEligibleForProbing, probeUrlFor } from '../../application/health-monitor.js';
import { requireAdmin, validationFailed } from './guards.js';

/**
 * Health probing routes.
 *
 * POST /api/v1/listings/:id/health-check     — probe one listing now (admin)
 * POST /api/v1/listings/health-check/batch   — probe every eligible listing (admin)
 * GET  /api/v1/listings/:id/health           — probe history, newest first
 * GET  /api/v1/health/summary                — approved listings by cached status
 * GET  /api/v1/health-check/schedule         — scheduler settings and state (admin)
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {

  // ── POST /api/v1/listings/:id/health-check ───────────────
  fastify.post<{ Params: { id: string } }>(
    '/api/v1/listings/:id/health-check',
    { preHandler: requireAdmin },
    async (
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply,
    ) => {
      const { stores, monitor } = fastify.registry;
      const listing = await stores.requests.get('listings', request.params.id);
      if (listing === undefined) {
        return reply.status(404).send({ error: 'NOT_FOUND', message: 'Listing not found' });
      }
      if (probeUrlFor(listing) === null) {
        return reply.status(422).send({ error: 'NO_PROBE_URL', message: 'Listing has neither api_url nor homepage_url' });
      }

      const recorded = await monitor.probeAndRecord(listing, { scheduled: false });
      return reply.status(200).send(recorded);
    },
  );

  // ── POST /api/v1/listings/health-check/batch ─────────────
  fastify.post(
    '/api/v1/listings/health-check/batch',
    { preHandler: requireAdmin },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const { stores, monitor } = fastify.registry;
      const listings = (await stores.requests.list('listings', { status: 'approved' })).filter(isEligibleForProbing);

      const results = [];
      for (const listing of listings) {
        const { result, uptime_pct } = await monitor.probeAndRecord(listing, { scheduled: false });
        results.push({
          listing_id: listing.id,
          status: result.status,
          status_code: result.status_code,
          response_time_ms: result.response_time_ms,
          uptime_pct,
        });
      }

      return reply.status(200).send({ checked: results.length, results });
    },
  );

  // ── GET /api/v1/listings/:id/health ──────────────────────
  fastify.get(
    '/api/v1/listings/:id/health',
    async (
      request: FastifyRequest<{ Params: { id: string }; Querystring: unknown }>,
      reply: FastifyReply,
    ) => {
      const page = paginationSchema.safeParse(request.query);
      if (!page.success) {
        return validationFailed(reply, page.error.flatten());
      }

      const { stores } = fastify.registry;
      const listing = await stores.requests.get('listings', request.params.id);
      if (listing === undefined) {
        return reply.status(404).send({ error: 'NOT_FOUND', message: 'Listing not found' });
      }

      const filter = { listing_id: listing.id };
      const [total, results] = await Promise.all([
        stores.requests.count('health_results', filter),
        stores.requests.list('health_results', filter, {
          newestFirst: true,
          limit: page.data.limit,
          offset: page.data.offset,
        }),
      ]);

      return reply.status(200).send({
        listing_id: listing.id,
        last_health_status: listing.last_health_status,
        uptime_pct: listing.uptime_pct,
        total,
        limit: page.data.limit,
        offset: page.data.offset,
        results,
      });
    },
  );

  // ── GET /api/v1/health/summary ───────────────────────────
  fastify.get(
    '/api/v1/health/summary',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const listings = await fastify.registry.stores.requests.list('listings', { status: 'approved' });

      const byStatus: Record<HealthStatus, number> = { healthy: 0, unhealthy: 0, unreachable: 0 };
      let unchecked = 0;
      for (const listing of listings) {
        if (listing.last_health_status === null) unchecked += 1;
        else byStatus[listing.last_health_status] += 1;
      }

      return reply.status(200).send({ total: listings.length, ...byStatus, unchecked });
    },
  );

  // ── GET /api/v1/health-check/schedule ────────────────────
  fastify.get(
    '/api/v1/health-check/schedule',
    { preHandler: requireAdmin },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(fastify.registry.scheduler.status());
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['registry', 'admission'],
  fastify: '5.x',
});
