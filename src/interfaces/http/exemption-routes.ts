import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { bucketSchema, rateExemptionSchema } from '../../application/registry-schema.js';
import { requireAdmin, validationFailed } from './guards.js';

/**
 * Rate-limit exemptions (admin only).
 *
 * PUT    /api/v1/rate-exemptions/:bucket — exempt a bucket, e.g. `ip:10.0.0.5`
 * DELETE /api/v1/rate-exemptions/:bucket — lift the exemption
 */
async function exemptionRoutes(fastify: FastifyInstance): Promise<void> {

  // ── PUT /api/v1/rate-exemptions/:bucket ──────────────────
  fastify.put<{ Params: { bucket: string }; Body: unknown }>(
    '/api/v1/rate-exemptions/:bucket',
    { preHandler: requireAdmin },
    async (
      request: FastifyRequest<{ Params: { bucket: string }; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const bucket = bucketSchema.safeParse(request.params.bucket);
      if (!bucket.success) {
        return validationFailed(reply, bucket.error.flatten());
      }
      const parsed = rateExemptionSchema.safeParse(request.body ?? {});
      if (!parsed.success) {
        return validationFailed(reply, parsed.error.flatten());
      }

      const exemption = {
        id: bucket.data,
        reason: parsed.data.reason,
        created_at: new Date().toISOString(),
      };
      await fastify.registry.stores.requests.upsert('rate_exempt', exemption);
      request.log.info({ bucket: exemption.id }, 'Rate-limit exemption granted');

      return reply.status(200).send(exemption);
    },
  );

  // ── DELETE /api/v1/rate-exemptions/:bucket ───────────────
  fastify.delete<{ Params: { bucket: string } }>(
    '/api/v1/rate-exemptions/:bucket',
    { preHandler: requireAdmin },
    async (
      request: FastifyRequest<{ Params: { bucket: string } }>,
      reply: FastifyReply,
    ) => {
      const removed = await fastify.registry.stores.requests.remove('rate_exempt', request.params.bucket);
      if (!removed) {
        return reply.status(404).send({ error: 'NOT_FOUND', message: 'No exemption for this bucket' });
      }
      return reply.status(204).send();
    },
  );
}

export default fp(exemptionRoutes, {
  name: 'exemption-routes',
  dependencies: ['registry', 'admission'],
  fastify: '5.x',
});
