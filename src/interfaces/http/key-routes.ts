import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { createKeySchema } from '../../application/registry-schema.js';
import { createApiKey, listApiKeys, revokeApiKey } from '../../application/keys.js';
import { currentIdentity, requireAdmin, validationFailed } from './guards.js';

/**
 * API key routes.
 *
 * POST   /api/v1/keys      — issue a key (admin keys need an admin caller)
 * GET    /api/v1/keys      — list keys (admin)
 * DELETE /api/v1/keys/:id  — revoke a key (admin)
 */
async function keyRoutes(fastify: FastifyInstance): Promise<void> {

  // ── POST /api/v1/keys ────────────────────────────────────
  fastify.post(
    '/api/v1/keys',
    async (
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = createKeySchema.safeParse(request.body);
      if (!parsed.success) {
        return validationFailed(reply, parsed.error.flatten());
      }

      if (parsed.data.kind === 'admin' && currentIdentity(request).kind !== 'admin') {
        return reply.status(403).send({ error: 'FORBIDDEN', message: 'Only admins can issue admin keys' });
      }

      const issued = await createApiKey(fastify.registry.stores.requests, parsed.data);
      request.log.info({ credentialId: issued.credential.id, kind: issued.credential.kind }, 'API key issued');

      return reply.status(201).send(issued);
    },
  );

  // ── GET /api/v1/keys ─────────────────────────────────────
  fastify.get(
    '/api/v1/keys',
    { preHandler: requireAdmin },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const keys = await listApiKeys(fastify.registry.stores.requests);
      return reply.status(200).send(keys);
    },
  );

  // ── DELETE /api/v1/keys/:id ──────────────────────────────
  fastify.delete<{ Params: { id: string } }>(
    '/api/v1/keys/:id',
    { preHandler: requireAdmin },
    async (
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply,
    ) => {
      const revoked = await revokeApiKey(fastify.registry.stores.requests, request.params.id);
      if (!revoked) {
        return reply.status(404).send({ error: 'NOT_FOUND', message: 'Key not found' });
      }

      request.log.info({ credentialId: request.params.id }, 'API key revoked');
      return reply.status(204).send();
    },
  );
}

export default fp(keyRoutes, {
  name: 'key-routes',
  dependencies: ['registry', 'admission'],
  fastify: '5.x',
});
