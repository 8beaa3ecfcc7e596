import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { createWebhookSchema, patchWebhookSchema } from '../../application/registry-schema.js';
import { createWebhook, deleteWebhook, patchWebhook, toPublicWebhook } from '../../application/webhooks.js';
import { actorOf, currentIdentity, requireAdmin, validationFailed } from './guards.js';

/**
 * Webhook management routes (admin only).
 *
 * POST   /api/v1/webhooks      — register; the signing secret is returned once
 * GET    /api/v1/webhooks      — list without secrets
 * PATCH  /api/v1/webhooks/:id  — change url/events, `active: true` reactivates
 * DELETE /api/v1/webhooks/:id  — remove
 */
async function webhookRoutes(fastify: FastifyInstance): Promise<void> {
  // ── POST /api/v1/webhooks ────────────────────────────────
  fastify.post<{ Body: unknown }>(
    '/api/v1/webhooks',
    { preHandler: requireAdmin },
    async (
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = createWebhookSchema.safeParse(request.body);
      if (!parsed.success) {
        return validationFailed(reply, parsed.error.flatten());
      }

      const webhook = await createWebhook(
        fastify.registry.stores.requests,
        parsed.data,
        actorOf(currentIdentity(request)),
      );
      request.log.info({ webhookId: webhook.id, events: webhook.events }, 'Webhook registered');

      return reply.status(201).send(webhook);
    },
  );

  // ── GET /api/v1/webhooks ─────────────────────────────────
  fastify.get(
    '/api/v1/webhooks',
    { preHandler: requireAdmin },
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const webhooks = await fastify.registry.stores.requests.list('webhooks');
      return reply.status(200).send(webhooks.map(toPublicWebhook));
    },
  );

  // ── PATCH /api/v1/webhooks/:id ───────────────────────────
  fastify.patch<{ Params: { id: string }; Body: unknown }>(
    '/api/v1/webhooks/:id',
    { preHandler: requireAdmin },
    async (
      request: FastifyRequest<{ Params: { id: string }; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = patchWebhookSchema.safeParse(request.body);
      if (!parsed.success) {
        return validationFailed(reply, parsed.error.flatten());
      }

      const { stores, webhookLock } = fastify.registry;
      // Same lock the dispatcher records outcomes under.
      const updated = await webhookLock.run(request.params.id, async () => {
        const webhook = await stores.requests.get('webhooks', request.params.id);
        return webhook === undefined ? undefined : patchWebhook(stores.requests, webhook, parsed.data);
      });

      if (updated === undefined) {
        return reply.status(404).send({ error: 'NOT_FOUND', message: 'Webhook not found' });
      }
      if (parsed.data.active === true) {
        request.log.info({ webhookId: updated.id }, 'Webhook reactivated');
      }
      return reply.status(200).send(toPublicWebhook(updated));
    },
  );

  // ── DELETE /api/v1/webhooks/:id ──────────────────────────
  fastify.delete<{ Params: { id: string } }>(
    '/api/v1/webhooks/:id',
    { preHandler: requireAdmin },
    async (
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply,
    ) => {
      const { stores, webhookLock } = fastify.registry;
      const removed = await deleteWebhook(stores.requests, webhookLock, request.params.id);
      if (!removed) {
        return reply.status(404).send({ error: 'NOT_FOUND', message: 'Webhook not found' });
      }
      return reply.status(204).send();
    },
  );
}

export default fp(webhookRoutes, {
  name: 'webhook-routes',
  dependencies: ['registry', 'admission'],
  fastify: '5.x',
});
