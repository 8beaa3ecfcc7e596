import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { patchListingSchema, submitListingSchema } from '../../application/registry-schema.js';
import { deleteListing, submitListing, updateListing } from '../../application/listings.js';
import { authorizeListingEdit, reservedFieldsIn } from '../../application/listing-access.js';
import { currentIdentity, validationFailed } from './guards.js';

/**
 * Listing routes.
 *
 * POST   /api/v1/listings      — submit (anyone; returns the edit token once)
 * GET    /api/v1/listings/:id  — fetch one listing
 * PATCH  /api/v1/listings/:id  — edit (admin, submitting key, or its edit token)
 * DELETE /api/v1/listings/:id  — delete (same as edit)
 */
async function listingRoutes(fastify: FastifyInstance): Promise<void> {

  // ── POST /api/v1/listings ────────────────────────────────
  fastify.post(
    '/api/v1/listings',
    async (
      request: FastifyRequest<{ Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const parsed = submitListingSchema.safeParse(request.body);
      if (!parsed.success) {
        return validationFailed(reply, parsed.error.flatten());
      }

      const { stores, bus } = fastify.registry;
      const submitted = await submitListing(stores.requests, bus, currentIdentity(request), parsed.data);
      request.log.info({ listingId: submitted.listing.id }, 'Listing submitted');

      return reply.status(201).send(submitted);
    },
  );

  // ── GET /api/v1/listings/:id ─────────────────────────────
  fastify.get(
    '/api/v1/listings/:id',
    async (
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply,
    ) => {
      const listing = await fastify.registry.stores.requests.get('listings', request.params.id);
      if (listing === undefined) {
        return reply.status(404).send({ error: 'NOT_FOUND', message: 'Listing not found' });
      }
      return reply.status(200).send(listing);
    },
  );

  // ── PATCH /api/v1/listings/:id ───────────────────────────
  fastify.patch(
    '/api/v1/listings/:id',
    async (
      request: FastifyRequest<{ Params: { id: string }; Body: unknown }>,
      reply: FastifyReply,
    ) => {
      const { stores, bus } = fastify.registry;
      const listing = await stores.requests.get('listings', request.params.id);
      if (listing === undefined) {
        return reply.status(404).send({ error: 'NOT_FOUND', message: 'Listing not found' });
      }

      const decision = authorizeListingEdit(currentIdentity(request), listing);
      if (!decision.allowed) {
        return reply.status(decision.status).send({
          error: decision.status === 401 ? 'UNAUTHORIZED' : 'FORBIDDEN',
          message: decision.reason,
        });
      }

      const parsed = patchListingSchema.safeParse(request.body);
      if (!parsed.success) {
        return validationFailed(reply, parsed.error.flatten());
      }

      const reserved = reservedFieldsIn(parsed.data);
      if (reserved.length > 0 && !decision.mayTouchReserved) {
        return reply.status(403).send({
          error: 'FORBIDDEN',
          message: `Only admins can change: ${reserved.join(', ')}`,
        });
      }

      const updated = await updateListing(stores.requests, bus, listing, parsed.data);
      return reply.status(200).send(updated);
    },
  );

  // ── DELETE /api/v1/listings/:id ──────────────────────────
  fastify.delete(
    '/api/v1/listings/:id',
    async (
      request: FastifyRequest<{ Params: { id: string } }>,
      reply: FastifyReply,
    ) => {
      const { stores, bus } = fastify.registry;
      const listing = await stores.requests.get('listings', request.params.id);
      if (listing === undefined) {
        return reply.status(404).send({ error: 'NOT_FOUND', message: 'Listing not found' });
      }

      const decision = authorizeListingEdit(currentIdentity(request), listing);
      if (!decision.allowed) {
        return reply.status(decision.status).send({
          error: decision.status === 401 ? 'UNAUTHORIZED' : 'FORBIDDEN',
          message: decision.reason,
        });
      }

      await deleteListing(stores.requests, bus, listing);
      request.log.info({ listingId: listing.id }, 'Listing deleted');
      return reply.status(204).send();
    },
  );
}

export default fp(listingRoutes, {
  name: 'listing-routes',
  dependencies: ['registry', 'admission'],
  fastify: '5.x',
});
