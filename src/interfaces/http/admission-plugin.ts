import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest } from 'fastify';
import type { Identity } from '../../domain/index.js';
import type { PresentedSecrets } from '../../application/credential-resolver.js';
import { admissionPolicy } from '../../application/admission.js';

function headerValue(request: FastifyRequest, name: string): string | null {
  const value = request.headers[name];
  const first = Array.isArray(value) ? value[0] : value;
  return first !== undefined && first.trim().length > 0 ? first.trim() : null;
}

function queryToken(request: FastifyRequest): string | null {
  const query: unknown = request.query;
  if (typeof query === 'object' && query !== null && 'token' in query && typeof query.token === 'string') {
    return query.token.length > 0 ? query.token : null;
  }
  return null;
}

/** Pulls the edit-token slot and the API-key slot off a request. */
export function presentedSecrets(request: FastifyRequest): PresentedSecrets {
  const authorization = headerValue(request, 'authorization');
  const bearer = authorization !== null && /^bearer\s+/i.test(authorization)
    ? authorization.replace(/^bearer\s+/i, '').trim() || null
    : null;

  return {
    editToken: headerValue(request, 'x-edit-token') ?? queryToken(request),
    apiKey: bearer ?? headerValue(request, 'x-api-key'),
    client: request.ip,
  };
}

/**
 * Resolves the caller's identity and admits or rejects every request.
 *
 * Admitted responses carry the window's limit, remaining and reset facts;
 * a denied request ends here with 429. Buckets on the exemption list skip
 * counting entirely.
 */
async function admissionPlugin(fastify: FastifyInstance): Promise<void> {
  fastify.decorateRequest('identity', null);

  fastify.addHook('onRequest', async (request, reply) => {
    const { resolver, limiter, config, stores } = fastify.registry;

    const identity = await resolver.resolve(presentedSecrets(request));
    request.identity = identity;

    const { bucket, limit } = admissionPolicy(identity, config.rateLimit);
    if ((await stores.requests.get('rate_exempt', bucket)) !== undefined) return;

    const decision = limiter.admit(bucket, limit, config.rateLimit.windowSeconds);
    reply.header('X-RateLimit-Limit', String(decision.limit));
    reply.header('X-RateLimit-Remaining', String(decision.remaining));
    reply.header('X-RateLimit-Reset', String(decision.reset_seconds));

    if (!decision.allowed) {
      request.log.info({ bucket, limit }, 'Request rate limited');
      reply.header('Retry-After', String(decision.reset_seconds));
      return reply.status(429).send({
        error: 'RATE_LIMITED',
        message: `Rate limit of ${decision.limit} requests per ${config.rateLimit.windowSeconds}s exceeded`,
        limit: decision.limit,
        remaining: decision.remaining,
        reset_seconds: decision.reset_seconds,
      });
    }
  });
}

export default fp(admissionPlugin, {
  name: 'admission',
  dependencies: ['registry'],
  fastify: '5.x',
});

declare module 'fastify' {
  interface FastifyRequest {
    identity: Identity | null;
  }
}
