import type { FastifyReply, FastifyRequest } from 'fastify';
import type { Identity } from '../../domain/index.js';

/** The identity the admission hook resolved, or anonymous. */
export function currentIdentity(request: FastifyRequest): Identity {
  return request.identity ?? { kind: 'anonymous', client: request.ip };
}

/** preHandler: admin keys only. */
export async function requireAdmin(request: FastifyRequest, reply: FastifyReply): Promise<FastifyReply | undefined> {
  const identity = currentIdentity(request);
  if (identity.kind === 'admin') return undefined;

  if (identity.kind === 'anonymous') {
    return reply.status(401).send({ error: 'UNAUTHORIZED', message: 'An admin API key is required' });
  }
  return reply.status(403).send({ error: 'FORBIDDEN', message: 'This endpoint requires an admin API key' });
}

/** Display name for audit fields. */
export function actorOf(identity: Identity): string {
  return identity.kind === 'anonymous' ? `ip:${identity.client}` : `key:${identity.credential_id}`;
}

export function validationFailed(reply: FastifyReply, issues: unknown): FastifyReply {
  return reply.status(400).send({ error: 'VALIDATION_FAILED', issues });
}
