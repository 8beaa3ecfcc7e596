import { z } from 'zod';
import { EVENT_TYPES, LISTING_STATUSES } from '../../domain/index.js';
import type { CollectionName, CollectionRecords } from './types.js';

const healthStatus = z.enum(['healthy', 'unhealthy', 'unreachable']);

/**
 * Zod schemas for documents read back from storage.
 *
 * JSONB columns come back untyped; every row is parsed against the schema
 * of its collection before it reaches the core.
 */
export const recordSchemas: { [C in CollectionName]: z.ZodType<CollectionRecords[C]> } = {
  credentials: z.object({
    id: z.string(),
    key_hash: z.string(),
    kind: z.enum(['admin', 'regular', 'edit_token']),
    name: z.string(),
    rate_limit: z.number().int().nullable(),
    listing_id: z.string().nullable(),
    created_at: z.string(),
  }),
  webhooks: z.object({
    id: z.string(),
    url: z.string(),
    secret: z.string(),
    events: z.array(z.enum(EVENT_TYPES)),
    active: z.boolean(),
    failure_count: z.number().int(),
    last_triggered_at: z.string().nullable(),
    created_at: z.string(),
    created_by: z.string(),
  }),
  health_results: z.object({
    id: z.string(),
    listing_id: z.string(),
    status: healthStatus,
    status_code: z.number().int().nullable(),
    response_time_ms: z.number(),
    error_message: z.string().nullable(),
    checked_url: z.string(),
    checked_at: z.string(),
  }),
  listings: z.object({
    id: z.string(),
    name: z.string(),
    slug: z.string(),
    short_description: z.string(),
    description: z.string(),
    homepage_url: z.string().nullable(),
    api_url: z.string().nullable(),
    status: z.enum(LISTING_STATUSES),
    is_featured: z.boolean(),
    is_verified: z.boolean(),
    submitted_by_key_id: z.string().nullable(),
    last_health_status: healthStatus.nullable(),
    last_checked_at: z.string().nullable(),
    uptime_pct: z.number().nullable(),
    created_at: z.string(),
    updated_at: z.string(),
  }),
  rate_exempt: z.object({
    id: z.string(),
    reason: z.string(),
    created_at: z.string(),
  }),
};

export function parseRecord<C extends CollectionName>(collection: C, data: unknown): CollectionRecords[C] {
  const schema: z.ZodType<CollectionRecords[C]> = recordSchemas[collection];
  return schema.parse(data);
}
