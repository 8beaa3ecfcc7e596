import { z } from 'zod';
import { EVENT_TYPES, LISTING_STATUSES } from '../domain/index.js';

const httpUrl = z
  .string()
  .url()
  .max(2048)
  .refine((value) => /^https?:\/\//i.test(value), { message: 'Only http and https URLs are accepted' });

/** Schema for POST /api/v1/listings. */
export const submitListingSchema = z.object({
  name: z.string().trim().min(1).max(100),
  short_description: z.string().trim().min(1).max(280),
  description: z.string().max(10_000).optional().default(''),
  homepage_url: httpUrl.nullable().optional().default(null),
  api_url: httpUrl.nullable().optional().default(null),
});

export type SubmitListingInput = z.infer<typeof submitListingSchema>;

/**
 * Schema for PATCH /api/v1/listings/:id.
 * `status`, `is_featured` and `is_verified` are accepted here and
 * rejected later for callers who are not admins.
 */
export const patchListingSchema = z
  .object({
    name: z.string().trim().min(1).max(100).optional(),
    short_description: z.string().trim().min(1).max(280).optional(),
    description: z.string().max(10_000).optional(),
    homepage_url: httpUrl.nullable().optional(),
    api_url: httpUrl.nullable().optional(),
    status: z.enum(LISTING_STATUSES).optional(),
    is_featured: z.boolean().optional(),
    is_verified: z.boolean().optional(),
  })
  .strict()
  .refine((data) => Object.keys(data).length > 0, { message: 'At least one field must be provided' });

export type PatchListingInput = z.infer<typeof patchListingSchema>;

const eventTypeEnum = z.enum(EVENT_TYPES);

/** Schema for POST /api/v1/webhooks. */
export const createWebhookSchema = z.object({
  url: httpUrl,
  events: z.array(eventTypeEnum).max(EVENT_TYPES.length).optional().default([]),
});

export type CreateWebhookInput = z.infer<typeof createWebhookSchema>;

/**
 * Schema for PATCH /api/v1/webhooks/:id.
 * `active` may only be set to true; deactivation is the failure counter's job.
 */
export const patchWebhookSchema = z
  .object({
    url: httpUrl.optional(),
    events: z.array(eventTypeEnum).max(EVENT_TYPES.length).optional(),
    active: z.literal(true).optional(),
  })
  .strict()
  .refine((data) => Object.keys(data).length > 0, { message: 'At least one field must be provided' });

export type PatchWebhookInput = z.infer<typeof patchWebhookSchema>;

/** Schema for POST /api/v1/keys. */
export const createKeySchema = z.object({
  name: z.string().trim().min(1).max(100),
  kind: z.enum(['admin', 'regular']).optional().default('regular'),
  rate_limit: z.number().int().min(1).nullable().optional().default(null),
});

export type CreateKeyInput = z.infer<typeof createKeySchema>;

/** Schema for PUT /api/v1/rate-exemptions/:bucket. */
export const rateExemptionSchema = z.object({
  reason: z.string().max(500).optional().default(''),
});

/** Bucket keys as produced by the admission policy. */
export const bucketSchema = z.string().regex(/^(key|listing|ip):.+$/, 'Expected key:<id>, listing:<id> or ip:<address>');

/** Query string for paginated history. */
export const paginationSchema = z.object({
  limit: z.coerce.number().int().min(1).max(100).optional().default(20),
  offset: z.coerce.number().int().min(0).optional().default(0),
});

export type PaginationInput = z.infer<typeof paginationSchema>;
