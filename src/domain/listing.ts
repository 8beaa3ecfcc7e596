import type { HealthStatus } from './health.js';

export const LISTING_STATUSES = ['pending', 'approved', 'rejected', 'deprecated'] as const;

export type ListingStatus = (typeof LISTING_STATUSES)[number];

/**
 * The slice of a listing the operational core reads and writes.
 * `last_health_status`, `last_checked_at` and `uptime_pct` are caches
 * maintained by probe-and-record.
 */
export interface Listing {
  readonly id: string;
  readonly name: string;
  readonly slug: string;
  readonly short_description: string;
  readonly description: string;
  readonly homepage_url: string | null;
  readonly api_url: string | null;
  readonly status: ListingStatus;
  readonly is_featured: boolean;
  readonly is_verified: boolean;
  readonly submitted_by_key_id: string | null;
  readonly last_health_status: HealthStatus | null;
  readonly last_checked_at: string | null;
  readonly uptime_pct: number | null;
  readonly created_at: string;
  readonly updated_at: string;
}

/** A bucket excused from admission control. `id` is the bucket key. */
export interface RateExemption {
  readonly id: string;
  readonly reason: string;
  readonly created_at: string;
}
