import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import type { HealthCheckResult, Listing, ProbeOutcome } from '../domain/index.js';
import type { RegistryStore } from '../infrastructure/store/index.js';
import type { EventBus } from './event-bus.js';
import { computeUptime } from './uptime.js';

/** One outbound liveness probe. */
export interface Prober {
  check(url: string): Promise<ProbeOutcome>;
}

export interface ProbeContext {
  /** True when driven by the background scheduler. */
  scheduled: boolean;
}

export interface RecordedProbe {
  result: HealthCheckResult;
  uptime_pct: number | null;
}

export interface HealthMonitorDeps {
  store: RegistryStore;
  prober: Prober;
  bus: EventBus;
  log: Logger;
  uptimeWindow: number;
}

/** The URL a listing is probed at: its API endpoint, else its homepage. */
export function probeUrlFor(listing: Pick<Listing, 'api_url' | 'homepage_url'>): string | null {
  return listing.api_url ?? listing.homepage_url;
}

/** Approved listings with somewhere to probe. */
export function isEligibleForProbing(listing: Listing): boolean {
  return listing.status === 'approved' && probeUrlFor(listing) !== null;
}

/**
 * Probe-and-record.
 *
 * Probes a listing, appends the result, refreshes the listing's cached
 * health fields and publishes `health.checked`. Each caller binds its own
 * store handle, so the scheduler and the request path never share one.
 */
export class HealthMonitor {
  constructor(private readonly deps: HealthMonitorDeps) {}

  async probeAndRecord(listing: Listing, context: ProbeContext): Promise<RecordedProbe> {
    const { store, prober, bus, log, uptimeWindow } = this.deps;

    const url = probeUrlFor(listing);
    if (url === null) {
      throw new Error(`Listing ${listing.id} has no URL to probe`);
    }

    const outcome = await prober.check(url);
    const result: HealthCheckResult = {
      id: randomUUID(),
      listing_id: listing.id,
      ...outcome,
    };
    await store.append('health_results', result);

    const recent = await store.list(
      'health_results',
      { listing_id: listing.id },
      { newestFirst: true, limit: uptimeWindow },
    );
    const uptime_pct = computeUptime(recent, uptimeWindow);

    // Re-read so a concurrent edit to other fields is not overwritten.
    const current = await store.get('listings', listing.id);
    if (current !== undefined) {
      await store.upsert('listings', {
        ...current,
        last_health_status: result.status,
        last_checked_at: result.checked_at,
        uptime_pct,
      });
    }

    bus.publish('health.checked', {
      listing_id: listing.id,
      listing_name: listing.name,
      status: result.status,
      status_code: result.status_code,
      response_time_ms: result.response_time_ms,
      scheduled: context.scheduled,
    });

    log.debug(
      { listingId: listing.id, status: result.status, uptime_pct, scheduled: context.scheduled },
      'Health check recorded',
    );

    return { result, uptime_pct };
  }
}
