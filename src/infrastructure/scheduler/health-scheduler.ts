import type { Logger } from 'pino';
import type { HealthStatus } from '../../domain/index.js';
import { isEligibleForProbing, type HealthMonitor } from '../../application/health-monitor.js';
import type { RegistryStore } from '../store/index.js';

export type SchedulerState = 'idle' | 'running' | 'stopped';

export interface TickSummary {
  checked: number;
  healthy: number;
  unhealthy: number;
  unreachable: number;
  /** Probes that threw instead of producing a result. */
  failed: number;
  started_at: string;
  duration_ms: number;
}

export interface SchedulerStatus {
  enabled: boolean;
  interval_seconds: number;
  state: SchedulerState;
  ticks: number;
  last_tick: TickSummary | null;
}

export interface HealthSchedulerOptions {
  /** The scheduler's own store handle, never the request path's. */
  store: RegistryStore;
  /** Monitor bound to the same handle. */
  monitor: HealthMonitor;
  log: Logger;
  intervalSeconds: number;
}

/**
 * Resolves true after `ms`, or false as soon as `signal` aborts.
 */
function sleep(ms: number, signal: AbortSignal): Promise<boolean> {
  if (signal.aborted) return Promise.resolve(false);

  return new Promise<boolean>((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve(false);
    };
    const timer = setTimeout(() => {
      signal.removeEventListener('abort', onAbort);
      resolve(true);
    }, ms);
    signal.addEventListener('abort', onAbort, { once: true });
  });
}

/**
 * Background driver that probes every eligible listing on a fixed interval.
 *
 * The first tick happens one full interval after `start()`, so a restart
 * does not hammer every endpoint at boot. Listings are probed one after
 * another. A failed tick is logged and the loop carries on. `stop()`
 * interrupts the sleep between ticks but lets a running tick finish.
 */
export class HealthCheckScheduler {
  private readonly store: RegistryStore;
  private readonly monitor: HealthMonitor;
  private readonly log: Logger;
  private readonly intervalSeconds: number;
  private readonly controller = new AbortController();

  private state: SchedulerState = 'idle';
  private loop: Promise<void> | null = null;
  private ticks = 0;
  private lastTick: TickSummary | null = null;

  constructor(options: HealthSchedulerOptions) {
    this.store = options.store;
    this.monitor = options.monitor;
    this.log = options.log.child({ component: 'health-scheduler' });
    this.intervalSeconds = options.intervalSeconds;
  }

  start(): void {
    if (this.state !== 'idle') return;

    if (this.intervalSeconds === 0) {
      this.log.info('Scheduled health checks disabled (interval is 0)');
      return;
    }

    this.state = 'running';
    this.log.info({ intervalSeconds: this.intervalSeconds }, 'Health check scheduler started');
    this.loop = this.run(this.controller.signal);
  }

  /** Interrupts the sleep and resolves once the loop has exited. */
  async stop(): Promise<void> {
    this.controller.abort();
    if (this.loop !== null) await this.loop;
    this.state = 'stopped';
  }

  status(): SchedulerStatus {
    return {
      enabled: this.intervalSeconds > 0,
      interval_seconds: this.intervalSeconds,
      state: this.state,
      ticks: this.ticks,
      last_tick: this.lastTick,
    };
  }

  /** One pass over every eligible listing. Never throws. */
  async tick(): Promise<TickSummary> {
    const startedAt = new Date();
    const counts: Record<HealthStatus, number> = { healthy: 0, unhealthy: 0, unreachable: 0 };
    let checked = 0;
    let failed = 0;

    try {
      const listings = (await this.store.list('listings', { status: 'approved' })).filter(isEligibleForProbing);

      for (const listing of listings) {
        try {
          const { result } = await this.monitor.probeAndRecord(listing, { scheduled: true });
          counts[result.status] += 1;
          checked += 1;
        } catch (err: unknown) {
          failed += 1;
          this.log.warn({ err, listingId: listing.id }, 'Scheduled probe could not be recorded');
        }
      }
    } catch (err: unknown) {
      this.log.error({ err }, 'Scheduled health check tick failed');
    }

    const summary: TickSummary = {
      checked,
      ...counts,
      failed,
      started_at: startedAt.toISOString(),
      duration_ms: Date.now() - startedAt.getTime(),
    };
    this.ticks += 1;
    this.lastTick = summary;
    this.log.info(summary, 'Scheduled health check complete');
    return summary;
  }

  private async run(signal: AbortSignal): Promise<void> {
    const intervalMs = this.intervalSeconds * 1000;
    try {
      while (await sleep(intervalMs, signal)) {
        await this.tick();
      }
    } finally {
      this.state = 'stopped';
      this.log.info({ ticks: this.ticks }, 'Health check scheduler stopped');
    }
  }
}
