import Fastify from 'fastify';
import type { Logger } from 'pino';

import type { RegistryConfig } from './infrastructure/config/index.js';
import type { StoreHandles } from './infrastructure/store/index.js';
import { HealthChecker } from './infrastructure/probes/index.js';
import { WebhookDispatcher } from './infrastructure/webhooks/index.js';
import { HealthCheckScheduler } from './infrastructure/scheduler/index.js';
import { CredentialResolver } from './application/credential-resolver.js';
import { RateLimiter } from './application/rate-limiter.js';
import { EventBus } from './application/event-bus.js';
import { KeyedLock } from './application/keyed-lock.js';
import { HealthMonitor, type Prober } from './application/health-monitor.js';

import {
  registryPlugin,
  admissionPlugin,
  keyRoutes,
  listingRoutes,
  webhookRoutes,
  healthRoutes,
  exemptionRoutes,
  systemRoutes,
} from './interfaces/http/index.js';

/** Process-wide services, built once and shared by the server and background work. */
export interface RegistryServices {
  config: RegistryConfig;
  stores: StoreHandles;
  resolver: CredentialResolver;
  limiter: RateLimiter;
  bus: EventBus;
  /** Serializes writes to one webhook record. */
  webhookLock: KeyedLock;
  dispatcher: WebhookDispatcher;
  /** Probe-and-record on the request handle. */
  monitor: HealthMonitor;
  scheduler: HealthCheckScheduler;
}

export interface ServiceOverrides {
  prober?: Prober;
  fetchImpl?: typeof fetch;
  now?: () => number;
}

/**
 * Wires the operational core.
 *
 * Each background consumer gets its own store handle: webhook delivery
 * records through `stores.webhooks`, the scheduler reads and writes
 * through `stores.scheduler`, requests use `stores.requests`.
 */
export function createRegistryServices(
  config: RegistryConfig,
  stores: StoreHandles,
  log: Logger,
  overrides: ServiceOverrides = {},
): RegistryServices {
  const bus = new EventBus({
    log: log.child({ component: 'event-bus' }),
    bufferCapacity: config.events.bufferCapacity,
    heartbeatMs: config.events.heartbeatSeconds * 1000,
  });

  const webhookLock = new KeyedLock();
  const dispatcher = new WebhookDispatcher({
    store: stores.webhooks,
    log: log.child({ component: 'webhooks' }),
    lock: webhookLock,
    failureThreshold: config.webhooks.failureThreshold,
    timeoutMs: config.webhooks.timeoutSeconds * 1000,
    fetchImpl: overrides.fetchImpl,
  });
  bus.addSink(dispatcher);

  const prober = overrides.prober ?? new HealthChecker({
    timeoutMs: config.probe.timeoutSeconds * 1000,
    maxRedirects: config.probe.maxRedirects,
    fetchImpl: overrides.fetchImpl,
  });

  const monitorLog = log.child({ component: 'health' });
  const monitor = new HealthMonitor({
    store: stores.requests,
    prober,
    bus,
    log: monitorLog,
    uptimeWindow: config.uptimeWindow,
  });

  const scheduler = new HealthCheckScheduler({
    store: stores.scheduler,
    monitor: new HealthMonitor({
      store: stores.scheduler,
      prober,
      bus,
      log: monitorLog,
      uptimeWindow: config.uptimeWindow,
    }),
    log,
    intervalSeconds: config.scheduler.intervalSeconds,
  });

  return {
    config,
    stores,
    resolver: new CredentialResolver(stores.requests),
    limiter: new RateLimiter(overrides.now),
    bus,
    webhookLock,
    dispatcher,
    monitor,
    scheduler,
  };
}

/**
 * Builds the Fastify app around already-constructed services.
 *
 * Order:
 * 1) registry decorations and lifecycle
 * 2) admission (identity + rate limit)
 * 3) routes
 */
export async function buildApp(services: RegistryServices, log: Logger) {
  const fastify = Fastify({ loggerInstance: log });

  await fastify.register(registryPlugin, { services });
  await fastify.register(admissionPlugin);

  await fastify.register(systemRoutes);
  await fastify.register(keyRoutes);
  await fastify.register(listingRoutes);
  await fastify.register(webhookRoutes);
  await fastify.register(healthRoutes);
  await fastify.register(exemptionRoutes);

  return fastify;
}
