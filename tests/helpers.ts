import { vi } from 'vitest';
import type { Logger } from 'pino';
import type { Credential, Listing, Webhook } from '../src/domain/index.js';
import { DEFAULT_CONFIG, type RegistryConfig } from '../src/infrastructure/config/index.js';

/** Fixed "now" for deterministic windows and timestamps. */
export const FIXED_NOW = new Date('2026-03-02T12:00:00Z').getTime();

export function fakeLogger() {
  const log = {
    info: vi.fn(),
    debug: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    fatal: vi.fn(),
    trace: vi.fn(),
    child: vi.fn(),
  };
  log.child.mockReturnValue(log);
  return log as unknown as Logger & typeof log;
}

let counter = 0;

export function makeListing(overrides: Partial<Listing> = {}): Listing {
  counter++;
  return {
    id: `listing-${counter}`,
    name: `Listing ${counter}`,
    slug: `listing-${counter}`,
    short_description: 'A test listing',
    description: '',
    homepage_url: 'https://example.test/',
    api_url: null,
    status: 'approved',
    is_featured: false,
    is_verified: false,
    submitted_by_key_id: null,
    last_health_status: null,
    last_checked_at: null,
    uptime_pct: null,
    created_at: new Date(FIXED_NOW).toISOString(),
    updated_at: new Date(FIXED_NOW).toISOString(),
    ...overrides,
  };
}

export function makeWebhook(overrides: Partial<Webhook> = {}): Webhook {
  counter++;
  return {
    id: `webhook-${counter}`,
    url: 'https://hooks.example.test/registry',
    secret: 'test-secret',
    events: [],
    active: true,
    failure_count: 0,
    last_triggered_at: null,
    created_at: new Date(FIXED_NOW).toISOString(),
    created_by: 'key:admin',
    ...overrides,
  };
}

export function makeCredential(overrides: Partial<Credential> = {}): Credential {
  counter++;
  return {
    id: `cred-${counter}`,
    key_hash: `hash-${counter}`,
    kind: 'regular',
    name: `key ${counter}`,
    rate_limit: null,
    listing_id: null,
    created_at: new Date(FIXED_NOW).toISOString(),
    ...overrides,
  };
}

export function testConfig(overrides: Partial<RegistryConfig> = {}): RegistryConfig {
  return {
    ...DEFAULT_CONFIG,
    store: { driver: 'memory', databaseUrl: 'postgres://unused' },
    scheduler: { intervalSeconds: 0 },
    ...overrides,
  };
}

/** Resolves after pending microtasks and one macrotask turn. */
export function flush(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}
