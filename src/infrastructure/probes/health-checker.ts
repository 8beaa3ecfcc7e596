import type { HealthStatus, ProbeOutcome } from '../../domain/index.js';
import type { Prober } from '../../application/health-monitor.js';

export interface HealthCheckerOptions {
  timeoutMs?: number;
  maxRedirects?: number;
  fetchImpl?: typeof fetch;
  /** Monotonic clock in ms, for response time. */
  clock?: () => number;
  userAgent?: string;
}

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_MAX_REDIRECTS = 5;
const REDIRECT_STATUSES = new Set([301, 302, 303, 307, 308]);
const CONNECT_FAILURE_CODES = new Set(['ENOTFOUND', 'EAI_AGAIN', 'ECONNREFUSED', 'ECONNRESET', 'EHOSTUNREACH', 'ENETUNREACH']);

class TooManyRedirectsError extends Error {
  constructor(limit: number) {
    super(`Too many redirects (more than ${limit})`);
    this.name = 'TooManyRedirectsError';
  }
}

/** Pulls a system error code out of a fetch failure's cause chain. */
function errorCode(err: unknown): string | undefined {
  let current: unknown = err;
  for (let depth = 0; depth < 3 && current instanceof Error; depth++) {
    if ('code' in current && typeof current.code === 'string') return current.code;
    current = current.cause;
  }
  return undefined;
}

function isAbort(err: unknown): boolean {
  return (
    typeof err === 'object' &&
    err !== null &&
    'name' in err &&
    (err.name === 'TimeoutError' || err.name === 'AbortError')
  );
}

/**
 * One GET liveness probe with manual redirect handling.
 *
 * A single timeout covers the whole redirect chain. 2xx is healthy, any
 * other final status is unhealthy with its code, and anything that never
 * produced a final response is unreachable.
 */
export class HealthChecker implements Prober {
  private readonly timeoutMs: number;
  private readonly maxRedirects: number;
  private readonly fetchImpl: typeof fetch;
  private readonly clock: () => number;
  private readonly userAgent: string;

  constructor(options: HealthCheckerOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRedirects = options.maxRedirects ?? DEFAULT_MAX_REDIRECTS;
    this.fetchImpl = options.fetchImpl ?? ((input, init) => fetch(input, init));
    this.clock = options.clock ?? (() => performance.now());
    this.userAgent = options.userAgent ?? 'listing-registry-health/1.0';
  }

  async check(url: string): Promise<ProbeOutcome> {
    const checked_at = new Date().toISOString();
    const started = this.clock();
    const outcome = (status: HealthStatus, status_code: number | null, error_message: string | null): ProbeOutcome => ({
      status,
      status_code,
      response_time_ms: Math.max(0, Math.round(this.clock() - started)),
      error_message,
      checked_url: url,
      checked_at,
    });

    try {
      const status = await this.follow(url, AbortSignal.timeout(this.timeoutMs));
      if (status >= 200 && status < 300) return outcome('healthy', status, null);
      return outcome('unhealthy', status, `HTTP ${status}`);
    } catch (err: unknown) {
      return outcome('unreachable', null, this.describe(err));
    }
  }

  /** Returns the final HTTP status after following redirects. */
  private async follow(url: string, signal: AbortSignal): Promise<number> {
    let current = new URL(url);

    for (let hops = 0; ; hops++) {
      const response = await this.fetchImpl(current, {
        method: 'GET',
        redirect: 'manual',
        signal,
        headers: { 'User-Agent': this.userAgent },
      });
      await response.body?.cancel();

      const location = response.headers.get('location');
      if (!REDIRECT_STATUSES.has(response.status) || location === null) {
        return response.status;
      }
      if (hops >= this.maxRedirects) {
        throw new TooManyRedirectsError(this.maxRedirects);
      }
      current = new URL(location, current);
    }
  }

  private describe(err: unknown): string {
    if (err instanceof TooManyRedirectsError) return err.message;
    if (isAbort(err)) {
      return `Connection timed out (${Math.round(this.timeoutMs / 1000)}s)`;
    }
    const code = errorCode(err);
    if (code !== undefined && CONNECT_FAILURE_CODES.has(code)) {
      return `Connection refused or DNS failure (${code})`;
    }
    if (err instanceof Error) return `Request failed: ${err.message}`;
    return 'Request failed';
  }
}
