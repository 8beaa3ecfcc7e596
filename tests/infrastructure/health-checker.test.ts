import { describe, it, expect, vi, beforeEach, type Mock } from 'vitest';
import { HealthChecker } from '../../src/infrastructure/probes/index.js';

function dnsFailure(): TypeError {
  const cause = Object.assign(new Error('getaddrinfo ENOTFOUND nowhere.invalid'), { code: 'ENOTFOUND' });
  return new TypeError('fetch failed', { cause });
}

describe('HealthChecker', () => {
  let fetchImpl: Mock<typeof fetch>;
  let checker: HealthChecker;

  beforeEach(() => {
    fetchImpl = vi.fn<typeof fetch>();
    checker = new HealthChecker({ fetchImpl });
  });

  it('classifies 2xx as healthy', async () => {
    fetchImpl.mockResolvedValue(new Response('ok', { status: 200 }));

    const outcome = await checker.check('https://example.test/');

    expect(outcome).toEqual({
      status: 'healthy',
      status_code: 200,
      response_time_ms: expect.any(Number),
      error_message: null,
      checked_url: 'https://example.test/',
      checked_at: expect.any(String),
    });
    expect(fetchImpl).toHaveBeenCalledWith(
      new URL('https://example.test/'),
      expect.objectContaining({ method: 'GET', redirect: 'manual' }),
    );
  });

  it('classifies HTTP 500 as unhealthy with its code', async () => {
    fetchImpl.mockResolvedValue(new Response('down', { status: 500 }));

    const outcome = await checker.check('https://example.test/');

    expect(outcome.status).toBe('unhealthy');
    expect(outcome.status_code).toBe(500);
    expect(outcome.error_message).toBe('HTTP 500');
  });

  it('classifies a DNS failure as unreachable with no code', async () => {
    fetchImpl.mockRejectedValue(dnsFailure());

    const outcome = await checker.check('https://nowhere.invalid/');

    expect(outcome.status).toBe('unreachable');
    expect(outcome.status_code).toBeNull();
    expect(outcome.error_message).toBe('Connection refused or DNS failure (ENOTFOUND)');
  });

  it('classifies a timeout as unreachable', async () => {
    fetchImpl.mockRejectedValue(Object.assign(new Error('The operation was aborted due to timeout'), { name: 'TimeoutError' }));

    const outcome = await checker.check('https://slow.example.test/');

    expect(outcome.status).toBe('unreachable');
    expect(outcome.error_message).toBe('Connection timed out (10s)');
  });

  it('follows redirects relative to the current URL', async () => {
    fetchImpl
      .mockResolvedValueOnce(new Response(null, { status: 301, headers: { location: '/moved' } }))
      .mockResolvedValueOnce(new Response('ok', { status: 200 }));

    const outcome = await checker.check('https://example.test/start');

    expect(outcome.status).toBe('healthy');
    expect(outcome.checked_url).toBe('https://example.test/start');
    expect(String(fetchImpl.mock.calls[1]?.[0])).toBe('https://example.test/moved');
  });

  it('gives up after five redirects', async () => {
    fetchImpl.mockImplementation(async () => new Response(null, { status: 302, headers: { location: '/loop' } }));

    const outcome = await checker.check('https://example.test/loop');

    expect(fetchImpl).toHaveBeenCalledTimes(6);
    expect(outcome.status).toBe('unreachable');
    expect(outcome.status_code).toBeNull();
    expect(outcome.error_message).toBe('Too many redirects (more than 5)');
  });

  it('treats a redirect without Location as the final status', async () => {
    fetchImpl.mockResolvedValue(new Response(null, { status: 302 }));

    const outcome = await checker.check('https://example.test/');

    expect(outcome.status).toBe('unhealthy');
    expect(outcome.status_code).toBe(302);
  });

  it('reports an unparseable URL as unreachable without fetching', async () => {
    const outcome = await checker.check('not a url');

    expect(fetchImpl).not.toHaveBeenCalled();
    expect(outcome.status).toBe('unreachable');
    expect(outcome.error_message).toMatch(/^Request failed: /);
  });

  it('measures response time with the injected clock', async () => {
    const clock = vi.fn<() => number>().mockReturnValueOnce(1_000).mockReturnValueOnce(1_042.5);
    fetchImpl.mockResolvedValue(new Response(null, { status: 204 }));

    const outcome = await new HealthChecker({ fetchImpl, clock }).check('https://example.test/');

    expect(outcome.response_time_ms).toBe(43);
  });
});
