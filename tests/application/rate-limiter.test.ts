import { describe, it, expect, beforeEach } from 'vitest';
import { RateLimiter } from '../../src/application/rate-limiter.js';
import { admissionPolicy } from '../../src/application/admission.js';
import { DEFAULT_CONFIG } from '../../src/infrastructure/config/index.js';
import { FIXED_NOW } from '../helpers.js';

describe('RateLimiter', () => {
  let now: number;
  let limiter: RateLimiter;

  beforeEach(() => {
    now = FIXED_NOW;
    limiter = new RateLimiter(() => now);
  });

  it('admits five requests then denies the sixth (limit 5, window 60s)', () => {
    for (let i = 1; i <= 5; i++) {
      const decision = limiter.admit('key:a', 5, 60);
      expect(decision.allowed).toBe(true);
      expect(decision.remaining).toBe(5 - i);
    }

    const sixth = limiter.admit('key:a', 5, 60);
    expect(sixth).toEqual({ allowed: false, limit: 5, remaining: 0, reset_seconds: 60 });
  });

  it('opens a fresh window once the old one has elapsed', () => {
    for (let i = 0; i < 6; i++) limiter.admit('key:a', 5, 60);

    now += 61_000;
    const decision = limiter.admit('key:a', 5, 60);
    expect(decision).toEqual({ allowed: true, limit: 5, remaining: 4, reset_seconds: 60 });
  });

  it('resets exactly at the window boundary', () => {
    for (let i = 0; i < 5; i++) limiter.admit('key:a', 5, 60);

    now += 60_000;
    expect(limiter.admit('key:a', 5, 60).remaining).toBe(4);
  });

  it('rounds reset_seconds up to whole seconds', () => {
    limiter.admit('ip:1.2.3.4', 10, 60);
    now += 20_500;
    expect(limiter.admit('ip:1.2.3.4', 10, 60).reset_seconds).toBe(40);
  });

  it('keeps buckets independent', () => {
    for (let i = 0; i < 5; i++) limiter.admit('key:a', 5, 60);

    expect(limiter.admit('key:a', 5, 60).allowed).toBe(false);
    expect(limiter.admit('key:b', 5, 60).allowed).toBe(true);
    expect(limiter.bucketCount).toBe(2);
  });

  it('keeps counting denied requests within the window', () => {
    for (let i = 0; i < 8; i++) limiter.admit('key:a', 5, 60);
    const decision = limiter.admit('key:a', 5, 60);
    expect(decision.allowed).toBe(false);
    expect(decision.remaining).toBe(0);
  });

  it('prunes windows that have rolled over', () => {
    limiter.admit('key:a', 5, 60);
    now += 30_000;
    limiter.admit('key:b', 5, 60);
    now += 31_000;

    expect(limiter.prune(60)).toBe(1);
    expect(limiter.bucketCount).toBe(1);
  });
});

describe('admissionPolicy', () => {
  const config = DEFAULT_CONFIG.rateLimit;

  it('uses the admin budget for admin keys without an override', () => {
    expect(admissionPolicy({ kind: 'admin', credential_id: 'k1', rate_limit: null }, config)).toEqual({
      bucket: 'key:k1',
      limit: 10_000,
    });
  });

  it('prefers a per-key override', () => {
    expect(admissionPolicy({ kind: 'regular', credential_id: 'k2', rate_limit: 7 }, config)).toEqual({
      bucket: 'key:k2',
      limit: 7,
    });
  });

  it('buckets edit tokens by listing', () => {
    expect(admissionPolicy({ kind: 'edit_token', credential_id: 't1', listing_id: 'l1' }, config)).toEqual({
      bucket: 'listing:l1',
      limit: 100,
    });
  });

  it('buckets anonymous callers by address', () => {
    expect(admissionPolicy({ kind: 'anonymous', client: '10.0.0.5' }, config)).toEqual({
      bucket: 'ip:10.0.0.5',
      limit: 100,
    });
  });
});
