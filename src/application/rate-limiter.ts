/**
 * Fixed-window admission counter.
 *
 * One `{ window_start, count }` pair per bucket, held only in process
 * memory and created lazily on first use. `admit()` is synchronous, so the
 * reset-increment-compare sequence for a bucket runs to completion before
 * any other request can observe that bucket: Node's single thread is the
 * mutual exclusion and no update is lost.
 */

export interface AdmissionDecision {
  allowed: boolean;
  limit: number;
  remaining: number;
  /** Whole seconds until the bucket's window rolls over. */
  reset_seconds: number;
}

interface RateWindow {
  window_start: number; // epoch ms
  count: number;
}

export class RateLimiter {
  private readonly windows = new Map<string, RateWindow>();

  constructor(private readonly now: () => number = Date.now) {}

  admit(bucket: string, limit: number, windowSeconds: number): AdmissionDecision {
    const now = this.now();
    const windowMs = windowSeconds * 1000;

    let window = this.windows.get(bucket);
    if (window === undefined || now - window.window_start >= windowMs) {
      window = { window_start: now, count: 0 };
      this.windows.set(bucket, window);
    }

    // The offending request counts against the window too.
    window.count += 1;

    return {
      allowed: window.count <= limit,
      limit,
      remaining: Math.max(0, limit - window.count),
      reset_seconds: Math.max(0, Math.ceil((windowMs - (now - window.window_start)) / 1000)),
    };
  }

  /** Drops windows that have already rolled over. Returns how many were removed. */
  prune(windowSeconds: number): number {
    const now = this.now();
    let removed = 0;
    for (const [bucket, window] of this.windows) {
      if (now - window.window_start >= windowSeconds * 1000) {
        this.windows.delete(bucket);
        removed++;
      }
    }
    return removed;
  }

  get bucketCount(): number {
    return this.windows.size;
  }
}
