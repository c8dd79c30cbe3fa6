// In-memory sliding-window limiter.
// Per process only; enough to keep one CLI run under a provider's per-minute quota.

const WINDOW_MS = 60_000; // 1 minute

export type RateLimitDecision = { ok: boolean; retryAfter: number };

export function createSlidingWindow(
  max: number,
  windowMs = WINDOW_MS,
  now: () => number = Date.now,
) {
  const store = new Map<string, number[]>();

  return function check(key: string): RateLimitDecision {
    const t = now();
    const hits = (store.get(key) ?? []).filter(hit => t - hit < windowMs);

    if (hits.length >= max) {
      store.set(key, hits);
      return { ok: false, retryAfter: Math.ceil((hits[0] + windowMs - t) / 1000) };
    }

    hits.push(t);
    store.set(key, hits);
    return { ok: true, retryAfter: 0 };
  };
}
