import { Ratelimit } from "@upstash/ratelimit";
import { Redis } from "@upstash/redis";
import { createSlidingWindow, type RateLimitDecision } from "./rateLimit";
import { createLogger } from "./log";

const log = createLogger("throttle");

export type CompletionThrottle = {
  /** Resolves once a completion slot for `key` is free. */
  acquire: (key: string) => Promise<void>;
};

export type ThrottleOptions = {
  perMinute: number;
  upstash: { url: string; token: string } | null;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) => new Promise<void>(res => setTimeout(res, ms));

/**
 * Completion-call throttle. Uses Upstash Redis when configured (shared by every
 * process using the same keys), falls back to an in-memory window otherwise.
 */
export function createCompletionThrottle({ perMinute, upstash, sleep = defaultSleep }: ThrottleOptions): CompletionThrottle {
  let check: (key: string) => Promise<RateLimitDecision>;

  if (upstash) {
    const ratelimit = new Ratelimit({
      redis: new Redis({ url: upstash.url, token: upstash.token }),
      limiter: Ratelimit.slidingWindow(perMinute, "1 m"),
      prefix: "tumorboard:rl",
    });
    check = async key => {
      const { success, reset } = await ratelimit.limit(key);
      if (!success) return { ok: false, retryAfter: Math.max(1, Math.ceil((reset - Date.now()) / 1000)) };
      return { ok: true, retryAfter: 0 };
    };
  } else {
    const inMemory = createSlidingWindow(perMinute);
    check = async key => inMemory(key);
  }

  return {
    async acquire(key) {
      for (;;) {
        const { ok, retryAfter } = await check(`completion:${key}`);
        if (ok) return;
        log.warn("rate-limited", { key, retryAfter });
        await sleep(retryAfter * 1000);
      }
    },
  };
}
