import { errorMessage } from "./errors";

/** What one attempt of a retried operation reports back. */
export type AttemptResult<T> =
  | { ok: true; value: T }
  | { ok: false; retryable: boolean; error: Error };

export type RetryOutcome<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: Error; attempts: number };

export type RetryPolicy = {
  maxAttempts: number;
  minDelayMs: number;
  maxDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (info: { attempt: number; delayMs: number; error: Error }) => void;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  minDelayMs: 2_000,
  maxDelayMs: 10_000,
};

const defaultSleep = (ms: number) => new Promise<void>(res => setTimeout(res, ms));

/** Exponential backoff after the given (1-based) failed attempt, clamped to [min, max]. */
export function backoffDelay(attempt: number, { minDelayMs, maxDelayMs }: Pick<RetryPolicy, "minDelayMs" | "maxDelayMs">): number {
  return Math.min(maxDelayMs, Math.max(minDelayMs, 1000 * 2 ** attempt));
}

/**
 * Runs `operation` until it succeeds, reports a non-retryable failure, or the
 * attempt budget runs out. A throw from `operation` counts as retryable.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<AttemptResult<T>>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
): Promise<RetryOutcome<T>> {
  const sleep = policy.sleep ?? defaultSleep;
  let lastError: Error = new Error("operation was never attempted");

  for (let attempt = 1; attempt <= policy.maxAttempts; attempt++) {
    let result: AttemptResult<T>;
    try {
      result = await operation(attempt);
    } catch (err) {
      result = { ok: false, retryable: true, error: err instanceof Error ? err : new Error(errorMessage(err)) };
    }

    if (result.ok) return { ok: true, value: result.value, attempts: attempt };

    lastError = result.error;
    if (!result.retryable) return { ok: false, error: lastError, attempts: attempt };
    if (attempt === policy.maxAttempts) break;

    const delayMs = backoffDelay(attempt, policy);
    policy.onRetry?.({ attempt, delayMs, error: lastError });
    await sleep(delayMs);
  }

  return { ok: false, error: lastError, attempts: policy.maxAttempts };
}
