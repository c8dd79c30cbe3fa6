import { createLimiter } from "./limiter";

export type ItemOutcome<I, T> =
  | { ok: true; index: number; input: I; value: T }
  | { ok: false; index: number; input: I; error: unknown };

/**
 * Runs `task` over every input with at most `maxConcurrent` in flight. Each item
 * settles on its own; a failure never cancels its siblings. Outcomes come back
 * in input order.
 */
export async function runBatch<I, T>(
  inputs: readonly I[],
  task: (input: I, index: number) => Promise<T>,
  maxConcurrent: number,
): Promise<ItemOutcome<I, T>[]> {
  const limiter = createLimiter(maxConcurrent);

  return Promise.all(
    inputs.map(async (input, index): Promise<ItemOutcome<I, T>> => {
      try {
        const value = await limiter.run(() => task(input, index));
        return { ok: true, index, input, value };
      } catch (error) {
        return { ok: false, index, input, error };
      }
    }),
  );
}

export function successes<I, T>(outcomes: readonly ItemOutcome<I, T>[]): T[] {
  return outcomes.flatMap(o => (o.ok ? [o.value] : []));
}

export function failures<I, T>(outcomes: readonly ItemOutcome<I, T>[]): Array<Extract<ItemOutcome<I, T>, { ok: false }>> {
  return outcomes.flatMap(o => (o.ok ? [] : [o]));
}
