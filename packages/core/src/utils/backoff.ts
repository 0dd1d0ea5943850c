/**
 * Exponential backoff with full jitter.
 *
 * attempt 0 → up to baseMs, attempt 1 → up to 2×baseMs, … capped at maxMs.
 * The returned delay is never below half the un-jittered value so retries
 * do not collapse to zero.
 */
export function backoffDelay(
  attempt: number,
  baseMs: number,
  maxMs: number,
  random: () => number = Math.random,
): number {
  const exp = Math.min(maxMs, baseMs * 2 ** Math.max(0, attempt));
  const half = exp / 2;
  return Math.round(half + random() * half);
}

/** Resolve after `ms`. Rejects early if the signal aborts. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (signal?.aborted) {
    return Promise.reject(new Error('Sleep aborted'));
  }
  return new Promise<void>((resolve, reject) => {
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error('Sleep aborted'));
    };

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
