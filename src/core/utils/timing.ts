export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, onTimeout: () => Error): Promise<T> {
  let timeout: NodeJS.Timeout | undefined;
  return new Promise<T>((resolve, reject) => {
    timeout = setTimeout(() => reject(onTimeout()), timeoutMs);
    promise
      .then((value) => resolve(value))
      .catch((err: unknown) => reject(err))
      .finally(() => {
        if (timeout) {
          clearTimeout(timeout);
        }
      });
  });
}

/** Exponential delay `base * 2^(attempt-1)`, capped, with +/- `jitter` proportion. */
export function backoffDelay(
  attempt: number,
  baseMs: number,
  maxMs: number,
  jitter = 0,
  random: () => number = Math.random
): number {
  const exponential = Math.min(maxMs, baseMs * 2 ** Math.max(0, attempt - 1));
  if (jitter <= 0) {
    return exponential;
  }
  const spread = exponential * jitter;
  return Math.max(0, Math.round(exponential - spread + random() * spread * 2));
}
