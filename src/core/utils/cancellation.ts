/**
 * Cooperative control for multi-step loops: a {@link CancellationToken} that
 * is checked at step boundaries and a {@link PauseGate} the loop awaits before
 * each step. Neither interrupts a step already in progress.
 */

export class CancelledError extends Error {
  constructor(reason = 'cancelled') {
    super(reason);
    this.name = 'CancelledError';
  }
}

export class CancellationToken {
  private readonly controller = new AbortController();
  private reason: string | null = null;

  get cancelled(): boolean {
    return this.reason !== null;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  cancel(reason = 'cancelled'): void {
    if (this.reason !== null) return;
    this.reason = reason;
    this.controller.abort();
  }

  throwIfCancelled(): void {
    if (this.reason !== null) {
      throw new CancelledError(this.reason);
    }
  }
}

export class PauseGate {
  private paused = false;
  private waiters: Array<() => void> = [];

  get isPaused(): boolean {
    return this.paused;
  }

  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
    const waiters = this.waiters;
    this.waiters = [];
    for (const wake of waiters) wake();
  }

  /** Resolves immediately when open, otherwise on resume or when `token` is cancelled. */
  wait(token?: CancellationToken): Promise<void> {
    if (!this.paused || token?.cancelled) {
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      const onAbort = (): void => {
        this.waiters = this.waiters.filter((waiter) => waiter !== wake);
        resolve();
      };
      const wake = (): void => {
        token?.signal.removeEventListener('abort', onAbort);
        resolve();
      };
      this.waiters.push(wake);
      token?.signal.addEventListener('abort', onAbort, { once: true });
    });
  }
}
