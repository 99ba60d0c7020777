export type BackoffOptions = {
  baseDelayMs: number;
  maxDelayMs: number;
  multiplier?: number;
};

// Exponential reconnect delay for the given zero-based attempt.
export function calculateBackoff(attempt: number, options: BackoffOptions): number {
  const multiplier = options.multiplier ?? 2;
  return Math.min(options.baseDelayMs * Math.pow(multiplier, attempt), options.maxDelayMs);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done() {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}
