export type RetryPolicy = {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
};

export type RetryOptions = RetryPolicy & {
  shouldRetry: (error: unknown, attempt: number) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
};

export const backoffDelay = (policy: RetryPolicy, attempt: number): number =>
  Math.min(policy.baseDelayMs * policy.backoffMultiplier ** (attempt - 1), policy.maxDelayMs);

export const sleep = (ms: number, signal?: AbortSignal): Promise<void> =>
  new Promise((resolve) => {
    if (ms <= 0 || signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });

/**
 * Runs `fn` until it resolves, `shouldRetry` declines the failure, the abort
 * signal fires, or `attempts` calls have been made. The last failure is
 * rethrown unchanged.
 */
export const withRetry = async <T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions,
): Promise<T> => {
  const attempts = Math.max(1, options.attempts);

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      const exhausted = attempt >= attempts;
      if (exhausted || options.signal?.aborted || !options.shouldRetry(err, attempt)) {
        throw err;
      }
      const delayMs = backoffDelay(options, attempt);
      options.onRetry?.(err, attempt, delayMs);
      await sleep(delayMs, options.signal);
      if (options.signal?.aborted) throw err;
    }
  }
};
