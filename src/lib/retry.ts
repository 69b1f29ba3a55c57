export type RetryOptions = {
  /** Extra attempts after the first one. */
  retries: number;
  shouldRetry: (err: unknown) => boolean;
  /** Linear backoff: attempt n waits n * delayMs. */
  delayMs?: number;
  onRetry?: (err: unknown, attempt: number) => void;
  sleep?: (ms: number) => Promise<void>;
};

const defaultSleep = (ms: number) =>
  new Promise<void>((resolve) => setTimeout(resolve, ms));

export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  opts: RetryOptions
): Promise<T> {
  const sleep = opts.sleep ?? defaultSleep;
  const delayMs = opts.delayMs ?? 500;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      if (attempt >= opts.retries || !opts.shouldRetry(err)) {
        throw err;
      }
      opts.onRetry?.(err, attempt + 1);
      await sleep(delayMs * (attempt + 1));
    }
  }
}
