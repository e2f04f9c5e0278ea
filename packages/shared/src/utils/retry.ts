export type Backoff = "fixed" | "exponential";

export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoff: Backoff;
  backoffMultiplier?: number;
  /** Return false to rethrow immediately instead of spending the remaining budget. */
  shouldRetry?: (err: unknown, attempt: number) => boolean;
  onRetry?: (err: unknown, attempt: number, delayMs: number) => void;
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoff: "exponential",
  backoffMultiplier: 2,
};

export class RetryAbortedError extends Error {
  constructor(public readonly lastError: unknown) {
    super("Retry aborted", { cause: lastError });
    this.name = "RetryAbortedError";
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function retryDelay(attempt: number, options: Pick<RetryOptions, "baseDelayMs" | "maxDelayMs" | "backoff" | "backoffMultiplier">): number {
  if (options.backoff === "fixed") return Math.min(options.baseDelayMs, options.maxDelayMs);
  const multiplier = options.backoffMultiplier ?? 2;
  return Math.min(options.baseDelayMs * multiplier ** (attempt - 1), options.maxDelayMs);
}

/**
 * Runs `fn` until it resolves or the attempt budget is spent. The last error is
 * rethrown as-is; an abort during the wait between attempts rejects with
 * RetryAbortedError carrying that error.
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let lastError: unknown;

  for (let attempt = 1; attempt <= opts.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (err) {
      lastError = err;
      if (attempt === opts.maxAttempts) break;
      if (opts.shouldRetry && !opts.shouldRetry(err, attempt)) break;

      const delay = retryDelay(attempt, opts);
      opts.onRetry?.(err, attempt, delay);
      try {
        await sleep(delay, opts.signal);
      } catch {
        throw new RetryAbortedError(lastError);
      }
    }
  }

  throw lastError;
}
