export interface RetryOptions {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
  /** Return false to fail immediately instead of retrying. */
  shouldRetry?: (error: unknown) => boolean;
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;
  sleep?: (ms: number) => Promise<void>;
}

const DEFAULT_RETRY_OPTIONS: RetryOptions = {
  maxAttempts: 3,
  baseDelayMs: 1000,
  maxDelayMs: 10_000,
  backoffMultiplier: 2,
};

export class RetryExhaustedError extends Error {
  constructor(
    readonly attempts: number,
    readonly lastError: unknown,
  ) {
    super(
      `Failed after ${attempts} attempt${attempts === 1 ? "" : "s"}: ${
        lastError instanceof Error ? lastError.message : String(lastError)
      }`,
      { cause: lastError },
    );
    this.name = "RetryExhaustedError";
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

export function backoffDelay(
  attempt: number,
  options: Pick<RetryOptions, "baseDelayMs" | "maxDelayMs" | "backoffMultiplier">,
): number {
  return Math.min(
    options.baseDelayMs * Math.pow(options.backoffMultiplier, attempt - 1),
    options.maxDelayMs,
  );
}

/**
 * Runs `operation` up to `maxAttempts` times with exponential backoff between
 * attempts. Rejects with RetryExhaustedError carrying the last failure.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {},
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const wait = opts.sleep ?? sleep;
  const maxAttempts = Math.max(1, Math.floor(opts.maxAttempts));

  for (let attempt = 1; ; attempt += 1) {
    try {
      return await operation(attempt);
    } catch (error) {
      const retryable = opts.shouldRetry ? opts.shouldRetry(error) : true;
      if (!retryable || attempt >= maxAttempts) {
        throw new RetryExhaustedError(attempt, error);
      }

      const delay = backoffDelay(attempt, opts);
      opts.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }
}
