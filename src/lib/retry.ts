export type RetryPolicyOptions = {
  maxAttempts: number;
  baseDelayMs: number;
  factor: number;
  maxDelayMs: number;
};

export class RetryPolicy {
  readonly maxAttempts: number;
  readonly baseDelayMs: number;
  readonly factor: number;
  readonly maxDelayMs: number;

  constructor(options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new RangeError(`maxAttempts must be a positive integer, got ${options.maxAttempts}`);
    }
    this.maxAttempts = options.maxAttempts;
    this.baseDelayMs = options.baseDelayMs;
    this.factor = options.factor;
    this.maxDelayMs = options.maxDelayMs;
  }

  /** Delay before attempt `attempt + 1`, after `attempt` has failed (1-based). */
  delayFor(attempt: number): number {
    return Math.min(this.maxDelayMs, this.baseDelayMs * this.factor ** (attempt - 1));
  }

  shouldRetry(attempt: number): boolean {
    return attempt < this.maxAttempts;
  }
}

/** Network error, timeout, 429 or 5xx: worth another attempt. */
export class TransientProviderError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = "TransientProviderError";
  }
}

/** The provider refused the request (4xx other than 429): retrying will not help. */
export class PermanentProviderError extends Error {
  constructor(message: string, readonly status?: number) {
    super(message);
    this.name = "PermanentProviderError";
  }
}

export function isRetryableStatus(status: number) {
  return status === 408 || status === 429 || status >= 500;
}

/** Map a failed HTTP response to the matching provider error. */
export function providerErrorForStatus(provider: string, status: number, statusText: string) {
  const message = `${provider} responded ${status} ${statusText}`.trim();
  return isRetryableStatus(status)
    ? new TransientProviderError(message, status)
    : new PermanentProviderError(message, status);
}

/** Errors thrown by fetch itself (DNS, reset socket, abort by timeout) are transient. */
export function toProviderError(provider: string, err: unknown): TransientProviderError | PermanentProviderError {
  if (err instanceof TransientProviderError || err instanceof PermanentProviderError) return err;
  const detail = err instanceof Error ? `${err.name}: ${err.message}` : String(err);
  return new TransientProviderError(`${provider} request failed (${detail})`);
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

/**
 * Race a promise against a hard ceiling. The timer is cleared once either side settles.
 */
export async function withTimeout<T>(promise: Promise<T>, ms: number, message: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${message} (timed out after ${ms}ms)`)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
