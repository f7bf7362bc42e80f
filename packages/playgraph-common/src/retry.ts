export interface RetryOptions {
  /** Additional attempts after the first one. */
  retries?: number;
  delayMs?: number;
  /** Multiplier applied to the delay after every failed attempt. */
  backoffFactor?: number;
  maxDelayMs?: number;
  /** Return false to rethrow immediately instead of retrying. */
  shouldRetry?: (error: unknown, attempt: number) => boolean;
  /** Overrides the computed delay for one retry, e.g. from a Retry-After header. */
  delayFor?: (error: unknown, computedDelayMs: number) => number;
  onRetry?: (error: unknown, attempt: number) => void | Promise<void>;
  sleep?: (ms: number) => Promise<void>;
}

export async function sleep(ms: number): Promise<void> {
  await new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });
}

export function computeBackoffDelay(
  attempt: number,
  delayMs: number,
  backoffFactor: number,
  maxDelayMs: number = Number.POSITIVE_INFINITY
): number {
  if (delayMs <= 0) {
    return 0;
  }
  const raw = delayMs * Math.pow(backoffFactor, Math.max(0, attempt - 1));
  return Math.min(raw, maxDelayMs);
}

export async function retry<T>(operation: (attempt: number) => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const {
    retries = 2,
    delayMs = 0,
    backoffFactor = 1,
    maxDelayMs,
    shouldRetry,
    delayFor,
    onRetry,
    sleep: wait = sleep,
  } = options;

  let attempt = 0;
  while (true) {
    try {
      return await operation(attempt + 1);
    } catch (error) {
      if (attempt >= retries) {
        throw error;
      }
      if (shouldRetry && !shouldRetry(error, attempt + 1)) {
        throw error;
      }

      attempt += 1;
      if (onRetry) {
        await onRetry(error, attempt);
      }

      const computed = computeBackoffDelay(attempt, delayMs, backoffFactor, maxDelayMs);
      const pause = delayFor ? delayFor(error, computed) : computed;
      if (pause > 0) {
        await wait(pause);
      }
    }
  }
}
