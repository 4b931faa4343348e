export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}


export interface RetryOptions {
  /** Total attempts, including the first. */
  maxAttempts?: number;

  initialDelayMs?: number;

  backoffMultiplier?: number;

  maxDelayMs?: number;

  addJitter?: boolean;

  maxJitterMs?: number;

  shouldRetry?: (error: unknown, attempt: number) => boolean;

  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;

  sleep?: (ms: number) => Promise<void>;
}


/** Delay before retry number `attempt + 1`; attempt is zero-based. */
export function calculateBackoffDelay(attempt: number, options: RetryOptions = {}): number {
  const {
    initialDelayMs = 1000,
    backoffMultiplier = 2,
    maxDelayMs = 15000,
    addJitter = false,
    maxJitterMs = 300
  } = options;

  const baseDelay = initialDelayMs * Math.pow(backoffMultiplier, attempt);
  const jitter = addJitter ? Math.floor(Math.random() * maxJitterMs) : 0;

  return Math.min(baseDelay + jitter, maxDelayMs);
}


/** The waits between attempts for a given policy, e.g. [1000, 2000] for 3 attempts. */
export function backoffSchedule(options: RetryOptions = {}): number[] {
  const { maxAttempts = 3 } = options;
  const delays: number[] = [];
  for (let attempt = 0; attempt < maxAttempts - 1; attempt++) {
    delays.push(calculateBackoffDelay(attempt, { ...options, addJitter: false }));
  }
  return delays;
}


export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const {
    maxAttempts = 3,
    shouldRetry = () => true,
    sleep: wait = sleep
  } = options;

  let lastError: unknown = null;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;

      if (attempt === maxAttempts - 1 || !shouldRetry(error, attempt)) {
        break;
      }

      const delay = calculateBackoffDelay(attempt, options);
      options.onRetry?.(error, attempt, delay);
      await wait(delay);
    }
  }

  throw lastError;
}
