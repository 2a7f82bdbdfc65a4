import { RetryExhaustedError, TimeoutError } from './errors.js';

/**
 * Retry configuration.
 */
export interface RetryOptions {
  /** Total attempts including the first (minimum 1) */
  maxAttempts: number;
  /** Delay before the second attempt in ms */
  baseDelayMs: number;
  /** Upper bound for any single delay in ms */
  maxDelayMs?: number;
  /** Backoff multiplier (default: 2) */
  factor?: number;
  /** Per-attempt timeout in ms, 0 = no timeout */
  timeoutMs?: number;
  /** Called before sleeping ahead of the next attempt */
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
  /** Returns false to stop retrying early (e.g. during shutdown) */
  shouldRetry?: (error: unknown) => boolean;
}

const DEFAULT_MAX_DELAY_MS = 30_000;

/**
 * Delay before the attempt after `attempt` (1-based).
 */
export function backoffDelay(
  attempt: number,
  options: Pick<RetryOptions, 'baseDelayMs' | 'maxDelayMs' | 'factor'>
): number {
  const factor = options.factor ?? 2;
  const maxDelay = options.maxDelayMs ?? DEFAULT_MAX_DELAY_MS;
  return Math.min(maxDelay, options.baseDelayMs * Math.pow(factor, attempt - 1));
}

/**
 * Race a promise against a timer. A timeout of 0 disables the race.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  if (timeoutMs <= 0) {
    return promise;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const timeoutPromise = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      reject(new TimeoutError(timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timer);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run an operation with bounded exponential backoff.
 *
 * Resolves with the first successful result. Throws RetryExhaustedError
 * once every attempt has failed or shouldRetry declined.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: RetryOptions
): Promise<T> {
  const maxAttempts = Math.max(1, Math.floor(options.maxAttempts));
  let lastError: unknown;

  for (let attempt = 1; attempt <= maxAttempts; attempt++) {
    try {
      return await withTimeout(operation(attempt), options.timeoutMs ?? 0);
    } catch (error) {
      lastError = error;

      if (attempt === maxAttempts || options.shouldRetry?.(error) === false) {
        throw new RetryExhaustedError(attempt, error);
      }

      const delayMs = backoffDelay(attempt, options);
      options.onRetry?.({ attempt, delayMs, error });
      await sleep(delayMs);
    }
  }

  throw new RetryExhaustedError(maxAttempts, lastError);
}
