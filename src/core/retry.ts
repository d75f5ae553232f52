import { TimeoutError } from './errors.js';

export interface RetryPolicy {
  /** Attempts after the first one. */
  retries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  isRetryable?: (err: unknown) => boolean;
  onRetry?: (info: { attempt: number; delayMs: number; error: unknown }) => void;
}

export type RetryResult<T> =
  | { ok: true; value: T; attempts: number }
  | { ok: false; error: unknown; attempts: number };

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/** Delay before the retry that follows `attempt`: doubling, capped. */
export function backoffDelay(attempt: number, policy: RetryPolicy): number {
  const base = Math.max(0, policy.baseDelayMs);
  return Math.min(Math.max(base, policy.maxDelayMs), base * 2 ** (attempt - 1));
}

/**
 * Call `fn` until it succeeds, the error is not retryable, or the retries
 * run out. The outcome is returned rather than thrown so callers can turn a
 * final failure into a gap record.
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, policy: RetryPolicy): Promise<RetryResult<T>> {
  const attempts = Math.max(0, Math.floor(policy.retries)) + 1;
  const isRetryable = policy.isRetryable ?? (() => true);

  for (let attempt = 1; ; attempt += 1) {
    try {
      return { ok: true, value: await fn(), attempts: attempt };
    } catch (error) {
      if (attempt >= attempts || !isRetryable(error)) {
        return { ok: false, error, attempts: attempt };
      }
      const delayMs = backoffDelay(attempt, policy);
      policy.onRetry?.({ attempt, delayMs, error });
      if (delayMs > 0) await sleep(delayMs);
    }
  }
}

/**
 * Bound a collaborator call. The underlying promise keeps running; its
 * eventual result is discarded once the timeout has fired.
 */
export function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  const boundedMs = Math.max(1, Math.floor(timeoutMs));
  return new Promise<T>((resolve, reject) => {
    const timeout = setTimeout(() => reject(new TimeoutError(label, boundedMs)), boundedMs);
    promise.then(
      (value) => {
        clearTimeout(timeout);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timeout);
        reject(error);
      }
    );
  });
}

export function isTransientError(err: unknown): boolean {
  if (err instanceof TimeoutError) return true;
  const text = (err instanceof Error ? err.message : String(err)).toLowerCase();
  const retryablePatterns = [
    'timeout',
    'timed out',
    'rate limit',
    '429',
    '503',
    'temporarily unavailable',
    'network',
    'eai_again',
    'econnreset',
  ];
  return retryablePatterns.some((p) => text.includes(p));
}
