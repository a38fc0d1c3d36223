import { setTimeout as delay } from 'node:timers/promises';
import { CommandError, ExportAbortedError, errorDetail } from '../errors.js';

export interface RetryPolicy {
  /** Retries after the first attempt; 3 means up to 4 attempts. */
  maxRetries: number;
  /** Delay before retry n is `backoffBase^n` seconds, before jitter. */
  backoffBase: number;
  /** Relative jitter applied to each delay (0.2 → ±20%). */
  jitterFactor: number;
  maxDelayMs: number;
  isRetryable: (error: unknown) => boolean;
}

export interface RetryHooks {
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  signal?: AbortSignal;
  onRetry?: (attempt: number, error: unknown, delayMs: number) => void;
}

const NON_RETRYABLE_PATTERNS = [
  'not found',
  'already exists',
  'forbidden',
  'unauthorized',
  'invalid',
  'malformed',
  'syntax error',
  'bad request',
];

/** Failures that will not change on a second attempt. */
export function isNonRetryableMessage(message: string): boolean {
  const lower = message.toLowerCase();
  return NON_RETRYABLE_PATTERNS.some((pattern) => lower.includes(pattern));
}

/** Timeouts always retry; other failures unless their stderr reads as permanent. */
export function isRetryableError(error: unknown): boolean {
  if (error instanceof ExportAbortedError) return false;
  if (error instanceof CommandError && error.timedOut) return true;
  return !isNonRetryableMessage(errorDetail(error));
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  backoffBase: 2,
  jitterFactor: 0.2,
  maxDelayMs: 60_000,
  isRetryable: isRetryableError,
};

/**
 * Delay in ms before the retry following attempt `attempt` (0-based).
 */
export function computeBackoffDelay(
  attempt: number,
  policy: Pick<RetryPolicy, 'backoffBase' | 'jitterFactor' | 'maxDelayMs'>,
  random: () => number = Math.random,
): number {
  const base = Math.pow(policy.backoffBase, attempt) * 1000;
  const jitter = 1 - policy.jitterFactor + random() * 2 * policy.jitterFactor;
  return Math.min(base * jitter, policy.maxDelayMs);
}

async function defaultSleep(ms: number, signal?: AbortSignal): Promise<void> {
  try {
    await delay(ms, undefined, { signal });
  } catch (err) {
    if (signal?.aborted) throw new ExportAbortedError();
    throw err;
  }
}

/**
 * Run `operation` until it succeeds, fails with a non-retryable error, or
 * the policy's retries are used up. The last error is rethrown.
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy = DEFAULT_RETRY_POLICY,
  hooks: RetryHooks = {},
): Promise<T> {
  const sleep = hooks.sleep ?? defaultSleep;
  let lastError: unknown;

  for (let attempt = 0; attempt <= policy.maxRetries; attempt++) {
    if (hooks.signal?.aborted) throw new ExportAbortedError();
    try {
      return await operation(attempt);
    } catch (err) {
      lastError = err;
      if (!policy.isRetryable(err) || attempt === policy.maxRetries) break;

      const delayMs = computeBackoffDelay(attempt, policy, hooks.random);
      hooks.onRetry?.(attempt + 1, err, delayMs);
      await sleep(delayMs, hooks.signal);
    }
  }

  throw lastError;
}
