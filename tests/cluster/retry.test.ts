import { describe, it, expect } from 'vitest';
import {
  computeBackoffDelay,
  DEFAULT_RETRY_POLICY,
  isNonRetryableMessage,
  isRetryableError,
  withRetry,
} from '../../src/cluster/retry.js';
import { CommandError, ExportAbortedError } from '../../src/errors.js';

const noSleep = async (): Promise<void> => {};

describe('computeBackoffDelay', () => {
  const policy = { backoffBase: 2, jitterFactor: 0.2, maxDelayMs: 60_000 };

  it('grows exponentially without jitter at the midpoint', () => {
    expect(computeBackoffDelay(0, policy, () => 0.5)).toBe(1000);
    expect(computeBackoffDelay(1, policy, () => 0.5)).toBe(2000);
    expect(computeBackoffDelay(2, policy, () => 0.5)).toBe(4000);
  });

  it('applies jitter within ±20%', () => {
    expect(computeBackoffDelay(0, policy, () => 0)).toBe(800);
    expect(computeBackoffDelay(0, policy, () => 1)).toBe(1200);
  });

  it('caps the delay', () => {
    expect(computeBackoffDelay(10, policy, () => 0.5)).toBe(60_000);
  });
});

describe('isNonRetryableMessage', () => {
  it('matches permanent failures case-insensitively', () => {
    expect(isNonRetryableMessage('Error from server (NotFound): deployments "x" not found')).toBe(true);
    expect(isNonRetryableMessage('Error from server (Forbidden): user cannot list')).toBe(true);
    expect(isNonRetryableMessage('Unable to connect to the server: i/o timeout')).toBe(false);
  });

  it('classifies command failures on stderr, not on the command line', () => {
    const line = 'kubectl get deployments -n cache-invalidation -o json';
    const transient = new CommandError(
      `Command failed: ${line}: Unable to connect to the server`,
      line,
      false,
      'Unable to connect to the server',
    );
    const spawnFailure = new CommandError(`Command failed: ${line}: spawn kubectl EAGAIN`, line);
    const forbidden = new CommandError(
      `Command failed: kubectl get secrets -n shop -o json: Error from server (Forbidden)`,
      'kubectl get secrets -n shop -o json',
      false,
      'Error from server (Forbidden): secrets is forbidden',
    );

    expect(isRetryableError(transient)).toBe(true);
    expect(isRetryableError(spawnFailure)).toBe(true);
    expect(isRetryableError(forbidden)).toBe(false);
  });

  it('always retries timeouts', () => {
    const line = 'kubectl get pods -n invalid-ns -o json';
    expect(isRetryableError(new CommandError(`Command failed: ${line}: timed out after 30s`, line, true))).toBe(true);
  });

  it('treats aborts as final', () => {
    expect(isRetryableError(new ExportAbortedError())).toBe(false);
    expect(isRetryableError(new Error('connection refused'))).toBe(true);
  });
});

describe('withRetry', () => {
  it('retries transient failures and reports each retry', async () => {
    const retries: Array<[number, number]> = [];
    const delays: number[] = [];
    let calls = 0;

    const result = await withRetry(
      async (attempt) => {
        calls++;
        if (attempt < 2) throw new Error('connection refused');
        return 'ok';
      },
      DEFAULT_RETRY_POLICY,
      {
        random: () => 0.5,
        sleep: async (ms) => {
          delays.push(ms);
        },
        onRetry: (attempt, _err, delayMs) => retries.push([attempt, delayMs]),
      },
    );

    expect(result).toBe('ok');
    expect(calls).toBe(3);
    expect(delays).toEqual([1000, 2000]);
    expect(retries).toEqual([
      [1, 1000],
      [2, 2000],
    ]);
  });

  it('gives up after maxRetries and rethrows the last error', async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error(`timeout ${calls}`);
        },
        { ...DEFAULT_RETRY_POLICY, maxRetries: 2 },
        { sleep: noSleep },
      ),
    ).rejects.toThrow('timeout 3');
    expect(calls).toBe(3);
  });

  it('does not retry non-retryable errors', async () => {
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error('secrets "db" not found');
        },
        DEFAULT_RETRY_POLICY,
        { sleep: noSleep },
      ),
    ).rejects.toThrow('not found');
    expect(calls).toBe(1);
  });

  it('stops before the next attempt once aborted', async () => {
    const controller = new AbortController();
    let calls = 0;
    await expect(
      withRetry(
        async () => {
          calls++;
          throw new Error('connection refused');
        },
        DEFAULT_RETRY_POLICY,
        {
          signal: controller.signal,
          sleep: async () => {
            controller.abort();
          },
        },
      ),
    ).rejects.toBeInstanceOf(ExportAbortedError);
    expect(calls).toBe(1);
  });

  it('aborts a pending default sleep', async () => {
    const controller = new AbortController();
    const pending = withRetry(
      async () => {
        throw new Error('connection refused');
      },
      DEFAULT_RETRY_POLICY,
      { signal: controller.signal, random: () => 0.5 },
    );
    setTimeout(() => controller.abort(), 10);
    await expect(pending).rejects.toBeInstanceOf(ExportAbortedError);
  });
});
