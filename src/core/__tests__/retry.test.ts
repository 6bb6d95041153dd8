import { describe, it, expect, vi } from 'vitest';

import { RetryPolicy } from '../retry.js';
import type { RetryAttempt } from '../retry.js';
import {
  ConfigurationError,
  LLMError,
  RetriesExhaustedError,
  RunTimeoutError,
  ValidatorError,
} from '../errors.js';
import { noSleep, transientLLMError } from '../../__tests__/fakes.js';

function policy(overrides: Partial<ConstructorParameters<typeof RetryPolicy>[0]> = {}): RetryPolicy {
  return new RetryPolicy({
    maxAttempts: 3,
    initialDelayMs: 1000,
    exponentialBase: 2,
    sleep: noSleep,
    ...overrides,
  });
}

describe('RetryPolicy', () => {
  describe('execute', () => {
    it('returns immediately on success', async () => {
      const op = vi.fn(async () => 'ok');

      await expect(policy().execute(op)).resolves.toBe('ok');
      expect(op).toHaveBeenCalledTimes(1);
    });

    it('invokes k+1 times when the operation fails k times then succeeds', async () => {
      let calls = 0;
      const op = vi.fn(async () => {
        calls++;
        if (calls <= 2) throw transientLLMError();
        return 'done';
      });

      await expect(policy({ maxAttempts: 3 }).execute(op)).resolves.toBe('done');
      expect(op).toHaveBeenCalledTimes(3);
    });

    it('gives up after exactly maxAttempts invocations', async () => {
      const last = transientLLMError('still down');
      const op = vi.fn(async () => {
        throw last;
      });

      const err: unknown = await policy({ maxAttempts: 4 }).execute(op, 'fetch').catch((e: unknown) => e);

      expect(op).toHaveBeenCalledTimes(4);
      expect(err).toBeInstanceOf(RetriesExhaustedError);
      if (!(err instanceof RetriesExhaustedError)) return;
      expect(err.attempts).toBe(4);
      expect(err.cause).toBe(last);
      expect(err.kind).toBe('transient');
      expect(err.message).toBe('fetch: retries exhausted after 4 attempts: still down');
    });

    it('does not retry a non-retryable error', async () => {
      const permanent = new LLMError('bad request', { transient: false, status: 400 });
      const op = vi.fn(async () => {
        throw permanent;
      });

      await expect(policy({ maxAttempts: 5 }).execute(op)).rejects.toBe(permanent);
      expect(op).toHaveBeenCalledTimes(1);
    });

    it('treats plain errors as non-retryable by default', async () => {
      const op = vi.fn(async () => {
        throw new Error('boom');
      });

      await expect(policy().execute(op)).rejects.toThrow('boom');
      expect(op).toHaveBeenCalledTimes(1);
    });

    it('honours a custom retryable predicate', async () => {
      const op = vi.fn(async () => {
        throw new Error('flaky');
      });

      await expect(
        policy({ maxAttempts: 2, isRetryable: () => true }).execute(op),
      ).rejects.toBeInstanceOf(RetriesExhaustedError);
      expect(op).toHaveBeenCalledTimes(2);
    });

    it('makes a single attempt with maxAttempts = 1 and never sleeps', async () => {
      const sleep = vi.fn(async (_ms: number): Promise<void> => {});
      const op = vi.fn(async () => {
        throw transientLLMError();
      });

      await expect(policy({ maxAttempts: 1, sleep }).execute(op)).rejects.toBeInstanceOf(
        RetriesExhaustedError,
      );
      expect(op).toHaveBeenCalledTimes(1);
      expect(sleep).not.toHaveBeenCalled();
    });

    it('sleeps with exponential backoff between attempts only', async () => {
      const sleep = vi.fn(async (_ms: number): Promise<void> => {});
      const op = vi.fn(async () => {
        throw transientLLMError();
      });

      await policy({ maxAttempts: 4, sleep }).execute(op).catch(() => undefined);

      expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000, 4000]);
    });

    it('reports each retry to the observer', async () => {
      const seen: RetryAttempt[] = [];
      let calls = 0;
      const op = async (): Promise<number> => {
        calls++;
        if (calls === 1) throw transientLLMError();
        return calls;
      };

      await policy({ onRetry: (a) => seen.push(a) }).execute(op, 'step');

      expect(seen).toHaveLength(1);
      expect(seen[0]?.label).toBe('step');
      expect(seen[0]?.attempt).toBe(1);
      expect(seen[0]?.maxAttempts).toBe(3);
      expect(seen[0]?.nextDelayMs).toBe(1000);
      expect(seen[0]?.error).toBeInstanceOf(ValidatorError);
    });

    it('does not start an attempt once the signal has aborted', async () => {
      const controller = new AbortController();
      const timeout = new RunTimeoutError(50);
      controller.abort(timeout);
      const op = vi.fn(async () => 'ok');

      await expect(policy().execute(op, 'step', controller.signal)).rejects.toBe(timeout);
      expect(op).not.toHaveBeenCalled();
    });

    it('cuts the backoff short when the signal aborts', async () => {
      const controller = new AbortController();
      const timeout = new RunTimeoutError(50);
      const op = vi.fn(async () => {
        throw transientLLMError();
      });
      const hanging = policy({ sleep: () => new Promise<void>(() => undefined) });

      const pending = hanging.execute(op, 'step', controller.signal);
      await Promise.resolve();
      controller.abort(timeout);

      await expect(pending).rejects.toBe(timeout);
      expect(op).toHaveBeenCalledTimes(1);
    });

    it('stops retrying when the signal aborts during an attempt', async () => {
      const controller = new AbortController();
      const timeout = new RunTimeoutError(50);
      const op = vi.fn(async () => {
        controller.abort(timeout);
        throw transientLLMError();
      });

      await expect(policy().execute(op, 'step', controller.signal)).rejects.toBe(timeout);
      expect(op).toHaveBeenCalledTimes(1);
    });
  });

  describe('delayFor', () => {
    it('caps the delay at maxDelayMs', () => {
      const p = policy({ maxDelayMs: 3000 });

      expect(p.delayFor(1)).toBe(1000);
      expect(p.delayFor(2)).toBe(2000);
      expect(p.delayFor(3)).toBe(3000);
      expect(p.delayFor(6)).toBe(3000);
    });

    it('spreads delays around the base value when jitter is set', () => {
      const low = policy({ jitterFactor: 0.2, random: () => 0 });
      const high = policy({ jitterFactor: 0.2, random: () => 1 });

      expect(low.delayFor(1)).toBe(900);
      expect(high.delayFor(1)).toBe(1100);
    });
  });

  describe('construction', () => {
    it.each([
      [{ maxAttempts: 0 }, 'maxAttempts must be an integer >= 1, got 0'],
      [{ maxAttempts: 1.5 }, 'maxAttempts must be an integer >= 1, got 1.5'],
      [{ initialDelayMs: 0 }, 'initialDelayMs must be > 0, got 0'],
      [{ exponentialBase: 1 }, 'exponentialBase must be > 1, got 1'],
      [{ jitterFactor: 2 }, 'jitterFactor must be between 0 and 1, got 2'],
    ])('rejects %o', (overrides, message) => {
      expect(() => policy(overrides)).toThrow(ConfigurationError);
      expect(() => policy(overrides)).toThrow(message);
    });

    it('builds from config with a per-agent override', () => {
      const p = RetryPolicy.fromConfig(
        {
          maxAttempts: 3,
          initialDelayMs: 1000,
          exponentialBase: 2,
          maxDelayMs: 30000,
          jitterFactor: 0,
        },
        { maxAttempts: 5 },
      );

      expect(p.maxAttempts).toBe(5);
      expect(p.initialDelayMs).toBe(1000);
      expect(p.maxDelayMs).toBe(30000);
    });
  });
});
