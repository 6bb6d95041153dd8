import type { RetryConfig, RetryOverride } from '../schema/config.js';
import { RETRY } from '../config/defaults.js';
import * as log from '../utils/logger.js';
import {
  ConfigurationError,
  RetriesExhaustedError,
  abortReason,
  describeError,
  isTransientError,
} from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface RetryAttempt {
  label: string;
  attempt: number;
  maxAttempts: number;
  error: unknown;
  nextDelayMs: number;
}

export interface RetryPolicyOptions {
  maxAttempts: number;
  initialDelayMs: number;
  exponentialBase: number;
  maxDelayMs?: number | undefined;
  /** 0 disables jitter; 0.2 spreads each delay by ±10%. */
  jitterFactor?: number | undefined;
  isRetryable?: ((err: unknown) => boolean) | undefined;
  sleep?: ((ms: number) => Promise<void>) | undefined;
  random?: (() => number) | undefined;
  onRetry?: ((attempt: RetryAttempt) => void) | undefined;
}

// ── Policy ───────────────────────────────────────────────────

/**
 * Bounded exponential-backoff retry, as a value applied around an
 * operation. Only errors accepted by `isRetryable` are retried; anything
 * else propagates after the first failure.
 */
export class RetryPolicy {
  readonly maxAttempts: number;
  readonly initialDelayMs: number;
  readonly exponentialBase: number;
  readonly maxDelayMs: number;
  readonly jitterFactor: number;

  private readonly isRetryable: (err: unknown) => boolean;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly random: () => number;
  private readonly onRetry: ((attempt: RetryAttempt) => void) | undefined;

  constructor(options: RetryPolicyOptions) {
    if (!Number.isInteger(options.maxAttempts) || options.maxAttempts < 1) {
      throw new ConfigurationError(
        `maxAttempts must be an integer >= 1, got ${String(options.maxAttempts)}`,
      );
    }
    if (!(options.initialDelayMs > 0)) {
      throw new ConfigurationError(
        `initialDelayMs must be > 0, got ${String(options.initialDelayMs)}`,
      );
    }
    if (!(options.exponentialBase > 1)) {
      throw new ConfigurationError(
        `exponentialBase must be > 1, got ${String(options.exponentialBase)}`,
      );
    }

    const jitter = options.jitterFactor ?? 0;
    if (jitter < 0 || jitter > 1) {
      throw new ConfigurationError(
        `jitterFactor must be between 0 and 1, got ${String(jitter)}`,
      );
    }

    this.maxAttempts = options.maxAttempts;
    this.initialDelayMs = options.initialDelayMs;
    this.exponentialBase = options.exponentialBase;
    this.maxDelayMs = options.maxDelayMs ?? Number.POSITIVE_INFINITY;
    this.jitterFactor = jitter;
    this.isRetryable = options.isRetryable ?? isTransientError;
    this.sleep = options.sleep ?? delay;
    this.random = options.random ?? Math.random;
    this.onRetry = options.onRetry;
  }

  /** Build a policy from validated config, with an optional per-agent override. */
  static fromConfig(
    config: RetryConfig,
    override?: RetryOverride,
    hooks?: Pick<RetryPolicyOptions, 'isRetryable' | 'sleep' | 'random' | 'onRetry'>,
  ): RetryPolicy {
    return new RetryPolicy({
      maxAttempts: override?.maxAttempts ?? config.maxAttempts,
      initialDelayMs: override?.initialDelayMs ?? config.initialDelayMs,
      exponentialBase: override?.exponentialBase ?? config.exponentialBase,
      maxDelayMs: override?.maxDelayMs ?? config.maxDelayMs,
      jitterFactor: override?.jitterFactor ?? config.jitterFactor,
      ...hooks,
    });
  }

  static defaults(): RetryPolicy {
    return new RetryPolicy({
      maxAttempts: RETRY.MAX_ATTEMPTS,
      initialDelayMs: RETRY.INITIAL_DELAY_MS,
      exponentialBase: RETRY.EXPONENTIAL_BASE,
      maxDelayMs: RETRY.MAX_DELAY_MS,
      jitterFactor: RETRY.JITTER_FACTOR,
    });
  }

  /**
   * Delay before the retry that follows failed attempt `attempt` (1-based):
   * `initialDelayMs * exponentialBase^(attempt-1)`, capped, then jittered.
   */
  delayFor(attempt: number): number {
    const base = this.initialDelayMs * Math.pow(this.exponentialBase, attempt - 1);
    const capped = Math.min(base, this.maxDelayMs);
    if (this.jitterFactor === 0) return capped;

    const spread = capped * this.jitterFactor;
    return Math.max(0, Math.round(capped - spread / 2 + this.random() * spread));
  }

  /**
   * Run `operation` until it succeeds or the budget is spent. Once `signal`
   * aborts, no further attempt starts and a pending backoff ends at once
   * with the abort reason.
   */
  async execute<T>(
    operation: () => Promise<T>,
    label = 'operation',
    signal?: AbortSignal,
  ): Promise<T> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= this.maxAttempts; attempt++) {
      if (signal?.aborted) throw abortReason(signal);

      try {
        return await operation();
      } catch (err) {
        lastError = err;

        if (signal?.aborted) throw abortReason(signal);
        if (!this.isRetryable(err)) throw err;
        if (attempt === this.maxAttempts) break;

        const nextDelayMs = this.delayFor(attempt);
        log.retry(
          `${label}: attempt ${String(attempt)}/${String(this.maxAttempts)} failed (${describeError(err)}). Retrying in ${(nextDelayMs / 1000).toFixed(2)}s...`,
        );
        this.onRetry?.({
          label,
          attempt,
          maxAttempts: this.maxAttempts,
          error: err,
          nextDelayMs,
        });
        await this.backoff(nextDelayMs, signal);
      }
    }

    log.error(`${label}: failed after ${String(this.maxAttempts)} attempts`);
    throw new RetriesExhaustedError(label, this.maxAttempts, lastError);
  }

  private async backoff(ms: number, signal: AbortSignal | undefined): Promise<void> {
    if (!signal) return this.sleep(ms);

    let onAbort: (() => void) | undefined;
    const aborted = new Promise<never>((_, reject) => {
      onAbort = () => reject(abortReason(signal));
      signal.addEventListener('abort', onAbort, { once: true });
    });

    try {
      await Promise.race([this.sleep(ms), aborted]);
    } finally {
      if (onAbort) signal.removeEventListener('abort', onAbort);
    }
  }
}

// ── Helpers ──────────────────────────────────────────────────

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
