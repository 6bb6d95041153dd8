// ── Error taxonomy ───────────────────────────────────────────

/**
 * How an error should be treated by the retry layer and reported.
 *
 * - `configuration`: bad input detected before a run starts
 * - `transient`: recoverable collaborator fault (timeout, rate limit)
 * - `permanent`: non-recoverable collaborator fault
 * - `parse`: model output that does not match the expected shape
 * - `timeout`: a run exceeded its deadline
 */
export type ErrorKind =
  | 'configuration'
  | 'transient'
  | 'permanent'
  | 'parse'
  | 'timeout';

export class ValidatorError extends Error {
  readonly kind: ErrorKind;
  readonly exitCode: number = 1;

  constructor(kind: ErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ValidatorError';
    this.kind = kind;
  }
}

// ── Configuration ────────────────────────────────────────────

export class ConfigurationError extends ValidatorError {
  override readonly exitCode = 4;

  constructor(message: string, options?: { cause?: unknown }) {
    super('configuration', message, options);
    this.name = 'ConfigurationError';
  }
}

export class UnknownAgentError extends ConfigurationError {
  readonly agentName: string;

  constructor(agentName: string, known: readonly string[]) {
    const list = known.length > 0 ? known.join(', ') : '(none)';
    super(`Unknown agent "${agentName}" (registered: ${list})`);
    this.name = 'UnknownAgentError';
    this.agentName = agentName;
  }
}

// ── Collaborator faults ──────────────────────────────────────

export class BrowserError extends ValidatorError {
  constructor(
    message: string,
    options: { transient: boolean; cause?: unknown },
  ) {
    super(options.transient ? 'transient' : 'permanent', message, options);
    this.name = 'BrowserError';
  }
}

export class LLMError extends ValidatorError {
  readonly status: number | undefined;

  constructor(
    message: string,
    options: { transient: boolean; status?: number | undefined; cause?: unknown },
  ) {
    super(options.transient ? 'transient' : 'permanent', message, options);
    this.name = 'LLMError';
    this.status = options.status;
  }
}

export class ResponseParseError extends ValidatorError {
  readonly raw: string;

  constructor(message: string, raw: string) {
    super('parse', message);
    this.name = 'ResponseParseError';
    this.raw = raw;
  }
}

// ── Retry / pipeline / orchestration ─────────────────────────

export class RetriesExhaustedError extends ValidatorError {
  readonly attempts: number;

  constructor(label: string, attempts: number, lastError: unknown) {
    super(
      kindOf(lastError) ?? 'transient',
      `${label}: retries exhausted after ${String(attempts)} attempt${attempts === 1 ? '' : 's'}: ${describeError(lastError)}`,
      { cause: lastError },
    );
    this.name = 'RetriesExhaustedError';
    this.attempts = attempts;
  }
}

export class StepFailedError extends ValidatorError {
  readonly step: string;
  readonly stepIndex: number;

  constructor(step: string, stepIndex: number, cause: unknown) {
    super(
      kindOf(cause) ?? 'permanent',
      `Step "${step}" failed: ${describeError(cause)}`,
      { cause },
    );
    this.name = 'StepFailedError';
    this.step = step;
    this.stepIndex = stepIndex;
  }
}

export class RunTimeoutError extends ValidatorError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super('timeout', `Run exceeded its ${String(timeoutMs)}ms deadline`);
    this.name = 'RunTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

// ── Helpers ──────────────────────────────────────────────────

export function isTransientError(err: unknown): boolean {
  return err instanceof ValidatorError && err.kind === 'transient';
}

/** The error an aborted signal carries, or a generic timeout. */
export function abortReason(signal: AbortSignal): Error {
  const reason: unknown = signal.reason;
  return reason instanceof Error
    ? reason
    : new ValidatorError('timeout', 'Run aborted before completion');
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function kindOf(err: unknown): ErrorKind | undefined {
  return err instanceof ValidatorError ? err.kind : undefined;
}

/** Serializable error record attached to a failed run. */
export interface RunError {
  kind: ErrorKind;
  message: string;
  step?: string | undefined;
  attempts?: number | undefined;
}

export function toRunError(err: unknown): RunError {
  const record: RunError = {
    kind: kindOf(err) ?? 'permanent',
    message: describeError(err),
  };

  if (err instanceof StepFailedError) {
    record.step = err.step;
    if (err.cause instanceof RetriesExhaustedError) {
      record.attempts = err.cause.attempts;
    }
  } else if (err instanceof RetriesExhaustedError) {
    record.attempts = err.attempts;
  }

  return record;
}
