import * as log from '../utils/logger.js';
import type { RetryPolicy } from './retry.js';
import { ConfigurationError, StepFailedError, abortReason } from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface StepContext {
  /** Agent running this step, for log lines. */
  agent: string;
  url: string;
  stepIndex: number;
  /** Raised when the run's deadline expires. */
  signal?: AbortSignal | undefined;
}

/**
 * One stage of an agent's workflow. Receives a snapshot of the current
 * state and returns the fields it changes. Any side effect (browser,
 * model call) happens inside `run` and nowhere else.
 */
export interface ValidationStep<S extends object> {
  readonly name: string;
  /** Network-bound steps carry a policy; pure steps leave it out. */
  readonly retry?: RetryPolicy | undefined;
  run(state: Readonly<S>, context: StepContext): Promise<Partial<S>>;
}

export interface PipelineContext {
  agent: string;
  url: string;
  signal?: AbortSignal | undefined;
}

// ── Pipeline ─────────────────────────────────────────────────

/**
 * Ordered, linear list of steps. Step i+1 starts only after step i has
 * returned; the first failure halts the run and nothing after it executes.
 */
export class Pipeline<S extends object> {
  readonly steps: readonly ValidationStep<S>[];

  constructor(steps: readonly ValidationStep<S>[]) {
    if (steps.length === 0) {
      throw new ConfigurationError('A pipeline needs at least one step');
    }

    const seen = new Set<string>();
    for (const step of steps) {
      if (seen.has(step.name)) {
        throw new ConfigurationError(`Duplicate step name "${step.name}"`);
      }
      seen.add(step.name);
    }

    this.steps = Object.freeze([...steps]);
  }

  get stepNames(): string[] {
    return this.steps.map((s) => s.name);
  }

  async run(initial: S, context: PipelineContext): Promise<S> {
    let state: S = { ...initial };

    for (const [index, step] of this.steps.entries()) {
      if (context.signal?.aborted) {
        throw abortReason(context.signal);
      }

      const snapshot: Readonly<S> = { ...state };
      const stepContext: StepContext = {
        agent: context.agent,
        url: context.url,
        stepIndex: index,
        signal: context.signal,
      };

      log.debug(
        `${context.agent} [${String(index + 1)}/${String(this.steps.length)}] ${step.name}`,
      );

      let update: Partial<S>;
      try {
        update = step.retry
          ? await step.retry.execute(
              () => step.run(snapshot, stepContext),
              `${context.agent}.${step.name}`,
              context.signal,
            )
          : await step.run(snapshot, stepContext);
      } catch (err) {
        throw new StepFailedError(step.name, index, err);
      }

      state = { ...state, ...update };
    }

    return state;
  }
}
