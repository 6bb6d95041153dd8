import { describe, it, expect, vi } from 'vitest';

import { Pipeline } from '../pipeline.js';
import type { ValidationStep } from '../pipeline.js';
import {
  ConfigurationError,
  RetriesExhaustedError,
  RunTimeoutError,
  StepFailedError,
} from '../errors.js';
import { instantRetry, transientLLMError } from '../../__tests__/fakes.js';

interface CounterState {
  url: string;
  trail: string[];
  total: number;
}

const CONTEXT = { agent: 'counter', url: 'https://example.com' };

function initial(): CounterState {
  return { url: 'https://example.com', trail: [], total: 0 };
}

function addStep(name: string, amount: number): ValidationStep<CounterState> {
  return {
    name,
    async run(state) {
      return { trail: [...state.trail, name], total: state.total + amount };
    },
  };
}

describe('Pipeline', () => {
  it('runs steps in order and merges each update', async () => {
    const pipeline = new Pipeline([addStep('a', 1), addStep('b', 10), addStep('c', 100)]);

    const final = await pipeline.run(initial(), CONTEXT);

    expect(final.trail).toEqual(['a', 'b', 'c']);
    expect(final.total).toBe(111);
    expect(pipeline.stepNames).toEqual(['a', 'b', 'c']);
  });

  it('does not mutate the initial state', async () => {
    const start = initial();
    await new Pipeline([addStep('a', 1)]).run(start, CONTEXT);

    expect(start).toEqual({ url: 'https://example.com', trail: [], total: 0 });
  });

  it('hands each step a snapshot it cannot use to affect the live state', async () => {
    const seen: number[] = [];
    const mutating: ValidationStep<CounterState> = {
      name: 'mutate',
      async run(state) {
        seen.push(state.total);
        Reflect.set(state, 'total', 999);
        return {};
      },
    };

    const final = await new Pipeline([addStep('a', 1), mutating, addStep('b', 1)]).run(
      initial(),
      CONTEXT,
    );

    expect(seen).toEqual([1]);
    expect(final.total).toBe(2);
  });

  it('halts at a failing step and never runs the ones after it', async () => {
    const third = vi.fn(async () => ({}));
    const failing: ValidationStep<CounterState> = {
      name: 'analyze',
      retry: instantRetry(3),
      run: vi.fn(async () => {
        throw transientLLMError('model unavailable');
      }),
    };

    const err: unknown = await new Pipeline([
      addStep('scrape', 1),
      failing,
      { name: 'report', run: third },
    ])
      .run(initial(), CONTEXT)
      .catch((e: unknown) => e);

    expect(third).not.toHaveBeenCalled();
    expect(failing.run).toHaveBeenCalledTimes(3);
    expect(err).toBeInstanceOf(StepFailedError);
    if (!(err instanceof StepFailedError)) return;
    expect(err.step).toBe('analyze');
    expect(err.stepIndex).toBe(1);
    expect(err.kind).toBe('transient');
    expect(err.cause).toBeInstanceOf(RetriesExhaustedError);
  });

  it('runs a step without a policy exactly once', async () => {
    const run = vi.fn(async () => {
      throw transientLLMError();
    });

    await expect(
      new Pipeline<CounterState>([{ name: 'once', run }]).run(initial(), CONTEXT),
    ).rejects.toBeInstanceOf(StepFailedError);
    expect(run).toHaveBeenCalledTimes(1);
  });

  it('stops before the next step once the signal is aborted', async () => {
    const controller = new AbortController();
    const second = vi.fn(async () => ({}));
    const aborting: ValidationStep<CounterState> = {
      name: 'first',
      async run() {
        controller.abort(new RunTimeoutError(50));
        return {};
      },
    };

    await expect(
      new Pipeline<CounterState>([aborting, { name: 'second', run: second }]).run(initial(), {
        ...CONTEXT,
        signal: controller.signal,
      }),
    ).rejects.toBeInstanceOf(RunTimeoutError);
    expect(second).not.toHaveBeenCalled();
  });

  it('rejects an empty step list', () => {
    expect(() => new Pipeline<CounterState>([])).toThrow(ConfigurationError);
  });

  it('rejects duplicate step names', () => {
    expect(() => new Pipeline([addStep('a', 1), addStep('a', 2)])).toThrow(
      'Duplicate step name "a"',
    );
  });
});
