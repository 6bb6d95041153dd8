import { randomUUID } from 'node:crypto';

import type { Target } from '../schema/index.js';
import type { ConcurrencyMode } from '../schema/config.js';
import { CONCURRENCY } from '../config/defaults.js';
import { validateUrl } from '../utils/validation.js';
import * as log from '../utils/logger.js';
import type { AdmittedTarget, BaseState, RegisteredAgent } from './agent.js';
import type { AgentRegistry } from './registry.js';
import type { Report, RunPhase, RunResult } from './results.js';
import { countFindings, summarizeResults } from './results.js';
import {
  ConfigurationError,
  RunTimeoutError,
  describeError,
  toRunError,
} from './errors.js';

// ── Public types ─────────────────────────────────────────────

export interface RunEvent {
  index: number;
  agent: string;
  url: string;
  phase: RunPhase;
}

export interface OrchestratorOptions {
  mode?: ConcurrencyMode | undefined;
  /** Upper bound on in-flight runs in parallel mode. */
  maxParallel?: number | undefined;
  /** Deadline for one whole (target, agent) run, retries included. */
  runTimeoutMs?: number | undefined;
  onRunEvent?: ((event: RunEvent) => void) | undefined;
}

// ── Internal types ───────────────────────────────────────────

type PlannedRun =
  | {
      ok: true;
      index: number;
      agentName: string;
      target: AdmittedTarget;
      agent: RegisteredAgent;
    }
  | {
      ok: false;
      index: number;
      agentName: string;
      url: string;
      error: unknown;
    };

// ── Orchestrator ─────────────────────────────────────────────

/**
 * Runs every (target, agent) pair and aggregates one RunResult per pair
 * into a Report, in submission order. Never retries a pair itself and
 * never throws for a bad pair: admission errors and run failures both
 * end up as FAILED results.
 */
export class Orchestrator {
  private readonly registry: AgentRegistry;
  private readonly mode: ConcurrencyMode;
  private readonly maxParallel: number;
  private readonly runTimeoutMs: number | undefined;
  private readonly onRunEvent: ((event: RunEvent) => void) | undefined;

  constructor(registry: AgentRegistry, options: OrchestratorOptions = {}) {
    const maxParallel = options.maxParallel ?? CONCURRENCY.MAX_PARALLEL;
    if (!Number.isInteger(maxParallel) || maxParallel < 1) {
      throw new ConfigurationError(
        `maxParallel must be a positive integer, got ${String(maxParallel)}`,
      );
    }
    if (options.runTimeoutMs !== undefined && !(options.runTimeoutMs > 0)) {
      throw new ConfigurationError(
        `runTimeoutMs must be > 0, got ${String(options.runTimeoutMs)}`,
      );
    }

    this.registry = registry;
    this.mode = options.mode ?? 'sequential';
    this.maxParallel = maxParallel;
    this.runTimeoutMs = options.runTimeoutMs;
    this.onRunEvent = options.onRunEvent;
  }

  async run(targets: readonly Target[]): Promise<Report> {
    const runId = randomUUID();
    const startedAt = new Date();

    const planned = this.admit(targets);
    const results = new Array<RunResult>(planned.length);
    const admitted: Extract<PlannedRun, { ok: true }>[] = [];

    for (const run of planned) {
      this.emit(run.index, run.agentName, urlOf(run), 'PENDING');
      if (run.ok) {
        admitted.push(run);
      } else {
        results[run.index] = this.rejectAtAdmission(run);
      }
    }

    const limit = this.mode === 'parallel' ? this.maxParallel : 1;
    log.info(
      `Running ${String(admitted.length)} validation(s) ${this.mode === 'parallel' ? `in parallel (max ${String(limit)})` : 'sequentially'}`,
    );

    await runWithConcurrency(admitted, limit, async (run) => {
      results[run.index] = await this.execute(run);
    });

    const finishedAt = new Date();

    const report: Report = {
      runId,
      mode: this.mode,
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs: finishedAt.getTime() - startedAt.getTime(),
      results: Object.freeze(results),
      summary: summarizeResults(results),
    };
    return Object.freeze(report);
  }

  // ── Admission ──────────────────────────────────────────────

  private admit(targets: readonly Target[]): PlannedRun[] {
    const planned: PlannedRun[] = [];

    for (const target of targets) {
      if (target.agents.length === 0) {
        log.warn(`Target ${target.url} has no agents selected; nothing to run`);
        continue;
      }

      let url: string | undefined;
      let urlError: unknown;
      try {
        url = validateUrl(target.url);
      } catch (err) {
        urlError = err;
      }

      for (const agentName of target.agents) {
        const index = planned.length;

        if (url === undefined) {
          planned.push({ ok: false, index, agentName, url: target.url, error: urlError });
          continue;
        }

        try {
          const agent = this.registry.get(agentName);
          planned.push({
            ok: true,
            index,
            agentName,
            agent,
            target: Object.freeze({ ...target, url }),
          });
        } catch (err) {
          planned.push({ ok: false, index, agentName, url, error: err });
        }
      }
    }

    return planned;
  }

  private rejectAtAdmission(run: Extract<PlannedRun, { ok: false }>): RunResult {
    const at = new Date().toISOString();
    log.warn(`${run.agentName} on ${run.url} rejected: ${describeError(run.error)}`);
    this.emit(run.index, run.agentName, run.url, 'FAILED');

    const result: RunResult = {
      index: run.index,
      url: run.url,
      agent: run.agentName,
      status: 'FAILED',
      state: null,
      error: toRunError(run.error),
      findings: 0,
      startedAt: at,
      finishedAt: at,
      durationMs: 0,
    };
    return Object.freeze(result);
  }

  // ── Execution ──────────────────────────────────────────────

  private async execute(run: Extract<PlannedRun, { ok: true }>): Promise<RunResult> {
    const { agent, target, index } = run;
    const startedAt = new Date();

    this.emit(index, agent.name, target.url, 'RUNNING');
    log.agent(agent.name, target.url);

    let state: BaseState | null = null;
    let failure: unknown;
    let failed = false;

    try {
      state = await this.withDeadline((signal) => agent.run(target, { signal }));
    } catch (err) {
      failed = true;
      failure = err;
    }

    const finishedAt = new Date();
    const durationMs = finishedAt.getTime() - startedAt.getTime();

    log.runResult(!failed, agent.name, target.url, durationMs);
    if (failed) log.detail(describeError(failure));
    this.emit(index, agent.name, target.url, failed ? 'FAILED' : 'SUCCEEDED');

    const result: RunResult = {
      index,
      url: target.url,
      agent: agent.name,
      status: failed ? 'FAILED' : 'SUCCEEDED',
      state: failed ? null : state,
      error: failed ? toRunError(failure) : null,
      findings: failed ? 0 : countFindings(state),
      startedAt: startedAt.toISOString(),
      finishedAt: finishedAt.toISOString(),
      durationMs,
    };
    return Object.freeze(result);
  }

  /**
   * Race the run against its deadline. On expiry the abort signal stops
   * the pipeline at its next step boundary and the run is failed.
   */
  private async withDeadline<T>(
    fn: (signal: AbortSignal | undefined) => Promise<T>,
  ): Promise<T> {
    const timeoutMs = this.runTimeoutMs;
    if (timeoutMs === undefined) return fn(undefined);

    const controller = new AbortController();
    let timer: ReturnType<typeof setTimeout> | undefined;

    const deadline = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        const reason = new RunTimeoutError(timeoutMs);
        controller.abort(reason);
        reject(reason);
      }, timeoutMs);
    });

    try {
      return await Promise.race([fn(controller.signal), deadline]);
    } finally {
      clearTimeout(timer);
    }
  }

  private emit(index: number, agent: string, url: string, phase: RunPhase): void {
    this.onRunEvent?.({ index, agent, url, phase });
  }
}

// ── Helpers ──────────────────────────────────────────────────

function urlOf(run: PlannedRun): string {
  return run.ok ? run.target.url : run.url;
}

/**
 * Bounded worker pool: `limit` workers each pull the next item until the
 * queue is drained. A limit of 1 runs items strictly in order.
 */
async function runWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<void>,
): Promise<void> {
  if (limit <= 1) {
    for (const item of items) {
      await worker(item);
    }
    return;
  }

  let nextIndex = 0;
  const workers = Array.from({ length: Math.min(limit, items.length) }, async () => {
    while (nextIndex < items.length) {
      const item = items[nextIndex++];
      if (item === undefined) break;
      await worker(item);
    }
  });

  await Promise.all(workers);
}
