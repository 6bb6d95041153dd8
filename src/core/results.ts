import type { ConcurrencyMode } from '../schema/config.js';
import type { BaseState } from './agent.js';
import type { RunError } from './errors.js';

// ── Run lifecycle ────────────────────────────────────────────

export type RunPhase = 'PENDING' | 'RUNNING' | 'SUCCEEDED' | 'FAILED';

export type RunStatus = Extract<RunPhase, 'SUCCEEDED' | 'FAILED'>;

export interface RunResult {
  /** Position in submission order. */
  readonly index: number;
  readonly url: string;
  readonly agent: string;
  readonly status: RunStatus;
  readonly state: Readonly<BaseState> | null;
  readonly error: RunError | null;
  readonly findings: number;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly durationMs: number;
}

// ── Report ───────────────────────────────────────────────────

export interface ReportSummary {
  readonly total: number;
  readonly succeeded: number;
  readonly failed: number;
  readonly totalFindings: number;
  readonly findingsByAgent: Readonly<Record<string, number>>;
}

export interface Report {
  readonly runId: string;
  readonly mode: ConcurrencyMode;
  readonly startedAt: string;
  readonly finishedAt: string;
  readonly durationMs: number;
  readonly results: readonly RunResult[];
  readonly summary: ReportSummary;
}

// ── Aggregation ──────────────────────────────────────────────

export function summarizeResults(results: readonly RunResult[]): ReportSummary {
  let succeeded = 0;
  let totalFindings = 0;
  const findingsByAgent: Record<string, number> = {};

  for (const r of results) {
    if (r.status === 'SUCCEEDED') succeeded++;
    totalFindings += r.findings;
    findingsByAgent[r.agent] = (findingsByAgent[r.agent] ?? 0) + r.findings;
  }

  return Object.freeze({
    total: results.length,
    succeeded,
    failed: results.length - succeeded,
    totalFindings,
    findingsByAgent: Object.freeze(findingsByAgent),
  });
}

export function countFindings(state: Readonly<BaseState> | null): number {
  return state?.report?.findings.length ?? 0;
}

/** True when every run succeeded and nothing was found. */
export function isCleanReport(report: Report): boolean {
  return report.summary.failed === 0 && report.summary.totalFindings === 0;
}
