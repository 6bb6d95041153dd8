import type { Report, RunResult } from '../core/results.js';
import type { Finding } from '../schema/index.js';
import { JSON_OUTPUT_VERSION } from '../schema/jsonOutput.js';
import type {
  JsonOutput,
  JsonOutputError,
  JsonOutputRun,
} from '../schema/jsonOutput.js';

// Re-export contract types for consumers
export type { JsonOutput, JsonOutputError, JsonOutputRun };

export interface RenderOptions {
  /** Stamp the output with its generation time. */
  timestamp: boolean;
  now?: Date | undefined;
}

// ── JSON generator ───────────────────────────────────────────

export function generateJSON(report: Report, options: RenderOptions): JsonOutput {
  const output: JsonOutput = {
    version: JSON_OUTPUT_VERSION,
    runId: report.runId,
    mode: report.mode,
    startedAt: report.startedAt,
    finishedAt: report.finishedAt,
    durationMs: report.durationMs,
    summary: {
      ...report.summary,
      findingsByAgent: { ...report.summary.findingsByAgent },
    },
    results: report.results.map(runToJSON),
  };
  if (options.timestamp) {
    output.generatedAt = (options.now ?? new Date()).toISOString();
  }
  return output;
}

function runToJSON(result: RunResult): JsonOutputRun {
  const report = result.state?.report;
  return {
    index: result.index,
    agent: result.agent,
    url: result.url,
    status: result.status,
    durationMs: result.durationMs,
    passed: result.status === 'SUCCEEDED' && (report?.passed ?? false),
    report: report?.text ?? null,
    findings: (report?.findings ?? []).map(findingToJSON),
    error: errorToJSON(result),
  };
}

/** Agent-specific fields pass through; embedded images do not. */
function findingToJSON(finding: Finding): JsonOutputRun['findings'][number] {
  const extra: Record<string, unknown> = {};
  for (const [key, value] of Object.entries(finding)) {
    if (key === 'screenshot' || value === undefined) continue;
    extra[key] = value;
  }
  return {
    ...extra,
    category: finding.category,
    severity: finding.severity,
    description: finding.description,
    ...(finding.location !== undefined ? { location: finding.location } : {}),
  };
}

function errorToJSON(result: RunResult): JsonOutputError | null {
  if (!result.error) return null;
  return {
    kind: result.error.kind,
    message: result.error.message,
    step: result.error.step ?? null,
    attempts: result.error.attempts ?? null,
  };
}

// ── Deterministic serialization ─────────────────────────────
// Keys are sorted lexicographically for stable, diffable output.

export function serializeJSON(output: JsonOutput): string {
  return JSON.stringify(output, sortedReplacer, 2);
}

function sortedReplacer(_key: string, value: unknown): unknown {
  if (!isPlainRecord(value)) return value;

  const sorted: Record<string, unknown> = {};
  for (const k of Object.keys(value).sort()) {
    sorted[k] = value[k];
  }
  return sorted;
}

function isPlainRecord(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

// ── Markdown generator ───────────────────────────────────────

export function generateMarkdown(report: Report, options: RenderOptions): string {
  const lines: string[] = [];
  const { summary } = report;

  // Header + metadata
  lines.push(`# Page Validation Report`);
  lines.push('');
  lines.push(`| Field | Value |`);
  lines.push(`|-------|-------|`);
  lines.push(`| **Run ID** | \`${report.runId}\` |`);
  lines.push(`| **Mode** | ${report.mode} |`);
  lines.push(`| **Started** | ${report.startedAt} |`);
  lines.push(`| **Finished** | ${report.finishedAt} |`);
  lines.push(`| **Duration** | ${formatDuration(report.durationMs)} |`);
  if (options.timestamp) {
    lines.push(`| **Generated** | ${(options.now ?? new Date()).toISOString()} |`);
  }
  lines.push(
    `| **Runs** | ${String(summary.succeeded)}/${String(summary.total)} succeeded |`,
  );
  lines.push(`| **Findings** | ${String(summary.totalFindings)} |`);
  lines.push('');

  // Run summary table
  lines.push(`## Runs`);
  lines.push('');
  lines.push(`| # | Agent | URL | Status | Findings | Duration |`);
  lines.push(`|---|-------|-----|--------|----------|----------|`);

  for (const r of report.results) {
    lines.push(
      `| ${String(r.index + 1)} | ${r.agent} | ${escapeMarkdownCell(r.url)} | ${statusIcon(r)} | ${String(r.findings)} | ${formatDuration(r.durationMs)} |`,
    );
  }

  lines.push('');

  // Per-run details
  lines.push(`## Details`);
  lines.push('');

  for (const r of report.results) {
    lines.push(`### ${String(r.index + 1)}. ${r.agent} on ${escapeMarkdownCell(r.url)}`);
    lines.push('');

    if (r.error) {
      const where = r.error.step ? ` in step \`${r.error.step}\`` : '';
      lines.push(`**Error** (${r.error.kind}${where}): ${r.error.message}`);
      lines.push('');
      continue;
    }

    const agentReport = r.state?.report;
    if (!agentReport) continue;

    lines.push(`**${agentReport.headline}**`);
    lines.push('');

    if (agentReport.findings.length > 0) {
      lines.push(`| Severity | Category | Description | Location |`);
      lines.push(`|----------|----------|-------------|----------|`);
      for (const f of agentReport.findings) {
        lines.push(
          `| ${f.severity.toUpperCase()} | ${escapeMarkdownCell(f.category)} | ${escapeMarkdownCell(f.description)} | ${escapeMarkdownCell(f.location ?? '')} |`,
        );
      }
      lines.push('');
    }
  }

  return lines.join('\n');
}

// ── Helpers ──────────────────────────────────────────────────

function statusIcon(result: RunResult): string {
  if (result.status === 'FAILED') return '[FAILED]';
  return result.findings > 0 ? '[ISSUES]' : '[PASS]';
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${String(ms)}ms`;
  const seconds = (ms / 1000).toFixed(1);
  return `${seconds}s`;
}

function escapeMarkdownCell(text: string): string {
  return text.replace(/\|/g, '\\|').replace(/\n/g, ' ');
}
