import type { Report } from '../core/results.js';
import type { RenderOptions } from './reporter.js';

const RULE = '='.repeat(80);

/** Plain-text report: one block per run, in submission order. */
export function generateText(report: Report, options: RenderOptions): string {
  const lines: string[] = [];

  if (options.timestamp) {
    lines.push(`Report generated: ${(options.now ?? new Date()).toISOString()}`);
    lines.push(RULE);
    lines.push('');
  }

  for (const r of report.results) {
    lines.push(`Agent: ${r.agent}`);
    lines.push(`URL: ${r.url}`);
    lines.push(`Status: ${r.status === 'SUCCEEDED' ? '✓ SUCCEEDED' : '✗ FAILED'}`);

    if (r.error) {
      const where = r.error.step ? ` [step: ${r.error.step}]` : '';
      lines.push(`Error (${r.error.kind})${where}: ${r.error.message}`);
    } else {
      lines.push('');
      lines.push(r.state?.report?.text ?? 'No report available');
    }

    lines.push('');
    lines.push(RULE);
    lines.push('');
  }

  const { summary } = report;
  lines.push(
    `Summary: ${String(summary.total)} run(s), ${String(summary.succeeded)} succeeded, ${String(summary.failed)} failed, ${String(summary.totalFindings)} finding(s)`,
  );

  return lines.join('\n');
}
