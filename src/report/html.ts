import type { Report, RunResult } from '../core/results.js';
import type { Finding } from '../schema/index.js';
import type { RenderOptions } from './reporter.js';
import { formatDuration } from './reporter.js';

// ── Styles ───────────────────────────────────────────────────

const STYLES = `
  body { font-family: -apple-system, BlinkMacSystemFont, 'Segoe UI', Roboto, sans-serif; line-height: 1.6; max-width: 1200px; margin: 0 auto; padding: 20px; background: #f5f5f5; }
  .header { background: #312e81; color: white; padding: 30px; border-radius: 10px; margin-bottom: 30px; }
  .summary { display: grid; grid-template-columns: repeat(auto-fit, minmax(200px, 1fr)); gap: 20px; margin-bottom: 30px; }
  .summary-card, .result-card { background: white; padding: 20px; border-radius: 8px; box-shadow: 0 2px 4px rgba(0,0,0,0.1); }
  .summary-card h3 { margin: 0 0 10px 0; color: #666; font-size: 14px; text-transform: uppercase; }
  .summary-card .value { font-size: 32px; font-weight: bold; color: #333; }
  .result-card { margin-bottom: 20px; }
  .status-pass { color: #16a34a; font-weight: bold; }
  .status-fail { color: #dc2626; font-weight: bold; }
  .severity-critical { color: #dc2626; font-weight: bold; }
  .severity-high { color: #ea580c; }
  .severity-medium { color: #d97706; }
  .severity-low { color: #65a30d; }
  .finding { padding: 12px 15px; background: #f9fafb; border-left: 4px solid #6366f1; margin: 10px 0; border-radius: 4px; }
  .finding img { display: block; max-width: 100%; margin-top: 8px; border: 1px solid #e5e7eb; }
  .error { padding: 12px 15px; background: #fef2f2; border-left: 4px solid #ef4444; margin: 10px 0; border-radius: 4px; }
`;

// ── Generator ────────────────────────────────────────────────

export function generateHTML(report: Report, options: RenderOptions): string {
  const { summary } = report;
  const generated = options.timestamp
    ? `<p>Generated: ${escapeHtml((options.now ?? new Date()).toISOString())}</p>`
    : '';

  return [
    '<!DOCTYPE html>',
    '<html lang="en">',
    '<head>',
    '<meta charset="UTF-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1.0">',
    '<title>Page Validation Report</title>',
    `<style>${STYLES}</style>`,
    '</head>',
    '<body>',
    `<div class="header"><h1>Page Validation Report</h1>${generated}</div>`,
    '<div class="summary">',
    summaryCard('Total Runs', summary.total),
    summaryCard('Succeeded', summary.succeeded),
    summaryCard('Failed', summary.failed),
    summaryCard('Findings', summary.totalFindings),
    '</div>',
    '<div class="results">',
    ...report.results.map(resultCard),
    '</div>',
    '</body>',
    '</html>',
  ].join('\n');
}

function summaryCard(title: string, value: number): string {
  return `<div class="summary-card"><h3>${escapeHtml(title)}</h3><div class="value">${String(value)}</div></div>`;
}

function resultCard(result: RunResult): string {
  const ok = result.status === 'SUCCEEDED';
  const parts = [
    '<div class="result-card">',
    `<h2>${escapeHtml(result.agent)}</h2>`,
    `<p><strong>URL:</strong> <a href="${escapeHtml(result.url)}">${escapeHtml(result.url)}</a></p>`,
    `<p class="${ok ? 'status-pass' : 'status-fail'}">${ok ? '✓ SUCCEEDED' : '✗ FAILED'} · ${escapeHtml(formatDuration(result.durationMs))}</p>`,
  ];

  if (result.error) {
    const where = result.error.step ? ` in step ${result.error.step}` : '';
    parts.push(
      `<div class="error"><strong>Error (${escapeHtml(result.error.kind + where)}):</strong> ${escapeHtml(result.error.message)}</div>`,
    );
  }

  const agentReport = result.state?.report;
  if (agentReport) {
    parts.push(`<p><strong>${escapeHtml(agentReport.headline)}</strong></p>`);
    parts.push(...agentReport.findings.map(findingBlock));
  }

  parts.push('</div>');
  return parts.join('\n');
}

function findingBlock(finding: Finding): string {
  const location = finding.location
    ? `<br><small>Location: ${escapeHtml(finding.location)}</small>`
    : '';
  const screenshot = 'screenshot' in finding && typeof finding.screenshot === 'string'
    ? `<img alt="Affected element" src="data:image/png;base64,${escapeHtml(finding.screenshot)}">`
    : '';

  return `<div class="finding"><span class="severity-${finding.severity}">${finding.severity.toUpperCase()}</span> · ${escapeHtml(finding.category)}<br>${escapeHtml(finding.description)}${location}${screenshot}</div>`;
}

// ── Helpers ──────────────────────────────────────────────────

export function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
