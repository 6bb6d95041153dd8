/**
 * Report generation module.
 * Deterministic: no LLM calls.
 * Renders an orchestrator Report as text, JSON, Markdown or HTML.
 */

import type { Report } from '../core/results.js';
import type { ReportFormat } from '../schema/index.js';
import type { RenderOptions } from './reporter.js';
import { generateJSON, generateMarkdown, serializeJSON } from './reporter.js';
import { generateText } from './text.js';
import { generateHTML } from './html.js';

export { generateJSON, generateMarkdown, serializeJSON, formatDuration } from './reporter.js';
export type { JsonOutput, JsonOutputError, JsonOutputRun, RenderOptions } from './reporter.js';
export { generateText } from './text.js';
export { generateHTML, escapeHtml } from './html.js';

// ── Dispatch ─────────────────────────────────────────────────

export function renderReport(
  report: Report,
  format: ReportFormat,
  options: RenderOptions,
): string {
  switch (format) {
    case 'text':
      return generateText(report, options);
    case 'json':
      return serializeJSON(generateJSON(report, options));
    case 'markdown':
      return generateMarkdown(report, options);
    case 'html':
      return generateHTML(report, options);
  }
}

const EXTENSIONS: Record<ReportFormat, string> = {
  text: 'txt',
  json: 'json',
  markdown: 'md',
  html: 'html',
};

export function reportExtension(format: ReportFormat): string {
  return EXTENSIONS[format];
}

// ── File naming ──────────────────────────────────────────────

/**
 * `report_<domain>_<yyyyMMdd_HHmmss>.<ext>`, local time. The domain part
 * is dropped when there is no single URL to name the report after.
 */
export function buildReportFilename(
  format: ReportFormat,
  url: string | undefined,
  now: Date = new Date(),
): string {
  const stamp =
    `${String(now.getFullYear())}${pad(now.getMonth() + 1)}${pad(now.getDate())}` +
    `_${pad(now.getHours())}${pad(now.getMinutes())}${pad(now.getSeconds())}`;

  const domain = url ? domainSlug(url) : '';
  const prefix = domain ? `report_${domain}` : 'report';
  return `${prefix}_${stamp}.${reportExtension(format)}`;
}

function domainSlug(url: string): string {
  let host: string;
  try {
    host = new URL(url).hostname;
  } catch {
    host = url;
  }
  return host.replace(/^www\./, '').replace(/[^a-zA-Z0-9.-]+/g, '_');
}

function pad(n: number): string {
  return String(n).padStart(2, '0');
}
