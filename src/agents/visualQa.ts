import { z } from 'zod';

import type { AgentReport, BaseState, RegisteredAgent } from '../core/agent.js';
import { defineAgent } from '../core/agent.js';
import { Pipeline } from '../core/pipeline.js';
import type { ValidationStep } from '../core/pipeline.js';
import type { RetryPolicy } from '../core/retry.js';
import { describeError } from '../core/errors.js';
import type { PageScraper } from '../browser/index.js';
import type { LLMClient } from '../llm/index.js';
import type {
  Finding,
  FindingSeverity,
  Region,
  Viewport,
  VisualIssue,
  VisualQaSettings,
} from '../schema/index.js';
import { SEVERITY_ORDER, viewportSchema, visualIssueSchema } from '../schema/index.js';
import { parseOrThrow } from '../utils/validation.js';
import * as log from '../utils/logger.js';
import { parseFindingList } from './parse.js';
import { loadPrompt, renderPrompt } from './prompts.js';

export const VISUAL_QA = 'visual_qa';

const SYSTEM_PROMPT =
  'You are a UI/UX expert and QA specialist. You answer with JSON only, never with prose.';

// ── State ────────────────────────────────────────────────────

export interface VisualFinding extends Finding {
  type: string;
  recommendation: string;
  selector?: string | undefined;
  coordinates?: Region | undefined;
  /** Base64 PNG crop of the affected element, when one was captured. */
  screenshot?: string | undefined;
}

export interface VisualQaState extends BaseState {
  viewport: Viewport;
  waitMs: number;
  /** Full-page PNG, base64. */
  screenshot: string;
  issues: readonly VisualIssue[];
  /** Issue index → base64 PNG crop. */
  elementScreenshots: Readonly<Record<number, string>>;
  report?: AgentReport<VisualFinding> | undefined;
}

const visualQaOptionsSchema = z.object({
  viewport: viewportSchema.optional(),
  waitMs: z.number().int().nonnegative().optional(),
});

export interface VisualQaDeps {
  scraper: PageScraper;
  llm: LLMClient;
  settings: VisualQaSettings;
  retry: RetryPolicy;
}

// ── Steps ────────────────────────────────────────────────────

function captureStep(deps: VisualQaDeps): ValidationStep<VisualQaState> {
  return {
    name: 'capture',
    retry: deps.retry,
    async run(state) {
      log.detail(
        `Capturing screenshot of ${state.url} at ${formatViewport(state.viewport)}`,
      );
      const screenshot = await deps.scraper.captureScreenshot(state.url, {
        viewport: state.viewport,
        auth: state.auth,
        waitMs: state.waitMs,
      });
      return { screenshot };
    },
  };
}

/** Unreadable model output fails the run with a `parse` error. */
function analyzeStep(deps: VisualQaDeps): ValidationStep<VisualQaState> {
  return {
    name: 'analyze',
    retry: deps.retry,
    async run(state) {
      log.detail('Analyzing visual elements');
      const template = await loadPrompt('visual_qa');
      const raw = await deps.llm.generateWithImage(
        SYSTEM_PROMPT,
        renderPrompt(template, {
          url: state.url,
          width: String(state.viewport.width),
          height: String(state.viewport.height),
        }),
        state.screenshot,
        'image/png',
      );

      const issues = parseFindingList(raw, visualIssueSchema, VISUAL_QA);
      log.detail(`Found ${String(issues.length)} potential issue(s)`);
      return { issues };
    },
  };
}

/** Best-effort: any failure here leaves the run's findings intact. */
function captureElementsStep(deps: VisualQaDeps): ValidationStep<VisualQaState> {
  return {
    name: 'capture_elements',
    async run(state) {
      if (state.issues.length === 0) return { elementScreenshots: {} };

      let crops: (string | null)[];
      try {
        crops = await deps.scraper.captureRegions(
          state.url,
          state.issues.map((issue) => ({
            selector: issue.selector,
            coordinates: issue.coordinates,
          })),
          { viewport: state.viewport, auth: state.auth, waitMs: state.waitMs },
        );
      } catch (err) {
        log.warn(`Element screenshots skipped: ${describeError(err)}`);
        return { elementScreenshots: {} };
      }

      const elementScreenshots: Record<number, string> = {};
      crops.forEach((crop, idx) => {
        if (crop !== null) elementScreenshots[idx] = crop;
      });

      log.debug(
        `Captured ${String(Object.keys(elementScreenshots).length)} element screenshot(s) out of ${String(state.issues.length)} issue(s)`,
      );
      return { elementScreenshots };
    },
  };
}

const reportStep: ValidationStep<VisualQaState> = {
  name: 'report',
  async run(state) {
    return {
      report: buildVisualReport(
        state.url,
        state.viewport,
        state.issues,
        state.elementScreenshots,
      ),
    };
  },
};

// ── Report ───────────────────────────────────────────────────

export function toVisualFinding(issue: VisualIssue, screenshot?: string): VisualFinding {
  const finding: VisualFinding = {
    category: 'visual',
    severity: issue.severity,
    description: issue.issue,
    location: issue.location,
    type: issue.type,
    recommendation: issue.recommendation,
  };
  if (issue.selector) finding.selector = issue.selector;
  if (issue.coordinates) finding.coordinates = issue.coordinates;
  if (screenshot !== undefined) finding.screenshot = screenshot;
  return finding;
}

export function buildVisualReport(
  url: string,
  viewport: Viewport,
  issues: readonly VisualIssue[],
  elementScreenshots: Readonly<Record<number, string>> = {},
): AgentReport<VisualFinding> {
  const viewportInfo = formatViewport(viewport);

  if (issues.length === 0) {
    return {
      passed: true,
      headline: 'No visual issues detected',
      text: `✓ SUCCESS: No visual issues detected on ${url}\nViewport: ${viewportInfo}`,
      findings: [],
    };
  }

  const groups = new Map<FindingSeverity, VisualIssue[]>(
    SEVERITY_ORDER.map((s) => [s, []]),
  );
  for (const issue of issues) {
    groups.get(issue.severity)?.push(issue);
  }
  const countOf = (s: FindingSeverity): string => String(groups.get(s)?.length ?? 0);

  const lines = [
    `✗ VISUAL ISSUES DETECTED on ${url}`,
    `Viewport: ${viewportInfo}`,
    `Total Issues: ${String(issues.length)} (Critical: ${countOf('critical')}, High: ${countOf('high')}, Medium: ${countOf('medium')}, Low: ${countOf('low')})`,
  ];

  for (const severity of SEVERITY_ORDER) {
    const group = groups.get(severity) ?? [];
    if (group.length === 0) continue;

    lines.push('', '='.repeat(60));
    lines.push(`${severity.toUpperCase()} SEVERITY ISSUES (${String(group.length)})`);
    lines.push('='.repeat(60));

    group.forEach((issue, i) => {
      lines.push('');
      lines.push(`${String(i + 1)}. [${issue.type.toUpperCase()}] ${issue.issue}`);
      lines.push(`   Location: ${issue.location}`);
      lines.push(`   Fix: ${issue.recommendation}`);
    });
  }

  return {
    passed: false,
    headline: `${String(issues.length)} visual issue${issues.length === 1 ? '' : 's'} detected`,
    text: lines.join('\n'),
    findings: issues.map((issue, idx) => toVisualFinding(issue, elementScreenshots[idx])),
  };
}

function formatViewport(viewport: Viewport): string {
  const size = `${String(viewport.width)}x${String(viewport.height)}`;
  return viewport.name ? `${viewport.name} (${size})` : size;
}

// ── Definition ───────────────────────────────────────────────

export function createVisualQa(deps: VisualQaDeps): RegisteredAgent {
  return defineAgent<VisualQaState>({
    name: VISUAL_QA,
    description: 'Reviews a full-page screenshot for layout and visual defects',
    pipeline: new Pipeline([
      captureStep(deps),
      analyzeStep(deps),
      captureElementsStep(deps),
      reportStep,
    ]),

    createInitialState(target) {
      const options = parseOrThrow(
        visualQaOptionsSchema,
        target.options ?? {},
        `${VISUAL_QA} options for ${target.url}`,
      );
      return {
        url: target.url,
        auth: target.auth,
        viewport: options.viewport ?? deps.settings.viewport,
        waitMs: options.waitMs ?? deps.settings.waitMs,
        screenshot: '',
        issues: [],
        elementScreenshots: {},
      };
    },
  });
}
