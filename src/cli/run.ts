import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import type { Command } from 'commander';
import { z } from 'zod';

import type { FileConfig } from '../schema/index.js';
import { modelNameSchema, reportFormatSchema } from '../schema/index.js';
import type { Report } from '../core/results.js';
import { isCleanReport } from '../core/results.js';
import { Orchestrator } from '../core/orchestrator.js';
import { describeError } from '../core/errors.js';
import { createAgentRegistry } from '../agents/index.js';
import type { RetryHooks } from '../agents/index.js';
import { createPlaywrightScraper } from '../browser/index.js';
import type { PageScraper } from '../browser/index.js';
import {
  createLLMClient,
  createMockClient,
  llmProviderSchema,
  loadLLMConfig,
} from '../llm/index.js';
import type { LLMClient } from '../llm/index.js';
import { buildReportFilename, renderReport } from '../report/index.js';
import {
  defaultConfig,
  findConfigFile,
  loadConfigFile,
  resolveTargets,
} from '../config/loader.js';
import { parseOrThrow } from '../utils/validation.js';
import { configureLogger } from '../utils/logger.js';
import type { LogLevel } from '../utils/logger.js';
import * as log from '../utils/logger.js';

// ── Exit codes ───────────────────────────────────────────────

export const EXIT_CODES = {
  CLEAN: 0,
  ISSUES: 1,
  CONFIG_ERROR: 4,
} as const;

// ── Option shapes ────────────────────────────────────────────

function splitList(value: string): string[] {
  return value
    .split(',')
    .map((s) => s.trim())
    .filter(Boolean);
}

/** Raw commander flags arrive as strings; everything is checked here. */
const checkOptionsSchema = z.object({
  url: z.string().min(1).optional(),
  config: z.string().min(1).optional(),
  agents: z
    .string()
    .transform(splitList)
    .pipe(z.array(z.string()).min(1, 'Expected a comma-separated list of agent names'))
    .optional(),
  format: reportFormatSchema.optional(),
  output: z.string().min(1).optional(),
  parallel: z.literal(true).optional(),
  maxParallel: z.coerce.number().int().positive().optional(),
  timeout: z.coerce.number().int().positive().optional(),
  headed: z.literal(true).optional(),
  verbose: z.literal(true).optional(),
  quiet: z.literal(true).optional(),
  logFile: z.string().min(1).optional(),
  provider: llmProviderSchema.optional(),
  model: modelNameSchema.optional(),
});

export type CheckOptions = z.output<typeof checkOptionsSchema>;

/** Collaborators the check command would otherwise build itself. */
export interface CheckDeps {
  scraper?: PageScraper | undefined;
  llm?: LLMClient | undefined;
  retryHooks?: RetryHooks | undefined;
  cwd?: string | undefined;
  stdout?: ((text: string) => void) | undefined;
  now?: (() => Date) | undefined;
}

export function parseCheckFlags(flags: unknown): CheckOptions {
  return parseOrThrow(checkOptionsSchema, flags, 'command-line options');
}

// ── Config layering ──────────────────────────────────────────

async function resolveConfig(opts: CheckOptions, cwd: string): Promise<FileConfig> {
  if (opts.config !== undefined) {
    return loadConfigFile(path.resolve(cwd, opts.config));
  }

  const found = await findConfigFile(cwd);
  if (found) {
    log.debug(`Using config file ${found}`);
    return loadConfigFile(found);
  }
  return defaultConfig();
}

/** CLI flags take precedence over the config file. */
function applyFlags(config: FileConfig, opts: CheckOptions): FileConfig {
  return {
    ...config,
    llm: {
      ...config.llm,
      ...(opts.provider !== undefined ? { provider: opts.provider } : {}),
      ...(opts.model !== undefined ? { model: opts.model } : {}),
    },
    concurrency: {
      ...config.concurrency,
      ...(opts.parallel ? { mode: 'parallel' as const } : {}),
      ...(opts.maxParallel !== undefined ? { maxParallel: opts.maxParallel } : {}),
      ...(opts.timeout !== undefined ? { runTimeoutMs: opts.timeout * 1000 } : {}),
    },
    browser: {
      ...config.browser,
      ...(opts.headed ? { headless: false } : {}),
    },
    output: {
      ...config.output,
      ...(opts.format !== undefined ? { format: opts.format } : {}),
      ...(opts.output !== undefined ? { path: opts.output } : {}),
    },
  };
}

function logLevelFor(opts: CheckOptions): LogLevel {
  if (opts.quiet) return 'quiet';
  if (opts.verbose) return 'verbose';
  return 'info';
}

// ── Stderr summary ───────────────────────────────────────────

function printSummary(report: Report): void {
  const { summary } = report;

  log.section('Summary');
  log.detail(`Runs:      ${String(summary.succeeded)} succeeded, ${String(summary.failed)} failed`);
  log.detail(`Findings:  ${String(summary.totalFindings)}`);
  for (const [agent, count] of Object.entries(summary.findingsByAgent)) {
    log.detail(`  ${agent}: ${String(count)}`);
  }
  log.detail(`Time:      ${(report.durationMs / 1000).toFixed(1)}s`);
  log.detail(`Run ID:    ${report.runId}`);
}

// ── Check ────────────────────────────────────────────────────

/**
 * Run every selected (target, agent) pair and emit the report.
 * Resolves to the process exit code; never throws.
 */
export async function runCheck(opts: CheckOptions, deps: CheckDeps = {}): Promise<number> {
  const cwd = deps.cwd ?? process.cwd();
  const stdout = deps.stdout ?? ((text: string) => process.stdout.write(text));

  try {
    configureLogger({ level: logLevelFor(opts), file: opts.logFile });

    const config = applyFlags(await resolveConfig(opts, cwd), opts);
    const targets = resolveTargets(config, { url: opts.url, agents: opts.agents });

    const llm = deps.llm ?? createLLMClient(
      loadLLMConfig({ provider: config.llm.provider, model: config.llm.model }),
    );
    const scraper = deps.scraper ?? createPlaywrightScraper(config.browser);

    const registry = createAgentRegistry({
      scraper,
      llm,
      agents: config.agents,
      retry: config.retry,
      retryHooks: deps.retryHooks,
    });

    const orchestrator = new Orchestrator(registry, {
      mode: config.concurrency.mode,
      maxParallel: config.concurrency.maxParallel,
      runTimeoutMs: config.concurrency.runTimeoutMs,
    });

    log.section(`Validating ${String(targets.length)} target(s)`);
    const report = await orchestrator.run(targets);

    const now = deps.now?.() ?? new Date();
    const content = renderReport(report, config.output.format, {
      timestamp: config.output.timestamp,
      now,
    });

    if (config.output.path !== undefined) {
      const outputDir = path.resolve(cwd, config.output.path);
      await mkdir(outputDir, { recursive: true });
      const singleUrl = targets.length === 1 ? targets[0]?.url : undefined;
      const outputPath = path.join(
        outputDir,
        buildReportFilename(config.output.format, singleUrl, now),
      );
      await writeFile(outputPath, content, 'utf-8');
      log.info(`Report saved to ${outputPath}`);
    } else {
      stdout(content.endsWith('\n') ? content : `${content}\n`);
    }

    printSummary(report);

    return isCleanReport(report) ? EXIT_CODES.CLEAN : EXIT_CODES.ISSUES;
  } catch (err) {
    log.error(describeError(err));
    return EXIT_CODES.CONFIG_ERROR;
  }
}

// ── Command registration ─────────────────────────────────────

/** Validates raw flags, then runs. Bad flags exit like any config error. */
export async function runCheckCommand(flags: unknown, deps: CheckDeps = {}): Promise<number> {
  let opts: CheckOptions;
  try {
    opts = parseCheckFlags(flags);
  } catch (err) {
    log.error(describeError(err));
    return EXIT_CODES.CONFIG_ERROR;
  }
  return runCheck(opts, deps);
}

export function registerCheckCommand(program: Command): void {
  program
    .command('check')
    .description('Validate one or more pages with the selected agents')
    .option('--url <url>', 'URL to validate (replaces the config file targets)')
    .option('--config <path>', 'Path to config file (default: search the working directory)')
    .option('--agents <names>', 'Comma-separated agents to run (default: every enabled agent)')
    .option('--format <format>', `Report format: ${reportFormatSchema.options.join(', ')}`)
    .option('--output <dir>', 'Write the report to this directory instead of stdout')
    .option('--parallel', 'Run validations in parallel')
    .option('--max-parallel <n>', 'Upper bound on concurrent runs')
    .option('--timeout <seconds>', 'Deadline for each (target, agent) run')
    .option('--headed', 'Show the browser window')
    .option('-v, --verbose', 'Verbose logging')
    .option('-q, --quiet', 'Only log errors')
    .option('--log-file <path>', 'Also append log lines to this file')
    .option('--provider <provider>', `LLM provider: ${llmProviderSchema.options.join(', ')}`)
    .option('--model <name>', 'Model name for the provider')
    .action(async (flags: Record<string, unknown>) => {
      process.exitCode = await runCheckCommand(flags);
    });
}

// ── Agents ───────────────────────────────────────────────────

export function listAgents(): string[] {
  const config = defaultConfig();
  const registry = createAgentRegistry({
    scraper: createPlaywrightScraper(config.browser),
    llm: createMockClient(),
    agents: config.agents,
    retry: config.retry,
  });

  return registry
    .list()
    .map((agent) => `${agent.name.padEnd(16)}${agent.description}\n${' '.repeat(16)}steps: ${agent.steps.join(' → ')}`);
}

export function registerAgentsCommand(program: Command): void {
  program
    .command('agents')
    .description('List the registered validation agents')
    .action(() => {
      process.stdout.write(`${listAgents().join('\n')}\n`);
    });
}
