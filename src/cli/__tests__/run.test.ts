import { mkdtemp, readdir, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import { EXIT_CODES, listAgents, parseCheckFlags, runCheck, runCheckCommand } from '../run.js';
import type { CheckDeps } from '../run.js';
import { jsonOutputSchema } from '../../schema/index.js';
import type { JsonOutput } from '../../schema/index.js';
import { fakeLLM, fakeScraper, noSleep } from '../../__tests__/fakes.js';

const NOW = new Date(2026, 0, 2, 3, 4, 5);
const TEH_RESPONSE = '[{"original": "teh", "correction": "the", "context": "teh page"}]';

describe('runCheck', () => {
  let cwd: string;
  let out: string[];

  beforeEach(async () => {
    cwd = await mkdtemp(path.join(tmpdir(), 'pagecheck-cli-'));
    out = [];
  });

  afterEach(async () => {
    await rm(cwd, { recursive: true, force: true });
  });

  function deps(llmResponse: string): CheckDeps {
    return {
      scraper: fakeScraper({ extractText: async () => 'teh page' }),
      llm: fakeLLM({ generate: async () => llmResponse }),
      retryHooks: { sleep: noSleep },
      cwd,
      stdout: (text) => out.push(text),
      now: () => NOW,
    };
  }

  function printedJSON(): JsonOutput {
    return jsonOutputSchema.parse(JSON.parse(out.join('')));
  }

  it('exits 0 and prints the report when the page is clean', async () => {
    const code = await runCheck(
      { url: 'example.com', agents: ['spell_checker'], format: 'json', quiet: true },
      deps('[]'),
    );

    expect(code).toBe(EXIT_CODES.CLEAN);
    const output = printedJSON();
    expect(output.results.map((r) => [r.agent, r.url, r.status, r.passed])).toEqual([
      ['spell_checker', 'https://example.com', 'SUCCEEDED', true],
    ]);
    expect(output.generatedAt).toBe(NOW.toISOString());
  });

  it('exits 1 when findings are reported', async () => {
    const code = await runCheck(
      { url: 'https://example.com', agents: ['spell_checker'], format: 'json', quiet: true },
      deps(TEH_RESPONSE),
    );

    expect(code).toBe(EXIT_CODES.ISSUES);
    expect(printedJSON().summary.totalFindings).toBe(1);
  });

  it('exits 1 when a run fails, including an unknown agent', async () => {
    const code = await runCheck(
      { url: 'https://example.com', agents: ['link_checker'], format: 'json', quiet: true },
      deps('[]'),
    );

    expect(code).toBe(EXIT_CODES.ISSUES);
    expect(printedJSON().results[0]?.error?.kind).toBe('configuration');
  });

  it('exits 4 when there is nothing to validate', async () => {
    const code = await runCheck({ quiet: true }, deps('[]'));

    expect(code).toBe(EXIT_CODES.CONFIG_ERROR);
    expect(out).toEqual([]);
  });

  it('exits 4 when the named config file is missing', async () => {
    const code = await runCheck({ config: 'missing.yaml', quiet: true }, deps('[]'));

    expect(code).toBe(EXIT_CODES.CONFIG_ERROR);
  });

  it('exits 4 when the log file cannot be written', async () => {
    const code = await runCheck(
      {
        url: 'https://example.com',
        agents: ['spell_checker'],
        logFile: path.join(cwd, 'missing', 'pagecheck.log'),
        quiet: true,
      },
      deps('[]'),
    );

    expect(code).toBe(EXIT_CODES.CONFIG_ERROR);
    expect(out).toEqual([]);
  });

  it('picks up the config file in the working directory', async () => {
    await writeFile(
      path.join(cwd, '.pagecheck.yaml'),
      [
        'agents:',
        '  visual_qa:',
        '    enabled: false',
        'output:',
        '  format: json',
        '  timestamp: false',
        'targets:',
        '  - url: https://example.com/a',
        '  - url: https://example.com/b',
      ].join('\n'),
    );

    const code = await runCheck({ quiet: true }, deps('[]'));

    expect(code).toBe(EXIT_CODES.CLEAN);
    const output = printedJSON();
    expect(output.results.map((r) => `${r.agent} ${r.url}`)).toEqual([
      'spell_checker https://example.com/a',
      'spell_checker https://example.com/b',
    ]);
    expect(output.generatedAt).toBeUndefined();
  });

  it('lets flags override the config file', async () => {
    await writeFile(
      path.join(cwd, 'custom.yaml'),
      'output:\n  format: markdown\ntargets:\n  - url: https://example.com\n',
    );

    await runCheck(
      { config: 'custom.yaml', agents: ['spell_checker'], format: 'json', parallel: true, quiet: true },
      deps('[]'),
    );

    expect(printedJSON().mode).toBe('parallel');
  });

  it('writes the report into the output directory', async () => {
    const code = await runCheck(
      {
        url: 'https://www.example.com',
        agents: ['spell_checker'],
        format: 'markdown',
        output: 'reports',
        quiet: true,
      },
      deps(TEH_RESPONSE),
    );

    expect(code).toBe(EXIT_CODES.ISSUES);
    expect(out).toEqual([]);

    const dir = path.join(cwd, 'reports');
    expect(await readdir(dir)).toEqual(['report_example.com_20260102_030405.md']);

    const markdown = await readFile(path.join(dir, 'report_example.com_20260102_030405.md'), 'utf-8');
    expect(markdown.split('\n')[0]).toBe('# Page Validation Report');
  });
});

describe('listAgents', () => {
  it('lists both built-in agents with their steps', () => {
    const lines = listAgents();

    expect(lines).toHaveLength(2);
    expect(lines[0]?.startsWith('spell_checker   ')).toBe(true);
    expect(lines[0]).toContain('steps: scrape → analyze → report');
    expect(lines[1]).toContain('steps: capture → analyze → capture_elements → report');
  });
});

describe('parseCheckFlags', () => {
  it('converts raw commander strings', () => {
    expect(
      parseCheckFlags({
        url: 'https://example.com',
        agents: 'spell_checker, visual_qa,',
        maxParallel: '3',
        timeout: '30',
        parallel: true,
        format: 'html',
      }),
    ).toEqual({
      url: 'https://example.com',
      agents: ['spell_checker', 'visual_qa'],
      maxParallel: 3,
      timeout: 30,
      parallel: true,
      format: 'html',
    });
  });

  it('rejects values commander cannot check itself', () => {
    expect(() => parseCheckFlags({ maxParallel: '0' })).toThrow(
      'Invalid command-line options: maxParallel: Number must be greater than 0',
    );
    expect(() => parseCheckFlags({ agents: ' , ' })).toThrow(
      'Invalid command-line options: agents: Expected a comma-separated list of agent names',
    );
    expect(() => parseCheckFlags({ format: 'pdf' })).toThrow(/^Invalid command-line options: format: /);
  });
});

describe('runCheckCommand', () => {
  it('exits 4 for invalid flags without running anything', async () => {
    const out: string[] = [];

    const code = await runCheckCommand(
      { url: 'https://example.com', timeout: 'soon', quiet: true },
      { llm: fakeLLM(), scraper: fakeScraper(), stdout: (text) => out.push(text) },
    );

    expect(code).toBe(EXIT_CODES.CONFIG_ERROR);
    expect(out).toEqual([]);
  });
});
