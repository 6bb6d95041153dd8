import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, it, expect } from 'vitest';

import {
  defaultConfig,
  enabledAgents,
  findConfigFile,
  loadConfigFile,
  parseConfigSource,
  resolveTargets,
} from '../loader.js';
import { ConfigurationError } from '../../core/errors.js';

const YAML_CONFIG = `
retry:
  maxAttempts: 5
concurrency:
  mode: parallel
agents:
  visual_qa:
    enabled: false
    viewport:
      width: 1280
      height: 800
targets:
  - url: https://example.com
  - url: https://example.com/about
    agents: [visual_qa]
`;

describe('parseConfigSource', () => {
  it('fills defaults around the values a YAML file sets', () => {
    const config = parseConfigSource(YAML_CONFIG, '.pagecheck.yaml');

    expect(config.retry).toEqual({
      maxAttempts: 5,
      initialDelayMs: 1000,
      exponentialBase: 2,
      maxDelayMs: 30000,
      jitterFactor: 0,
    });
    expect(config.concurrency).toEqual({ mode: 'parallel', maxParallel: 4 });
    expect(config.agents.visual_qa.viewport).toEqual({ width: 1280, height: 800 });
    expect(config.agents.spell_checker.enabled).toBe(true);
    expect(config.targets[0]).toEqual({ url: 'https://example.com', agents: [] });
    expect(config.output).toEqual({ format: 'text', timestamp: true });
  });

  it('reads JSON when the path ends in .json', () => {
    const config = parseConfigSource('{"output": {"format": "json"}}', 'pagecheck.config.json');

    expect(config.output.format).toBe('json');
  });

  it('treats an empty document as all defaults', () => {
    expect(parseConfigSource('', '.pagecheck.yaml')).toEqual(defaultConfig());
  });

  it('rejects syntax errors as configuration errors', () => {
    expect(() => parseConfigSource('{"output":', 'broken.json')).toThrow(ConfigurationError);
  });

  it('names the offending field', () => {
    expect(() => parseConfigSource('retry:\n  maxAttempts: 0\n', 'bad.yaml')).toThrow(
      'Invalid config file bad.yaml: retry.maxAttempts: Number must be greater than or equal to 1',
    );
  });

  it('rejects unknown agent blocks', () => {
    expect(() => parseConfigSource('agents:\n  link_checker: {}\n', 'bad.yaml')).toThrow(
      /^Invalid config file bad\.yaml: agents: Unrecognized key\(s\) in object: 'link_checker'$/,
    );
  });
});

describe('config files on disk', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'pagecheck-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('finds nothing in an empty directory', async () => {
    expect(await findConfigFile(dir)).toBeUndefined();
  });

  it('prefers .pagecheck.yaml over later names', async () => {
    await writeFile(path.join(dir, 'pagecheck.config.json'), '{}');
    await writeFile(path.join(dir, '.pagecheck.yaml'), '');

    expect(await findConfigFile(dir)).toBe(path.join(dir, '.pagecheck.yaml'));
  });

  it('loads and validates a file', async () => {
    const file = path.join(dir, '.pagecheck.yml');
    await writeFile(file, YAML_CONFIG);

    const config = await loadConfigFile(file);
    expect(config.targets).toHaveLength(2);
  });

  it('reports a missing file as a configuration error', async () => {
    const file = path.join(dir, 'missing.yaml');

    await expect(loadConfigFile(file)).rejects.toThrow(`Cannot read config file ${file}`);
  });
});

describe('resolveTargets', () => {
  const config = parseConfigSource(YAML_CONFIG, '.pagecheck.yaml');

  it('gives targets without agents every enabled agent', () => {
    expect(enabledAgents(config.agents)).toEqual(['spell_checker']);
    expect(resolveTargets(config)).toEqual([
      { url: 'https://example.com', agents: ['spell_checker'] },
      { url: 'https://example.com/about', agents: ['visual_qa'] },
    ]);
  });

  it('replaces the targets with a URL from the command line', () => {
    expect(resolveTargets(config, { url: 'https://other.test' })).toEqual([
      { url: 'https://other.test', agents: ['spell_checker'] },
    ]);
  });

  it('applies an explicit agent list to every target, disabled agents included', () => {
    const targets = resolveTargets(config, { agents: ['visual_qa', 'spell_checker'] });

    expect(targets.map((t) => t.agents)).toEqual([
      ['visual_qa', 'spell_checker'],
      ['visual_qa', 'spell_checker'],
    ]);
  });

  it('fails when there is nothing to validate', () => {
    expect(() => resolveTargets(defaultConfig())).toThrow(
      'No targets to validate: pass --url or list targets in a config file',
    );
  });
});
