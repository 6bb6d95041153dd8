import { access, readFile } from 'node:fs/promises';
import path from 'node:path';

import { parse as parseYaml } from 'yaml';

import { fileConfigSchema } from '../schema/config.js';
import type { AgentsConfig, FileConfig } from '../schema/config.js';
import type { Target } from '../schema/target.js';
import { ConfigurationError, describeError } from '../core/errors.js';
import { parseOrThrow } from '../utils/validation.js';
import { CONFIG_FILE_NAMES } from './defaults.js';

// ── Loading ─────────────────────────────────────────────────

/**
 * Load and validate a `.pagecheck.yaml` (or JSON) config file.
 * Throws `ConfigurationError` if the file is missing or invalid.
 */
export async function loadConfigFile(configPath: string): Promise<FileConfig> {
  let raw: string;
  try {
    raw = await readFile(configPath, 'utf-8');
  } catch (err) {
    throw new ConfigurationError(
      `Cannot read config file ${configPath}: ${describeError(err)}`,
      { cause: err },
    );
  }

  return parseConfigSource(raw, configPath);
}

/** Parse config text; JSON when `sourcePath` ends in `.json`, YAML otherwise. */
export function parseConfigSource(raw: string, sourcePath: string): FileConfig {
  let parsed: unknown;
  try {
    parsed = sourcePath.endsWith('.json') ? JSON.parse(raw) : parseYaml(raw);
  } catch (err) {
    throw new ConfigurationError(
      `Cannot parse config file ${sourcePath}: ${describeError(err)}`,
      { cause: err },
    );
  }

  // An empty YAML document parses to null.
  return parseOrThrow(fileConfigSchema, parsed ?? {}, `config file ${sourcePath}`);
}

export function defaultConfig(): FileConfig {
  return fileConfigSchema.parse({});
}

/** First known config file name present in `dir`, if any. */
export async function findConfigFile(dir: string): Promise<string | undefined> {
  for (const name of CONFIG_FILE_NAMES) {
    const candidate = path.join(dir, name);
    try {
      await access(candidate);
      return candidate;
    } catch {
      continue;
    }
  }
  return undefined;
}

// ── Target resolution ───────────────────────────────────────

export interface TargetSelection {
  /** Single URL from the command line; replaces the config's targets. */
  url?: string | undefined;
  /** Agent names for every target, replacing per-target lists. */
  agents?: readonly string[] | undefined;
}

export function enabledAgents(agents: AgentsConfig): string[] {
  return Object.entries(agents)
    .filter(([, settings]) => settings.enabled)
    .map(([name]) => name);
}

/**
 * Targets to run. A target that names no agents gets every enabled one.
 * Agent names are not checked here; unknown ones fail at admission.
 */
export function resolveTargets(
  config: FileConfig,
  selection: TargetSelection = {},
): Target[] {
  const fallbackAgents = selection.agents ? [...selection.agents] : enabledAgents(config.agents);

  const targets: Target[] = selection.url !== undefined
    ? [{ url: selection.url, agents: [] }]
    : config.targets;

  if (targets.length === 0) {
    throw new ConfigurationError(
      'No targets to validate: pass --url or list targets in a config file',
    );
  }

  return targets.map((target) => ({
    ...target,
    agents: selection.agents
      ? [...selection.agents]
      : target.agents.length > 0
        ? [...target.agents]
        : [...fallbackAgents],
  }));
}
