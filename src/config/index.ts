/**
 * Configuration module.
 * Loads and validates runtime config from config files; env and CLI
 * flags are layered on top by the CLI.
 */

export {
  CONCURRENCY,
  CONFIG_FILE_NAMES,
  LIMITS,
  RETRY,
  TIMEOUTS,
  VIEWPORT,
  VIEWPORT_LIMITS,
} from './defaults.js';
export {
  defaultConfig,
  enabledAgents,
  findConfigFile,
  loadConfigFile,
  parseConfigSource,
  resolveTargets,
} from './loader.js';
export type { TargetSelection } from './loader.js';
