/**
 * Default configuration values.
 * All values are overridable via config file or CLI flags.
 */

export const TIMEOUTS = {
  NAVIGATION_TIMEOUT: 60_000,
  TEXT_SETTLE_WAIT: 2_000,
  SCREENSHOT_SETTLE_WAIT: 5_000,
} as const;

export const RETRY = {
  MAX_ATTEMPTS: 3,
  INITIAL_DELAY_MS: 1_000,
  EXPONENTIAL_BASE: 2,
  MAX_DELAY_MS: 30_000,
  JITTER_FACTOR: 0,
} as const;

export const CONCURRENCY = {
  MAX_PARALLEL: 4,
} as const;

export const LIMITS = {
  MAX_TEXT_LENGTH: 10_000,
} as const;

export const VIEWPORT = {
  WIDTH: 1920,
  HEIGHT: 1080,
} as const;

export const VIEWPORT_LIMITS = {
  MIN_WIDTH: 320,
  MAX_WIDTH: 7680,
  MIN_HEIGHT: 240,
  MAX_HEIGHT: 4320,
} as const;

export const CONFIG_FILE_NAMES = [
  '.pagecheck.yaml',
  '.pagecheck.yml',
  'pagecheck.config.yaml',
  'pagecheck.config.json',
] as const;
