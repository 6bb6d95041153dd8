/**
 * Browser module.
 * Playwright access for the agents: page text, screenshots, element crops.
 * No LLM calls.
 */

export { withPage } from './session.js';
export type { PageOptions } from './session.js';
export { createPlaywrightScraper } from './scraper.js';
export type { PageScraper, RegionRequest } from './scraper.js';
export { authContextOptions, injectCookies, parseCookieString } from './auth.js';
export type { CookiePair } from './auth.js';
