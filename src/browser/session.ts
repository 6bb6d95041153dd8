import { chromium } from 'playwright';
import type { Browser, Page } from 'playwright';

import type { AuthConfig, BrowserConfig, Viewport } from '../schema/index.js';
import { VIEWPORT } from '../config/defaults.js';
import { BrowserError, ValidatorError, describeError } from '../core/errors.js';
import * as log from '../utils/logger.js';
import { authContextOptions, injectCookies } from './auth.js';

// ── Public types ─────────────────────────────────────────────

export interface PageOptions {
  viewport?: Pick<Viewport, 'width' | 'height'> | undefined;
  auth?: AuthConfig | undefined;
  /** Settle time after navigation, for late-rendering content. */
  waitMs: number;
}

// ── Session ──────────────────────────────────────────────────

/**
 * Launch a browser, open `url` in a fresh context and hand the page to
 * `fn`. The browser is always closed afterwards.
 *
 * Launch failures are permanent; navigation and anything `fn` throws
 * that is not already classified count as transient.
 */
export async function withPage<T>(
  url: string,
  config: BrowserConfig,
  options: PageOptions,
  fn: (page: Page) => Promise<T>,
): Promise<T> {
  let browser: Browser;
  try {
    browser = await chromium.launch({ headless: config.headless });
  } catch (err) {
    throw new BrowserError(`Failed to launch browser: ${describeError(err)}`, {
      transient: false,
      cause: err,
    });
  }

  try {
    const viewport = options.viewport ?? { width: VIEWPORT.WIDTH, height: VIEWPORT.HEIGHT };
    const context = await browser.newContext({
      viewport: { width: viewport.width, height: viewport.height },
      ...authContextOptions(options.auth),
    });

    if (options.auth?.cookie) {
      await injectCookies(context, options.auth.cookie, url);
    }

    const page = await context.newPage();
    page.setDefaultTimeout(config.navigationTimeoutMs);

    log.browser(`goto ${url} (${String(viewport.width)}x${String(viewport.height)})`);
    await page.goto(url, {
      timeout: config.navigationTimeoutMs,
      waitUntil: 'domcontentloaded',
    });

    if (options.waitMs > 0) {
      await page.waitForTimeout(options.waitMs);
    }

    return await fn(page);
  } catch (err) {
    if (err instanceof ValidatorError) throw err;
    throw new BrowserError(`Browser failure on ${url}: ${describeError(err)}`, {
      transient: true,
      cause: err,
    });
  } finally {
    await browser.close().catch((err: unknown) => {
      log.warn(`Error during browser cleanup: ${describeError(err)}`);
    });
  }
}
