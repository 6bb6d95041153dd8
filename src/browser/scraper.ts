import type { Page } from 'playwright';

import type { BrowserConfig, Region } from '../schema/index.js';
import { describeError } from '../core/errors.js';
import * as log from '../utils/logger.js';
import type { PageOptions } from './session.js';
import { withPage } from './session.js';

// ── Public interface ─────────────────────────────────────────

/** One element to crop out of the page: by selector, else by box. */
export interface RegionRequest {
  selector?: string | null | undefined;
  coordinates?: Region | null | undefined;
}

/**
 * Everything the agents need from a browser. Each call opens and closes
 * its own page, so calls from concurrent runs never share a session.
 */
export interface PageScraper {
  /** Visible text of `<body>`. */
  extractText(url: string, options: PageOptions): Promise<string>;
  /** Full-page PNG, base64. */
  captureScreenshot(url: string, options: PageOptions): Promise<string>;
  /**
   * Best-effort crops, aligned with `requests`: `null` where a request
   * had nothing usable or its capture failed.
   */
  captureRegions(
    url: string,
    requests: readonly RegionRequest[],
    options: PageOptions,
  ): Promise<(string | null)[]>;
}

// ── Playwright implementation ───────────────────────────────

export function createPlaywrightScraper(config: BrowserConfig): PageScraper {
  return {
    async extractText(url: string, options: PageOptions): Promise<string> {
      return withPage(url, config, options, async (page) => {
        const text = await page.innerText('body');
        log.browser(`extracted ${String(text.length)} characters`);
        return text;
      });
    },

    async captureScreenshot(url: string, options: PageOptions): Promise<string> {
      return withPage(url, config, options, async (page) => {
        const png = await page.screenshot({ fullPage: true });
        log.browser(`screenshot captured (${String(png.length)} bytes)`);
        return png.toString('base64');
      });
    },

    async captureRegions(
      url: string,
      requests: readonly RegionRequest[],
      options: PageOptions,
    ): Promise<(string | null)[]> {
      if (requests.length === 0) return [];

      return withPage(url, config, options, async (page) => {
        const crops: (string | null)[] = [];
        for (const [idx, request] of requests.entries()) {
          try {
            crops.push(await captureRegion(page, request));
          } catch (err) {
            log.warn(`Failed to capture screenshot for issue ${String(idx)}: ${describeError(err)}`);
            crops.push(null);
          }
        }
        return crops;
      });
    },
  };
}

// ── Helpers ──────────────────────────────────────────────────

async function captureRegion(page: Page, request: RegionRequest): Promise<string | null> {
  const selector = request.selector?.trim();
  if (selector && selector !== 'null') {
    const png = await page.locator(selector).first().screenshot();
    return png.toString('base64');
  }

  const box = request.coordinates;
  if (box && box.width > 0 && box.height > 0) {
    const png = await page.screenshot({
      clip: {
        x: Math.round(box.x),
        y: Math.round(box.y),
        width: Math.round(box.width),
        height: Math.round(box.height),
      },
      fullPage: true,
    });
    return png.toString('base64');
  }

  return null;
}
