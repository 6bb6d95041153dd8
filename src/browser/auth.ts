import type { BrowserContext, BrowserContextOptions } from 'playwright';

import type { AuthConfig } from '../schema/index.js';
import { ConfigurationError } from '../core/errors.js';

// ── Cookie parsing ──────────────────────────────────────────

export interface CookiePair {
  name: string;
  value: string;
}

/** Parse "name=value; name2=value2". Empty segments are skipped. */
export function parseCookieString(cookies: string): CookiePair[] {
  return cookies
    .split(';')
    .map((s) => s.trim())
    .filter(Boolean)
    .map((pair) => {
      const eqIdx = pair.indexOf('=');
      if (eqIdx <= 0) {
        throw new ConfigurationError(
          `Invalid cookie format: "${pair}" (expected name=value)`,
        );
      }
      return {
        name: pair.slice(0, eqIdx).trim(),
        value: pair.slice(eqIdx + 1).trim(),
      };
    });
}

// ── Cookie injection ────────────────────────────────────────

/**
 * Inject all cookies into the browser context before navigation begins.
 *
 * Playwright requires a `url` to scope each cookie; the target URL is
 * used so cookies attach to the correct origin.
 */
export async function injectCookies(
  context: BrowserContext,
  cookies: string,
  url: string,
): Promise<void> {
  const parsed = parseCookieString(cookies);
  if (parsed.length === 0) return;

  await context.addCookies(
    parsed.map((c) => ({
      name: c.name,
      value: c.value,
      url,
    })),
  );
}

// ── Context options ─────────────────────────────────────────

/** Headers and basic credentials go on the context itself. */
export function authContextOptions(
  auth: AuthConfig | undefined,
): Pick<BrowserContextOptions, 'extraHTTPHeaders' | 'httpCredentials'> {
  const options: Pick<BrowserContextOptions, 'extraHTTPHeaders' | 'httpCredentials'> = {};
  if (!auth) return options;

  if (auth.headers && Object.keys(auth.headers).length > 0) {
    options.extraHTTPHeaders = { ...auth.headers };
  }
  if (auth.basic) {
    options.httpCredentials = {
      username: auth.basic.username,
      password: auth.basic.password,
    };
  }
  return options;
}
