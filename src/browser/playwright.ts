import { chromium, errors } from 'playwright';
import type { Browser, Page } from 'playwright';

import { TIMEOUTS } from '../config/defaults.js';
import { errorMessage } from '../utils/clock.js';
import * as log from '../utils/logger.js';
import type { BrowserDriver, LaunchOptions } from './driver.js';
import { IGNORED_DEFAULT_ARGS, STEALTH_ARGS } from './fingerprint.js';
import { DriverError, LaunchError } from './errors.js';
import type { DriverErrorKind } from './errors.js';

// Messages Playwright uses once the target is gone.
const CLOSED_TARGET = /Target (page, context or browser )?(has been )?closed|Browser has been closed|browser has disconnected/i;

// ── Error classification ─────────────────────────────────────

export interface TargetStatus {
  connected: boolean;
  closed: boolean;
}

/**
 * Map a Playwright failure to a DriverError. A gone browser or page is a
 * session fault whatever the error says; a Playwright timeout takes the
 * caller's `onTimeout` kind.
 */
export function classifyDriverError(
  err: unknown,
  target: TargetStatus,
  onTimeout: DriverErrorKind,
): DriverError {
  if (err instanceof DriverError) return err;
  const message = err instanceof Error ? err.message : String(err);

  if (!target.connected || target.closed || CLOSED_TARGET.test(message)) {
    return new DriverError('session_fault', message, { cause: err });
  }
  if (err instanceof errors.TimeoutError) {
    return new DriverError(onTimeout, message, { cause: err });
  }
  return new DriverError('other', message, { cause: err });
}

// ── Driver launcher ──────────────────────────────────────────

export async function launchPlaywrightDriver(
  options: LaunchOptions,
): Promise<BrowserDriver> {
  let browser: Browser;
  try {
    browser = await chromium.launch({
      headless: options.headless,
      args: [...STEALTH_ARGS],
      ignoreDefaultArgs: [...IGNORED_DEFAULT_ARGS],
      ...(options.executablePath !== undefined
        ? { executablePath: options.executablePath }
        : {}),
      ...(options.channel !== undefined ? { channel: options.channel } : {}),
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new LaunchError(`Failed to launch browser: ${message}`, {
      cause: err,
    });
  }

  let page: Page;
  try {
    const context = await browser.newContext({
      userAgent: options.userAgent,
      viewport: options.viewport,
    });
    await context.addInitScript(() => {
      Object.defineProperty(navigator, 'webdriver', { get: () => undefined });
    });
    page = await context.newPage();
  } catch (err) {
    await browser.close().catch((closeErr: unknown) => {
      log.debug(`Ignoring teardown error: ${errorMessage(closeErr)}`);
    });
    const message = err instanceof Error ? err.message : String(err);
    throw new LaunchError(`Failed to open browser page: ${message}`, {
      cause: err,
    });
  }

  // Relative pointer moves start from the viewport centre.
  const pointer = {
    x: Math.round(options.viewport.width / 2),
    y: Math.round(options.viewport.height / 2),
  };

  async function guard<T>(
    fn: () => Promise<T>,
    onTimeout: DriverErrorKind = 'element_not_found',
  ): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw classifyDriverError(
        err,
        { connected: browser.isConnected(), closed: page.isClosed() },
        onTimeout,
      );
    }
  }

  return {
    async goto(url: string, timeoutMs: number): Promise<void> {
      await guard(async () => {
        await page.goto(url, { timeout: timeoutMs, waitUntil: 'domcontentloaded' });
      }, 'timeout');
    },

    async isPresent(selector: string, timeoutMs: number): Promise<boolean> {
      try {
        await guard(() =>
          page
            .locator(selector)
            .first()
            // timeout 0 would mean no limit
            .waitFor({ state: 'attached', timeout: Math.max(1, timeoutMs) }),
          'timeout',
        );
        return true;
      } catch (err) {
        if (err instanceof DriverError && err.kind === 'timeout') return false;
        throw err;
      }
    },

    async clear(selector: string): Promise<void> {
      await guard(() =>
        page.locator(selector).clear({ timeout: TIMEOUTS.ACTION_TIMEOUT }),
      );
    },

    async type(selector: string, text: string): Promise<void> {
      await guard(() =>
        page
          .locator(selector)
          .pressSequentially(text, { timeout: TIMEOUTS.ACTION_TIMEOUT }),
      );
    },

    async press(selector: string, key: string): Promise<void> {
      await guard(() =>
        page.locator(selector).press(key, { timeout: TIMEOUTS.ACTION_TIMEOUT }),
      );
    },

    async click(selector: string): Promise<void> {
      await guard(() =>
        page.locator(selector).click({ timeout: TIMEOUTS.ACTION_TIMEOUT }),
      );
    },

    async moveBy(dx: number, dy: number): Promise<void> {
      pointer.x = clamp(pointer.x + dx, 0, options.viewport.width - 1);
      pointer.y = clamp(pointer.y + dy, 0, options.viewport.height - 1);
      await guard(() => page.mouse.move(pointer.x, pointer.y, { steps: 5 }));
    },

    async scrollBy(dy: number): Promise<void> {
      await guard(() =>
        page.evaluate((distance) => {
          window.scrollBy(0, distance);
        }, dy),
      );
    },

    currentUrl(): string {
      return page.url();
    },

    async close(): Promise<void> {
      await browser.close();
    },
  };
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(Math.max(value, min), max);
}
