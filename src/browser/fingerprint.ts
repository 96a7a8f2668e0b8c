import { VIEWPORT } from '../config/defaults.js';
import type { RandomSource } from '../utils/random.js';
import { pick } from '../utils/random.js';
import type { LaunchOptions, SessionSettings } from './driver.js';

// ── Anti-detection profile ───────────────────────────────────

export const USER_AGENTS = [
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/128.0.0.0 Safari/537.36 Edg/128.0.0.0',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/128.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/127.0.0.0 Safari/537.36 Edg/127.0.0.0',
  'Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/128.0.0.0 Safari/537.36',
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/126.0.0.0 Safari/537.36 Edg/126.0.0.0',
] as const;

export const STEALTH_ARGS = [
  '--disable-blink-features=AutomationControlled',
  '--disable-extensions',
  '--no-sandbox',
  '--disable-dev-shm-usage',
  '--disable-gpu',
] as const;

// Default switches that announce automation to the page.
export const IGNORED_DEFAULT_ARGS = ['--enable-automation'] as const;

/** Fresh launch options: a new user agent is drawn on every launch. */
export function buildLaunchOptions(
  settings: SessionSettings,
  random: RandomSource,
): LaunchOptions {
  return {
    headless: settings.headless,
    userAgent: pick(random, USER_AGENTS),
    viewport: { width: VIEWPORT.width, height: VIEWPORT.height },
    executablePath:
      settings.driverPath === 'auto' ? undefined : settings.driverPath,
    channel: settings.browserChannel,
  };
}
