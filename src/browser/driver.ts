import type { SearchEngineProfile } from '../schema/config.js';

// ── Driver abstraction ───────────────────────────────────────

/**
 * Session-oriented browser primitives used by BrowserSession.
 * Implementations throw DriverError for every failure.
 */
export interface BrowserDriver {
  /** Rejects with a `timeout` DriverError once `timeoutMs` passes. */
  goto(url: string, timeoutMs: number): Promise<void>;
  /** Element lookup that settles within `timeoutMs`; the caller owns the polling. */
  isPresent(selector: string, timeoutMs: number): Promise<boolean>;
  clear(selector: string): Promise<void>;
  /** Keystrokes for `text` into the element, without any delay. */
  type(selector: string, text: string): Promise<void>;
  /** A named key such as `Enter`. */
  press(selector: string, key: string): Promise<void>;
  click(selector: string): Promise<void>;
  /** Pointer move relative to the last pointer position. */
  moveBy(dx: number, dy: number): Promise<void>;
  scrollBy(dy: number): Promise<void>;
  currentUrl(): string;
  close(): Promise<void>;
}

export interface LaunchOptions {
  headless: boolean;
  userAgent: string;
  viewport: { width: number; height: number };
  /** Browser executable; omitted means the one Playwright discovers. */
  executablePath?: string | undefined;
  channel?: string | undefined;
}

export type DriverFactory = (options: LaunchOptions) => Promise<BrowserDriver>;

export interface SessionSettings {
  headless: boolean;
  driverPath: string;
  browserChannel?: string | undefined;
  engine: SearchEngineProfile;
}
