/**
 * Browser execution module.
 * Owns the single live browser session. No LLM calls.
 * Types queries like a person, waits for results, reports an outcome.
 */

export { BrowserSession } from './session.js';
export type { SessionState, BrowserSessionDeps } from './session.js';
export { HumanInteractionSimulator } from './human.js';
export type { HumanInteractionDeps } from './human.js';
export { launchPlaywrightDriver } from './playwright.js';
export { buildLaunchOptions, USER_AGENTS, STEALTH_ARGS } from './fingerprint.js';
export { DriverError, LaunchError, isSessionFault } from './errors.js';
export type { DriverErrorKind } from './errors.js';
export type {
  BrowserDriver,
  DriverFactory,
  LaunchOptions,
  SessionSettings,
} from './driver.js';
