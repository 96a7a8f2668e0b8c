import type { DriverErrorKind } from '../schema/outcome.js';

export type { DriverErrorKind };

// ── Driver errors ────────────────────────────────────────────

/**
 * Every failure surfacing from the driver abstraction carries a kind.
 * `session_fault` means the browser itself is unusable and must be
 * relaunched; the other kinds are page-level.
 */
export class DriverError extends Error {
  readonly kind: DriverErrorKind;

  constructor(kind: DriverErrorKind, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'DriverError';
    this.kind = kind;
  }
}

export function isSessionFault(err: unknown): boolean {
  return err instanceof DriverError && err.kind === 'session_fault';
}

// ── Launch errors ────────────────────────────────────────────

export class LaunchError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'LaunchError';
  }
}
