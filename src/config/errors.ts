// ── Error ────────────────────────────────────────────────────

/** Invalid or missing startup configuration. Always fatal. */
export class ConfigError extends Error {
  readonly exitCode = 4;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}
