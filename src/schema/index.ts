/**
 * Schema module: zod schemas and the types inferred from them.
 * Config files, the resolved run config and run-log rows are parsed
 * through these; the remaining schemas only supply types.
 */

export * from './query.js';
export * from './outcome.js';
export * from './config.js';
