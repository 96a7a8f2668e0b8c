/**
 * CLI module: a thin wrapper over core.
 * Parses arguments, delegates to core, handles exit codes.
 * No business logic lives here.
 */

export { registerRunCommand, registerGenerateCommand, EXIT_CODES } from './run.js';
