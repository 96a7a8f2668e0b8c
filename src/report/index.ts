/**
 * Report module.
 * The per-run CSV record and the end-of-run summary block.
 */

export {
  RunLogger,
  RunLogError,
  RUN_LOG_HEADER,
  runLogFileName,
  formatRow,
} from './runLog.js';
export { formatSummary, formatDuration } from './summary.js';
