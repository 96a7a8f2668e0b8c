/**
 * Core module: the search-cycle loop and its query source.
 * No browser or filesystem access of its own: those arrive as collaborators.
 */

export { CycleOrchestrator, toRunLogRow } from './orchestrator.js';
export type {
  OrchestratorDeps,
  QuerySource,
  SearchSession,
  RunLogSink,
} from './orchestrator.js';
export { RunContext } from './context.js';
export {
  QueryGenerator,
  QueryRejectedError,
  cleanQuery,
  validateQuery,
  DEFAULT_GENERATION_POLICY,
} from './queryGenerator.js';
export type { QueryGeneratorDeps, PromptParameters } from './queryGenerator.js';
export { SearchHistory } from './history.js';
export {
  retry,
  backoffDelay,
  waitForCondition,
  ConditionTimeoutError,
} from './retry.js';
export type { RetryPolicy, RetryOptions, RetryResult, WaitOptions } from './retry.js';
