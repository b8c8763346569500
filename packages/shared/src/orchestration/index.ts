export { Orchestrator, type OrchestrationOptions, type OrchestrationOutcome, type OrchestratorDependencies } from './orchestrator';
export { WorkerPool } from './worker-pool';
export { CircuitBreaker, isTransientFailure, type CircuitBreakerStatus, type CircuitState } from './circuit-breaker';
export { computeBackoffMs, isRetryable, sleep } from './retry';
export {
  createJob,
  transitionJob,
  canTransition,
  isTerminal,
  IllegalTransitionError,
  type JobRecord,
  type JobState,
} from './job-state';
