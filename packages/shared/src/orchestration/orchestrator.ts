/**
 * Orchestrator
 *
 * Runs every pass over every non-excluded segment. Jobs within a pass share
 * a bounded worker pool; a pass drains completely before the next starts.
 * Each job retries transient failures with capped exponential backoff, and a
 * failed job never affects its siblings. A wall-clock budget stops new
 * dispatches; calls already in flight finish normally.
 */

import type { OrchestrationPolicy } from '../config';
import { deepFreeze } from '../config';
import { buildPassContext } from '../aggregation/aggregator';
import type { CallAdapter } from '../extraction/adapter';
import { orderPasses } from '../extraction/passes';
import { errorMessage } from '../errors';
import { logger } from '../logger';
import {
  extractionCallDurationHistogram,
  extractionCallsCounter,
  extractionRetriesCounter,
  passesSkippedCounter,
} from '../metrics';
import type {
  CallFailureKind,
  DiagnosticEvent,
  DiagnosticEventKind,
  ExtractionPass,
  ExtractionResult,
  PassContext,
  PassName,
  Segment,
  SkippedPass,
} from '../types';
import { CircuitBreaker, type CircuitBreakerStatus } from './circuit-breaker';
import { createJob, transitionJob, type JobRecord } from './job-state';
import { computeBackoffMs, isRetryable, sleep } from './retry';
import { WorkerPool } from './worker-pool';

export interface OrchestrationOptions {
  /** Skip passes flagged expensive regardless of segment count. */
  skipExpensivePasses?: boolean;
}

export interface OrchestrationOutcome {
  results: ExtractionResult[];
  jobs: JobRecord[];
  executedPasses: PassName[];
  skippedPasses: SkippedPass[];
  events: DiagnosticEvent[];
  budgetExhausted: boolean;
  peakConcurrency: number;
  circuit: CircuitBreakerStatus;
  elapsedMs: number;
}

interface RunState {
  deadline: number;
  pool: WorkerPool;
  breaker: CircuitBreaker;
  events: DiagnosticEvent[];
  budgetExhausted: boolean;
}

const FAILURE_EVENT: Record<CallFailureKind, DiagnosticEventKind> = {
  CallTimeout: 'CallTimeout',
  CallServiceError: 'CallServiceError',
  CallMalformedResponse: 'CallMalformedResponse',
  CircuitOpen: 'CircuitOpen',
};

export interface OrchestratorDependencies {
  adapter: CallAdapter;
  policy: OrchestrationPolicy;
  now?: () => number;
}

export class Orchestrator {
  private readonly adapter: CallAdapter;
  private readonly policy: OrchestrationPolicy;
  private readonly now: () => number;

  constructor(deps: OrchestratorDependencies) {
    this.adapter = deps.adapter;
    this.policy = deps.policy;
    this.now = deps.now ?? Date.now;
  }

  async run(
    segments: readonly Segment[],
    passes: readonly ExtractionPass[],
    options: OrchestrationOptions = {}
  ): Promise<OrchestrationOutcome> {
    const startedAt = this.now();
    const ordered = orderPasses(passes);
    const active = segments.filter((segment) => !segment.excluded);

    const state: RunState = {
      deadline: startedAt + this.policy.runBudgetMs,
      pool: new WorkerPool(this.policy.concurrency),
      breaker: new CircuitBreaker(this.policy.circuitBreaker, this.now),
      events: [],
      budgetExhausted: false,
    };

    // Decided once, before any pass runs.
    const skipExpensive =
      options.skipExpensivePasses === true || active.length > this.policy.largeDocumentSegmentThreshold;

    const results: ExtractionResult[] = [];
    const jobs: JobRecord[] = [];
    const executedPasses: PassName[] = [];
    const skippedPasses: SkippedPass[] = [];
    const orderedNames = ordered.map((pass) => pass.name);

    for (const pass of ordered) {
      if (skipExpensive && pass.expensive) {
        this.skipPass(pass, 'document_size', skippedPasses, state);
        continue;
      }
      if (state.budgetExhausted || this.now() >= state.deadline) {
        this.markBudgetExhausted(state);
        this.skipPass(pass, 'budget', skippedPasses, state);
        continue;
      }

      const dependencies = orderedNames.filter((name) => pass.dependsOn.includes(name));
      const context = buildPassContext(results, dependencies, segments);
      const passJobs = active.map((segment) => createJob(segment.id, pass.name));
      jobs.push(...passJobs);

      logger.info('Pass started', {
        pass: pass.name,
        jobs: passJobs.length,
        contextFields: Object.keys(context.fields).length,
      });
      const passStartedAt = this.now();

      // One slot per job; completion order does not matter.
      const slots = await Promise.all(
        active.map((segment, i) => this.runJob(passJobs[i], segment, pass, context, state))
      );
      for (const slot of slots) {
        if (slot) results.push(slot);
      }
      executedPasses.push(pass.name);

      logger.info('Pass finished', {
        pass: pass.name,
        succeeded: passJobs.filter((job) => job.state === 'succeeded').length,
        failed: passJobs.filter((job) => job.state === 'failed').length,
        durationMs: this.now() - passStartedAt,
      });
    }

    return {
      results,
      jobs,
      executedPasses,
      skippedPasses,
      events: state.events,
      budgetExhausted: state.budgetExhausted,
      peakConcurrency: state.pool.peakInFlight,
      circuit: state.breaker.getStatus(),
      elapsedMs: this.now() - startedAt,
    };
  }

  private skipPass(
    pass: ExtractionPass,
    reason: SkippedPass['reason'],
    skippedPasses: SkippedPass[],
    state: RunState
  ): void {
    skippedPasses.push({ passName: pass.name, reason });
    state.events.push({ kind: 'PassSkipped', passName: pass.name, message: `${pass.name} skipped: ${reason}` });
    passesSkippedCounter.inc({ pass: pass.name, reason });
    logger.info('Pass skipped', { pass: pass.name, reason });
  }

  private markBudgetExhausted(state: RunState): void {
    if (state.budgetExhausted) return;
    state.budgetExhausted = true;
    state.events.push({
      kind: 'RunBudgetExhausted',
      message: `Run budget of ${this.policy.runBudgetMs}ms exhausted`,
    });
    logger.warn('Run budget exhausted', { runBudgetMs: this.policy.runBudgetMs });
  }

  /**
   * Drive one job to a terminal state. Resolves with the last attempt's
   * result, or undefined when nothing was attempted. Never rejects.
   */
  private async runJob(
    job: JobRecord,
    segment: Segment,
    pass: ExtractionPass,
    context: PassContext,
    state: RunState
  ): Promise<ExtractionResult | undefined> {
    let last: ExtractionResult | undefined;
    const maxAttempts = this.policy.maxRetries + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      const outcome = await state.pool.run(async () => {
        if (this.now() >= state.deadline) {
          return undefined;
        }
        transitionJob(job, 'dispatched');
        job.attempts = attempt;
        if (!state.breaker.canDispatch()) {
          return this.circuitOpenResult(segment, pass, attempt, state);
        }
        const result = await this.safeCall(segment, pass, context, attempt);
        if (state.breaker.record(result)) {
          state.events.push({
            kind: 'CircuitOpen',
            message: 'Circuit breaker opened',
            passName: pass.name,
            segmentId: segment.id,
          });
        }
        extractionCallsCounter.inc({ pass: pass.name, status: result.status });
        extractionCallDurationHistogram.observe({ pass: pass.name }, result.durationMs / 1000);
        return result;
      });

      if (!outcome) {
        this.markBudgetExhausted(state);
        job.closedByBudget = true;
        transitionJob(job, 'failed');
        if (last) this.recordFailure(last, segment, pass, state);
        break;
      }

      last = outcome;
      job.history.push(outcome.status);

      if (outcome.status === 'ok' || outcome.status === 'skipped') {
        transitionJob(job, 'succeeded');
        break;
      }

      const retryable = isRetryable(outcome, this.policy) && attempt < maxAttempts;
      const delay = computeBackoffMs(attempt, this.policy);
      if (retryable && this.now() + delay >= state.deadline) {
        this.markBudgetExhausted(state);
        job.closedByBudget = true;
      }
      if (!retryable || job.closedByBudget) {
        transitionJob(job, 'failed');
        this.recordFailure(outcome, segment, pass, state);
        break;
      }

      transitionJob(job, 'retrying');
      extractionRetriesCounter.inc({ pass: pass.name, status: outcome.status });
      logger.warn('Retrying extraction job', {
        jobId: job.id,
        attempt,
        status: outcome.status,
        error: outcome.error?.message,
        backoffMs: delay,
      });
      await sleep(delay);
    }

    return last;
  }

  private recordFailure(result: ExtractionResult, segment: Segment, pass: ExtractionPass, state: RunState): void {
    state.events.push({
      kind: result.error ? FAILURE_EVENT[result.error.kind] : 'CallServiceError',
      message: result.error?.message ?? `${pass.name} failed with status ${result.status}`,
      segmentId: segment.id,
      passName: pass.name,
    });
    logger.warn('Extraction job failed', {
      segmentId: segment.id,
      pass: pass.name,
      status: result.status,
      attempts: result.attempts,
      error: result.error?.message,
    });
  }

  private async safeCall(
    segment: Segment,
    pass: ExtractionPass,
    context: PassContext,
    attempt: number
  ): Promise<ExtractionResult> {
    try {
      return await this.adapter.call(segment, pass, context, attempt);
    } catch (error) {
      logger.error('Call adapter threw', error, { segmentId: segment.id, pass: pass.name });
      return deepFreeze<ExtractionResult>({
        segmentId: segment.id,
        passName: pass.name,
        status: 'serviceError',
        fields: {},
        warnings: [],
        attempts: attempt,
        truncated: false,
        durationMs: 0,
        error: { kind: 'CallServiceError', message: errorMessage(error), retryable: false },
      });
    }
  }

  private circuitOpenResult(
    segment: Segment,
    pass: ExtractionPass,
    attempt: number,
    state: RunState
  ): ExtractionResult {
    const status = state.breaker.getStatus();
    return deepFreeze<ExtractionResult>({
      segmentId: segment.id,
      passName: pass.name,
      status: 'serviceError',
      fields: {},
      warnings: [],
      attempts: attempt,
      truncated: false,
      durationMs: 0,
      error: {
        kind: 'CircuitOpen',
        message: `Circuit breaker open; recovery in ${status.timeToRecoveryMs ?? 0}ms`,
        retryable: true,
      },
    });
  }
}
