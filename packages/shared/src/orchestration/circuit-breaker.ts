/**
 * Circuit Breaker
 *
 * One breaker per run. Consecutive transient failures (timeouts, retryable
 * service errors) open it; while open, attempts are not dispatched. After
 * the recovery time a half-open trial call is let through: success closes the
 * breaker, failure re-opens it. Malformed payloads never count, they are
 * not the service being unavailable.
 */

import type { CircuitBreakerPolicy } from '../config';
import { logger } from '../logger';
import type { ExtractionResult } from '../types';

export type CircuitState = 'closed' | 'open' | 'half_open';

export interface CircuitBreakerStatus {
  state: CircuitState;
  failureCount: number;
  trips: number;
  timeToRecoveryMs: number | null;
}

/** Whether a result should count against the breaker. */
export function isTransientFailure(result: ExtractionResult): boolean {
  if (result.status === 'timeout') return true;
  return result.status === 'serviceError' && result.error?.kind === 'CallServiceError' && result.error.retryable;
}

export class CircuitBreaker {
  private state: CircuitState = 'closed';
  private failureCount = 0;
  private trips = 0;
  private openedAt: number | null = null;

  constructor(
    private readonly policy: CircuitBreakerPolicy,
    private readonly now: () => number = Date.now
  ) {}

  /**
   * Whether an attempt may be dispatched now.
   */
  canDispatch(): boolean {
    this.checkRecovery();
    return this.state !== 'open';
  }

  /**
   * Feed a dispatched attempt's result. Returns true when this result
   * opened the breaker.
   */
  record(result: ExtractionResult): boolean {
    if (isTransientFailure(result)) {
      return this.recordFailure();
    }
    if (result.status === 'ok' || result.status === 'skipped') {
      this.recordSuccess();
    }
    return false;
  }

  getStatus(): CircuitBreakerStatus {
    this.checkRecovery();
    return {
      state: this.state,
      failureCount: this.failureCount,
      trips: this.trips,
      timeToRecoveryMs: this.state === 'open' ? this.timeToRecovery() : null,
    };
  }

  private checkRecovery(): void {
    if (this.state === 'open' && this.timeToRecovery() === 0) {
      logger.info('Circuit breaker half-open', { trips: this.trips });
      this.state = 'half_open';
    }
  }

  private timeToRecovery(): number {
    if (this.openedAt === null) return 0;
    return Math.max(0, this.policy.recoveryTimeMs - (this.now() - this.openedAt));
  }

  private recordSuccess(): void {
    if (this.state === 'half_open') {
      logger.info('Circuit breaker closed after successful trial call', { trips: this.trips });
      this.state = 'closed';
      this.openedAt = null;
    }
    this.failureCount = 0;
  }

  private recordFailure(): boolean {
    this.failureCount++;
    if (this.state === 'open') {
      return false;
    }
    if (this.state === 'half_open' || this.failureCount >= this.policy.failureThreshold) {
      this.state = 'open';
      this.openedAt = this.now();
      this.trips++;
      logger.warn('Circuit breaker opened', {
        failureCount: this.failureCount,
        trips: this.trips,
        recoveryTimeMs: this.policy.recoveryTimeMs,
      });
      return true;
    }
    return false;
  }
}
