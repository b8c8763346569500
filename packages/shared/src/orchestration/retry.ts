/**
 * Retry policy helpers.
 */

import type { OrchestrationPolicy } from '../config';
import type { ExtractionResult } from '../types';

/**
 * Delay before retry number `attempt` (1-based): base * 2^(attempt - 1),
 * capped at backoffMaxMs.
 */
export function computeBackoffMs(attempt: number, policy: Pick<OrchestrationPolicy, 'backoffBaseMs' | 'backoffMaxMs'>): number {
  return Math.min(policy.backoffMaxMs, policy.backoffBaseMs * Math.pow(2, Math.max(0, attempt - 1)));
}

export function isRetryable(result: ExtractionResult, policy: Pick<OrchestrationPolicy, 'retryMalformed'>): boolean {
  switch (result.status) {
    case 'timeout':
      return true;
    case 'malformed':
      return policy.retryMalformed;
    case 'serviceError':
      return result.error?.retryable ?? false;
    default:
      return false;
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
