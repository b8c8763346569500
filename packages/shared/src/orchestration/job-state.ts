/**
 * Job state machine for one (segment, pass) job.
 *
 *   pending -> dispatched -> succeeded
 *                         -> failed
 *                         -> retrying -> dispatched
 *   pending | retrying -> failed          (run budget closed)
 */

import type { ExtractionStatus, PassName } from '../types';

export type JobState = 'pending' | 'dispatched' | 'retrying' | 'succeeded' | 'failed';

const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  pending: ['dispatched', 'failed'],
  dispatched: ['succeeded', 'failed', 'retrying'],
  retrying: ['dispatched', 'failed'],
  succeeded: [],
  failed: [],
};

export interface JobRecord {
  readonly id: string;
  readonly segmentId: string;
  readonly passName: PassName;
  state: JobState;
  attempts: number;
  /** Status of every attempt, in order. */
  history: ExtractionStatus[];
  /** True when the run budget closed before the job finished. */
  closedByBudget: boolean;
}

export class IllegalTransitionError extends Error {
  constructor(job: JobRecord, to: JobState) {
    super(`Job ${job.id}: illegal transition ${job.state} -> ${to}`);
    this.name = 'IllegalTransitionError';
  }
}

export function createJob(segmentId: string, passName: PassName): JobRecord {
  return {
    id: `${passName}:${segmentId}`,
    segmentId,
    passName,
    state: 'pending',
    attempts: 0,
    history: [],
    closedByBudget: false,
  };
}

export function canTransition(from: JobState, to: JobState): boolean {
  return TRANSITIONS[from].includes(to);
}

export function transitionJob(job: JobRecord, to: JobState): void {
  if (!canTransition(job.state, to)) {
    throw new IllegalTransitionError(job, to);
  }
  job.state = to;
}

export function isTerminal(state: JobState): boolean {
  return TRANSITIONS[state].length === 0;
}
