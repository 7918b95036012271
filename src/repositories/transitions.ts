import type { Job, JobState, TransitionFields } from '../types/job.js';

export class IllegalTransitionError extends Error {
  constructor(readonly from: JobState, readonly to: JobState, reason: string) {
    super(`Illegal transition ${from} -> ${to}: ${reason}`);
    this.name = 'IllegalTransitionError';
  }
}

const EDGES: Record<JobState, readonly JobState[]> = {
  queued: ['running', 'expired', 'queued'],
  running: ['running', 'succeeded', 'failed', 'queued'],
  succeeded: [],
  failed: [],
  expired: [],
};

export function canTransition(from: JobState, to: JobState): boolean {
  return EDGES[from].includes(to);
}

/**
 * Checks an edge and the fields it carries before any store is touched, so
 * every implementation keeps outputRef/error/attemptCount consistent with state.
 */
export function assertTransition(from: JobState, to: JobState, fields: TransitionFields): void {
  if (!canTransition(from, to)) {
    throw new IllegalTransitionError(from, to, 'edge not allowed');
  }
  if ((to === 'succeeded') !== (fields.outputRef !== undefined)) {
    throw new IllegalTransitionError(from, to, 'outputRef is set exactly when entering succeeded');
  }
  const entersErrorState = to === 'failed' || to === 'expired';
  if (entersErrorState !== (fields.error !== undefined)) {
    throw new IllegalTransitionError(from, to, 'error is set exactly when entering failed or expired');
  }
  if (fields.incrementAttempt && !(from === 'queued' && to === 'running')) {
    throw new IllegalTransitionError(from, to, 'attempts only increase when a worker claims a job');
  }
  if (fields.releaseAttempt && !(from === 'running' && to === 'queued')) {
    throw new IllegalTransitionError(from, to, 'attempts are only released when a worker hands a job back');
  }
  if (from === 'queued' && to === 'queued' && Object.keys(fields).length > 0) {
    throw new IllegalTransitionError(from, to, 'a redelivery only touches updatedAt');
  }
}

/** Pure application of a checked transition; returns null when the record does not match. */
export function applyTransition(
  job: Job,
  expected: JobState,
  next: JobState,
  fields: TransitionFields,
  leaseId: string | undefined,
  now: Date
): Job | null {
  if (job.state !== expected) return null;
  if (leaseId !== undefined && job.leaseId !== leaseId) return null;
  if (fields.incrementAttempt && job.attemptCount >= job.maxAttempts) return null;

  const { incrementAttempt, releaseAttempt, ...rest } = fields;
  let attemptCount = job.attemptCount;
  if (incrementAttempt) attemptCount++;
  if (releaseAttempt) attemptCount = Math.max(0, attemptCount - 1);

  return {
    ...job,
    ...rest,
    state: next,
    attemptCount,
    updatedAt: now,
  };
}
