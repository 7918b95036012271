import type {
  Job,
  CreateJobData,
  JobState,
  JobStats,
  TransitionFields,
  TransitionGuard,
} from '../types/job.js';

export interface FindByStateOptions {
  updatedBefore: Date;
  limit: number;
}

export interface JobRepository {
  create(data: CreateJobData): Promise<Job>;
  get(id: string): Promise<Job | null>;

  /**
   * The only way a job changes after creation. Atomically moves `id` from
   * `expected` to `next`, writing `fields`; returns the updated job, or null
   * (and writes nothing) when the record is missing, is not in `expected`,
   * is held under another lease, or would exceed its attempt budget.
   * Throws IllegalTransitionError for edges the state machine does not allow.
   */
  compareAndTransition(
    id: string,
    expected: JobState,
    next: JobState,
    fields?: TransitionFields,
    guard?: TransitionGuard
  ): Promise<Job | null>;

  /** Oldest first by last update. */
  findByState(state: JobState, options: FindByStateOptions): Promise<Job[]>;
  delete(id: string): Promise<boolean>;
  getStats(): Promise<JobStats>;

  // Idempotency support
  findByIdempotencyKey(idempotencyKey: string, withinHours?: number): Promise<Job | null>;
}

export function newJob(id: string, data: CreateJobData, defaultMaxAttempts: number, now: Date): Job {
  return {
    id,
    kind: data.kind,
    state: 'queued',
    inputRefs: [...data.inputRefs],
    params: data.params ?? {},
    outputRef: null,
    error: null,
    lastError: null,
    attemptCount: 0,
    maxAttempts: data.maxAttempts ?? defaultMaxAttempts,
    leaseId: null,
    startedAt: null,
    finishedAt: null,
    lastHeartbeatAt: null,
    idempotencyKey: data.idempotencyKey ?? null,
    createdAt: now,
    updatedAt: now,
  };
}
