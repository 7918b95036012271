export type JobState = 'queued' | 'running' | 'succeeded' | 'failed' | 'expired';

export const JOB_STATES: readonly JobState[] = ['queued', 'running', 'succeeded', 'failed', 'expired'];

export const TERMINAL_STATES: readonly JobState[] = ['succeeded', 'failed', 'expired'];

export type JobKind = 'promo-video' | 'image-to-video' | 'text-to-image' | 'split-screen';

export type ErrorType =
  | 'ValidationError'
  | 'TransientInfraError'
  | 'TransientUpstreamError'
  | 'PermanentJobError'
  | 'ExpiredError';

export interface JobError {
  type: ErrorType;
  code: string;
  message: string;
  retryable: boolean;
  attempt: number;
  step?: string;
  occurredAt: string; // ISO
}

export interface Job {
  id: string; // ULID
  kind: JobKind;
  state: JobState;
  inputRefs: string[];
  params: unknown; // JSON
  outputRef: string | null;
  error: JobError | null;
  lastError: JobError | null;
  attemptCount: number;
  maxAttempts: number;
  leaseId: string | null;
  startedAt: Date | null;
  finishedAt: Date | null;
  lastHeartbeatAt: Date | null;
  idempotencyKey: string | null;
  createdAt: Date;
  updatedAt: Date;
}

export interface CreateJobData {
  kind: JobKind;
  inputRefs: string[];
  params?: unknown;
  maxAttempts?: number;
  idempotencyKey?: string;
}

/**
 * Fields a transition may write. `null` clears a nullable field; omitted
 * fields are left untouched.
 */
export interface TransitionFields {
  outputRef?: string;
  error?: JobError;
  lastError?: JobError;
  leaseId?: string | null;
  startedAt?: Date;
  finishedAt?: Date;
  lastHeartbeatAt?: Date;
  incrementAttempt?: boolean;
  /** Hands back the attempt of a run that was interrupted by a worker shutdown. */
  releaseAttempt?: boolean;
}

export interface TransitionGuard {
  leaseId?: string;
}

export type JobStats = Record<JobState, number>;

/** True until a worker has claimed the job at least once; only such jobs expire. */
export function hasNeverRun(job: Job): boolean {
  return job.attemptCount === 0 && job.startedAt === null;
}
