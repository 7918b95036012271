import { ulid } from 'ulid';
import type {
  Job,
  CreateJobData,
  JobState,
  JobStats,
  TransitionFields,
  TransitionGuard,
} from '../types/job.js';
import { type FindByStateOptions, type JobRepository, newJob } from './base.js';
import { applyTransition, assertTransition } from './transitions.js';

export interface InMemoryJobRepositoryOptions {
  defaultMaxAttempts?: number;
  now?: () => Date;
}

/**
 * Single-process store. The compare-and-transition runs without awaiting
 * between the read and the write, so the event loop makes it atomic.
 */
export class InMemoryJobRepository implements JobRepository {
  private jobs = new Map<string, Job>();
  private readonly defaultMaxAttempts: number;
  private readonly now: () => Date;

  constructor(options: InMemoryJobRepositoryOptions = {}) {
    this.defaultMaxAttempts = options.defaultMaxAttempts ?? 3;
    this.now = options.now ?? (() => new Date());
  }

  async create(data: CreateJobData): Promise<Job> {
    const job = newJob(ulid(), data, this.defaultMaxAttempts, this.now());
    this.jobs.set(job.id, job);
    return clone(job);
  }

  async get(id: string): Promise<Job | null> {
    const job = this.jobs.get(id);
    return job ? clone(job) : null;
  }

  async compareAndTransition(
    id: string,
    expected: JobState,
    next: JobState,
    fields: TransitionFields = {},
    guard: TransitionGuard = {}
  ): Promise<Job | null> {
    assertTransition(expected, next, fields);

    const job = this.jobs.get(id);
    if (!job) return null;

    const updated = applyTransition(job, expected, next, fields, guard.leaseId, this.now());
    if (!updated) return null;

    this.jobs.set(id, updated);
    return clone(updated);
  }

  async findByState(state: JobState, options: FindByStateOptions): Promise<Job[]> {
    return Array.from(this.jobs.values())
      .filter(job => job.state === state && job.updatedAt < options.updatedBefore)
      .sort((a, b) => a.updatedAt.getTime() - b.updatedAt.getTime())
      .slice(0, options.limit)
      .map(clone);
  }

  async delete(id: string): Promise<boolean> {
    return this.jobs.delete(id);
  }

  async getStats(): Promise<JobStats> {
    const stats: JobStats = { queued: 0, running: 0, succeeded: 0, failed: 0, expired: 0 };
    for (const job of this.jobs.values()) {
      stats[job.state]++;
    }
    return stats;
  }

  async findByIdempotencyKey(idempotencyKey: string, withinHours = 24): Promise<Job | null> {
    const cutoff = new Date(this.now().getTime() - withinHours * 60 * 60 * 1000);

    for (const job of this.jobs.values()) {
      if (job.idempotencyKey === idempotencyKey && job.createdAt >= cutoff) {
        return clone(job);
      }
    }

    return null;
  }
}

// Callers get copies so nothing mutates stored records outside a transition.
function clone(job: Job): Job {
  return { ...job, inputRefs: [...job.inputRefs] };
}
