import { ExpiredError, TransientInfraError, toJobError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { TaskQueue } from '../queue/base.js';
import type { JobRepository } from '../repositories/base.js';
import type { ArtifactStore } from '../storage/base.js';
import { type Job, TERMINAL_STATES, hasNeverRun } from '../types/job.js';

export interface ReaperConfig {
  intervalMs: number;
  queuedTtlMs: number;
  /** A queued job that ran before and has not changed for this long gets a fresh message. */
  redeliverAfterMs: number;
  staleRunningMs: number;
  retentionMs: number;
  batchSize: number;
}

export interface ReaperDependencies {
  repo: JobRepository;
  queue: TaskQueue;
  store: ArtifactStore;
  log: Logger;
  now?: () => Date;
}

export interface SweepResult {
  expired: number;
  redelivered: number;
  requeued: number;
  failed: number;
  deleted: number;
}

/**
 * Periodic maintenance: expires jobs that sat queued past their TTL, re-enqueues
 * retries whose message was lost, recovers running jobs whose worker stopped
 * heartbeating, and prunes old terminal records with their output artifacts.
 */
export class JobReaper {
  private timer?: NodeJS.Timeout;
  private isRunning = false;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(private deps: ReaperDependencies, private config: ReaperConfig) {
    this.now = deps.now ?? (() => new Date());
    this.log = deps.log.child({ component: 'reaper' });
  }

  start(): void {
    if (this.isRunning) return;
    this.isRunning = true;
    this.scheduleNext();
  }

  stop(): void {
    this.isRunning = false;
    if (this.timer) {
      clearTimeout(this.timer);
    }
  }

  async sweep(): Promise<SweepResult> {
    const result: SweepResult = { expired: 0, redelivered: 0, requeued: 0, failed: 0, deleted: 0 };
    const now = this.now();

    await this.expireQueued(now, result);
    await this.redeliverQueued(now, result);
    await this.recoverStale(now, result);
    await this.pruneTerminal(now, result);

    if (Object.values(result).some(count => count > 0)) {
      this.log.info(result, 'Sweep finished');
    }
    return result;
  }

  private scheduleNext(): void {
    if (!this.isRunning) return;

    this.timer = setTimeout(() => {
      void this.sweep()
        .catch(error => this.log.error({ err: error }, 'Sweep failed'))
        .finally(() => this.scheduleNext());
    }, this.config.intervalMs);
  }

  private async expireQueued(now: Date, result: SweepResult): Promise<void> {
    const cutoff = new Date(now.getTime() - this.config.queuedTtlMs);
    const jobs = await this.deps.repo.findByState('queued', { updatedBefore: cutoff, limit: this.config.batchSize });

    for (const job of jobs) {
      // Requeued retries keep their place; only jobs that never ran expire.
      if (!hasNeverRun(job) || job.createdAt >= cutoff) continue;

      const expired = await this.deps.repo.compareAndTransition(job.id, 'queued', 'expired', {
        error: toJobError(new ExpiredError(), 0, now),
        finishedAt: now,
      });
      if (expired) result.expired++;
    }
  }

  private async redeliverQueued(now: Date, result: SweepResult): Promise<void> {
    const { repo } = this.deps;
    const cutoff = new Date(now.getTime() - this.config.redeliverAfterMs);
    const jobs = await repo.findByState('queued', { updatedBefore: cutoff, limit: this.config.batchSize });

    for (const job of jobs) {
      // Jobs that never ran are left to the TTL.
      if (hasNeverRun(job)) continue;

      // Touching updatedAt spaces out redeliveries of the same job.
      const touched = await repo.compareAndTransition(job.id, 'queued', 'queued', {});
      if (touched && (await this.enqueue(job.id))) {
        result.redelivered++;
        this.log.warn({ jobId: job.id, attempt: job.attemptCount }, 'Redelivered queued job');
      }
    }
  }

  private async enqueue(jobId: string): Promise<boolean> {
    try {
      await this.deps.queue.enqueue(jobId);
      return true;
    } catch (error) {
      this.log.warn({ jobId, err: error }, 'Could not enqueue job; retrying on a later sweep');
      return false;
    }
  }

  private async recoverStale(now: Date, result: SweepResult): Promise<void> {
    const { repo } = this.deps;
    const cutoff = new Date(now.getTime() - this.config.staleRunningMs);
    const jobs = await repo.findByState('running', { updatedBefore: cutoff, limit: this.config.batchSize });

    for (const job of jobs) {
      if (!isStale(job, cutoff) || !job.leaseId) continue;

      const error = toJobError(
        new TransientInfraError('LEASE_EXPIRED', 'Worker stopped heartbeating', { step: 'heartbeat' }),
        job.attemptCount,
        now
      );
      const guard = { leaseId: job.leaseId };

      if (job.attemptCount >= job.maxAttempts) {
        const failed = await repo.compareAndTransition(job.id, 'running', 'failed', { error, leaseId: null, finishedAt: now }, guard);
        if (failed) result.failed++;
        continue;
      }

      const requeued = await repo.compareAndTransition(job.id, 'running', 'queued', { lastError: error, leaseId: null }, guard);
      if (requeued) {
        result.requeued++;
        this.log.warn({ jobId: job.id, attempt: job.attemptCount }, 'Recovered stale running job');
        // Without a message the job is picked up by a later redelivery sweep.
        await this.enqueue(job.id);
      }
    }
  }

  private async pruneTerminal(now: Date, result: SweepResult): Promise<void> {
    const { repo, store } = this.deps;
    const cutoff = new Date(now.getTime() - this.config.retentionMs);

    for (const state of TERMINAL_STATES) {
      const jobs = await repo.findByState(state, { updatedBefore: cutoff, limit: this.config.batchSize });

      for (const job of jobs) {
        if (job.outputRef) {
          try {
            await store.delete(store.parseRef(job.outputRef));
          } catch (error) {
            // Keep the record so the next sweep retries the artifact.
            this.log.warn({ jobId: job.id, err: error }, 'Could not delete artifact');
            continue;
          }
        }
        if (await repo.delete(job.id)) result.deleted++;
      }
    }
  }
}

function isStale(job: Job, cutoff: Date): boolean {
  const lastSeen = job.lastHeartbeatAt ?? job.startedAt ?? job.updatedAt;
  return lastSeen < cutoff;
}
