import path from 'node:path';
import { ulid } from 'ulid';
import {
  ExpiredError,
  PermanentJobError,
  TransientInfraError,
  TransientUpstreamError,
  errorMessage,
  toJobError,
} from '../errors.js';
import type { JobContext, JobHandlerRegistry } from '../handlers/index.js';
import type { Logger } from '../logger.js';
import type { MediaTransformEngine } from '../media/engine.js';
import type { Delivery, TaskQueue } from '../queue/base.js';
import type { JobRepository } from '../repositories/base.js';
import {
  type ArtifactLocation,
  type ArtifactStore,
  ArtifactExistsError,
  ArtifactNotFoundError,
  InvalidArtifactRefError,
  outputKey,
} from '../storage/base.js';
import { type Job, hasNeverRun } from '../types/job.js';
import { backoffDelay } from '../utils/retry.js';

export interface WorkerConfig {
  concurrency: number;
  pollIntervalMs: number;
  jobMaxRunMs: number;
  heartbeatIntervalMs: number;
  queuedTtlMs: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  stopGraceMs?: number;
}

export interface WorkerDependencies {
  repo: JobRepository;
  queue: TaskQueue;
  store: ArtifactStore;
  engine: MediaTransformEngine;
  handlers: JobHandlerRegistry;
  log: Logger;
  now?: () => Date;
  random?: () => number;
}

export interface WorkerStats {
  running: number;
  succeeded: number;
  failed: number;
  retried: number;
  expired: number;
  duplicates: number;
  released: number;
}

const WORKER_STOPPING = 'WORKER_STOPPING';

function isShutdown(error: unknown): boolean {
  return error instanceof TransientInfraError && error.code === WORKER_STOPPING;
}

export class JobWorker {
  private isRunning = false;
  private runningJobs = new Map<string, AbortController>();
  private inFlight = new Set<Promise<void>>();
  private stats: WorkerStats = {
    running: 0,
    succeeded: 0,
    failed: 0,
    retried: 0,
    expired: 0,
    duplicates: 0,
    released: 0,
  };
  private pollTimer?: NodeJS.Timeout;
  private readonly now: () => Date;
  private readonly random: () => number;
  private readonly log: Logger;

  constructor(private deps: WorkerDependencies, private config: WorkerConfig) {
    this.now = deps.now ?? (() => new Date());
    this.random = deps.random ?? Math.random;
    this.log = deps.log.child({ component: 'worker' });
  }

  async start(): Promise<void> {
    if (this.isRunning) return;

    this.isRunning = true;
    this.log.info({ concurrency: this.config.concurrency }, 'Worker started');
    this.scheduleNextPoll();
  }

  async stop(): Promise<void> {
    if (!this.isRunning) return;

    this.isRunning = false;

    if (this.pollTimer) {
      clearTimeout(this.pollTimer);
    }

    for (const controller of this.runningJobs.values()) {
      controller.abort(new TransientInfraError(WORKER_STOPPING, 'Worker is shutting down', { step: 'run' }));
    }

    const gracePeriod = this.config.stopGraceMs ?? 5000;
    const start = Date.now();
    while (this.inFlight.size > 0 && Date.now() - start < gracePeriod) {
      await new Promise(resolve => setTimeout(resolve, 50));
    }

    this.log.info({ abandoned: this.inFlight.size }, 'Worker stopped');
  }

  getStats(): WorkerStats {
    return { ...this.stats };
  }

  /**
   * Takes one delivery from the queue and runs it to completion. Returns false
   * when the queue had nothing ready.
   */
  async processNext(): Promise<boolean> {
    const delivery = await this.deps.queue.dequeue();
    if (!delivery) return false;

    await this.handleDelivery(delivery);
    return true;
  }

  private scheduleNextPoll(): void {
    if (!this.isRunning) return;

    this.pollTimer = setTimeout(() => {
      void this.pollAndExecute().finally(() => {
        this.scheduleNextPoll();
      });
    }, this.config.pollIntervalMs);
  }

  private async pollAndExecute(): Promise<void> {
    try {
      // Only dequeue when a slot is free.
      while (this.isRunning && this.inFlight.size < this.config.concurrency) {
        const delivery = await this.deps.queue.dequeue();
        if (!delivery) return;

        const task: Promise<void> = this.handleDelivery(delivery)
          .catch(error => {
            this.log.error({ jobId: delivery.message.jobId, err: error }, 'Delivery handling failed');
          })
          .finally(() => {
            this.inFlight.delete(task);
          });
        this.inFlight.add(task);
      }
    } catch (error) {
      this.log.error({ err: error }, 'Error in poll and execute');
    }
  }

  private async handleDelivery(delivery: Delivery): Promise<void> {
    const { message, token } = delivery;
    const { repo, queue } = this.deps;
    const log = this.log.child({ jobId: message.jobId, deliveryAttempt: message.deliveryAttempt });

    const job = await repo.get(message.jobId);
    if (!job) {
      log.warn('Job record missing, discarding message');
      await queue.ack(token);
      return;
    }

    if (job.state !== 'queued') {
      log.debug({ state: job.state }, 'Job is not queued, discarding duplicate message');
      this.stats.duplicates++;
      await queue.ack(token);
      return;
    }

    const now = this.now();
    if (hasNeverRun(job) && now.getTime() - job.createdAt.getTime() > this.config.queuedTtlMs) {
      const expired = await repo.compareAndTransition(job.id, 'queued', 'expired', {
        error: toJobError(new ExpiredError(), 0, now),
        finishedAt: now,
      });
      if (expired) {
        this.stats.expired++;
        log.info('Job expired before it could run');
      }
      await queue.ack(token);
      return;
    }

    const leaseId = ulid();
    const claimed = await repo.compareAndTransition(
      job.id,
      'queued',
      'running',
      { incrementAttempt: true, leaseId, startedAt: now, lastHeartbeatAt: now }
    );
    if (!claimed) {
      log.debug('Job already claimed, discarding duplicate message');
      this.stats.duplicates++;
      await queue.ack(token);
      return;
    }

    await this.runClaimed(claimed, leaseId, delivery, log.child({ attempt: claimed.attemptCount }));
  }

  private async runClaimed(job: Job, leaseId: string, delivery: Delivery, log: Logger): Promise<void> {
    const { repo, queue, engine } = this.deps;
    const controller = new AbortController();
    this.runningJobs.set(job.id, controller);
    this.stats.running++;

    const timeoutHandle = setTimeout(() => {
      controller.abort(new TransientUpstreamError('JOB_TIMEOUT', `Job exceeded ${this.config.jobMaxRunMs}ms`, { step: 'run' }));
    }, this.config.jobMaxRunMs);

    const heartbeat = async () => {
      const renewed = await repo.compareAndTransition(job.id, 'running', 'running', { lastHeartbeatAt: this.now() }, { leaseId });
      if (!renewed) {
        controller.abort(new TransientInfraError('LEASE_LOST', 'Another worker owns this job', { step: 'heartbeat' }));
      }
    };
    const heartbeatTimer = setInterval(() => {
      void heartbeat().catch(error => log.warn({ err: error }, 'Heartbeat failed'));
    }, this.config.heartbeatIntervalMs);

    try {
      log.info({ kind: job.kind }, 'Job started');

      const outputRef = await raceAbort(
        engine.withWorkspace(job.id, async workspace => {
          const handler = this.deps.handlers.get(job.kind);
          if (!handler) {
            throw new PermanentJobError('UNSUPPORTED_KIND', `No handler for job kind ${job.kind}`, { step: 'dispatch' });
          }

          const context: JobContext = {
            job,
            workspace,
            signal: controller.signal,
            heartbeat,
            fetchInput: (index, name) => this.fetchInput(job, workspace, index, name),
            log,
          };
          const produced = await handler.execute(context);
          controller.signal.throwIfAborted();

          return this.upload(outputKey(job.id, job.attemptCount, produced.extension), produced.path, produced.contentType, log);
        }),
        controller.signal,
        log
      );

      const finishedAt = this.now();
      const succeeded = await repo.compareAndTransition(
        job.id,
        'running',
        'succeeded',
        { outputRef, leaseId: null, finishedAt },
        { leaseId }
      );
      if (succeeded) {
        this.stats.succeeded++;
        log.info({ outputRef }, 'Job succeeded');
      } else {
        log.warn({ outputRef }, 'Lease lost before the result could be recorded');
      }
      await queue.ack(delivery.token);
    } catch (error) {
      if (isShutdown(error)) {
        await this.release(job, leaseId, delivery, log);
      } else {
        await this.recordFailure(job, leaseId, delivery, error, log);
      }
    } finally {
      clearTimeout(timeoutHandle);
      clearInterval(heartbeatTimer);
      this.runningJobs.delete(job.id);
      this.stats.running--;
    }
  }

  private async recordFailure(job: Job, leaseId: string, delivery: Delivery, error: unknown, log: Logger): Promise<void> {
    const { repo, queue } = this.deps;
    const now = this.now();
    const jobError = toJobError(error, job.attemptCount, now);

    if (!jobError.retryable || job.attemptCount >= job.maxAttempts) {
      const failed = await repo.compareAndTransition(
        job.id,
        'running',
        'failed',
        { error: jobError, leaseId: null, finishedAt: now },
        { leaseId }
      );
      if (failed) {
        this.stats.failed++;
        log.warn({ code: jobError.code, type: jobError.type, message: jobError.message }, 'Job failed');
      }
      await queue.ack(delivery.token);
      return;
    }

    const requeued = await repo.compareAndTransition(
      job.id,
      'running',
      'queued',
      { lastError: jobError, leaseId: null },
      { leaseId }
    );
    if (!requeued) {
      log.warn({ code: jobError.code }, 'Lease lost before the retry could be recorded');
      await queue.ack(delivery.token);
      return;
    }

    const delayMs = backoffDelay(job.attemptCount, this.config.retryBaseDelayMs, this.config.retryMaxDelayMs, this.random);
    this.stats.retried++;
    log.info({ code: jobError.code, message: jobError.message, delayMs }, 'Job scheduled for retry');

    await this.requeueMessage(job.id, delivery, delayMs, log);
  }

  /** A shutdown is not a failed attempt: the job goes back with its attempt returned. */
  private async release(job: Job, leaseId: string, delivery: Delivery, log: Logger): Promise<void> {
    const released = await this.deps.repo.compareAndTransition(
      job.id,
      'running',
      'queued',
      { leaseId: null, releaseAttempt: true },
      { leaseId }
    );
    if (!released) {
      log.warn('Lease lost before the job could be released');
      await this.deps.queue.ack(delivery.token);
      return;
    }

    this.stats.released++;
    log.info('Job released for another worker');
    await this.requeueMessage(job.id, delivery, 0, log);
  }

  private async requeueMessage(jobId: string, delivery: Delivery, delayMs: number, log: Logger): Promise<void> {
    const { queue } = this.deps;
    try {
      if (!(await queue.nack(delivery.token, { delayMs }))) {
        // The delivery timed out and may already be redelivered; the duplicate guard absorbs it.
        await queue.enqueue(jobId, { delayMs });
      }
    } catch (error) {
      // The record is already queued; the reaper redelivers it.
      log.warn({ err: error }, 'Could not requeue the message');
    }
  }

  /**
   * An object already at `key` was left by a run of the same attempt that was
   * released before it recorded its result; it is replaced.
   */
  private async upload(key: string, sourcePath: string, contentType: string, log: Logger): Promise<string> {
    const { store } = this.deps;
    try {
      return await store.putFile(key, sourcePath, contentType);
    } catch (error) {
      if (!(error instanceof ArtifactExistsError)) throw error;

      log.warn({ key }, 'Replacing output left by an interrupted run');
      await store.delete(error.location);
      return store.putFile(key, sourcePath, contentType);
    }
  }

  private async fetchInput(job: Job, workspace: string, index: number, name: string): Promise<string> {
    const { store } = this.deps;
    const ref = job.inputRefs[index];
    if (ref === undefined) {
      throw new PermanentJobError('INVALID_INPUT_REF', `Input ${index} (${name}) is missing`, { step: 'fetch_input' });
    }

    let location: ArtifactLocation;
    try {
      location = store.parseRef(ref);
    } catch (error) {
      if (error instanceof InvalidArtifactRefError) {
        throw new PermanentJobError('INVALID_INPUT_REF', error.message, { step: 'fetch_input', cause: error });
      }
      throw error;
    }

    const destination = path.join(workspace, `${name}${path.extname(location.key).toLowerCase()}`);
    try {
      await store.download(location, destination);
    } catch (error) {
      if (error instanceof ArtifactNotFoundError) {
        throw new PermanentJobError('INPUT_NOT_FOUND', `Input ${index} (${name}) does not exist`, {
          step: 'fetch_input',
          cause: error,
        });
      }
      throw error;
    }
    return destination;
  }
}

/**
 * Settles with the abort reason as soon as `signal` fires, even if `work`
 * ignores the signal. Late settlements of `work` are only logged.
 */
function raceAbort<T>(work: Promise<T>, signal: AbortSignal, log: Logger): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason);
    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    work.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        if (signal.aborted) {
          log.debug({ err: errorMessage(error) }, 'Aborted run settled');
        }
        reject(error);
      }
    );
  });
}
