import os from 'node:os';
import path from 'node:path';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import { loadConfig } from './config.js';
import { PermanentJobError, TransientInfraError, toJobError } from './errors.js';
import { InMemoryTaskQueue } from './queue/memory.js';
import type { EnqueueOptions, QueueMessage } from './queue/base.js';
import { InMemoryJobRepository } from './repositories/memory.js';
import { createServer } from './server.js';
import type { ArtifactStore } from './storage/base.js';
import { LocalArtifactStore } from './storage/local.js';
import { S3ArtifactStore } from './storage/s3.js';

class UnavailableQueue extends InMemoryTaskQueue {
  override async enqueue(_jobId: string, _options?: EnqueueOptions): Promise<QueueMessage> {
    throw new TransientInfraError('REDIS_UNAVAILABLE', 'Redis request failed: 503 Service Unavailable');
  }
}

const textToImage = { kind: 'text-to-image', params: { prompt: 'a lighthouse at dusk' } };

describe('Job API Routes', () => {
  let root: string;
  let app: FastifyInstance;
  let repo: InMemoryJobRepository;
  let queue: InMemoryTaskQueue;
  let store: ArtifactStore;

  async function start(env: Record<string, string> = {}, overrides: { queue?: InMemoryTaskQueue; store?: ArtifactStore } = {}) {
    repo = new InMemoryJobRepository();
    queue = overrides.queue ?? new InMemoryTaskQueue();
    store = overrides.store ?? new LocalArtifactStore(root, 'media');
    app = await createServer({ config: loadConfig({ LOG_LEVEL: 'silent', ...env }), repo, queue, store });
  }

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'routes-test-'));
  });

  afterEach(async () => {
    await app.close();
    await rm(root, { recursive: true, force: true });
  });

  describe('POST /jobs', () => {
    it('should create and enqueue a job', async () => {
      await start();

      const response = await app.inject({ method: 'POST', url: '/jobs', payload: textToImage });

      expect(response.statusCode).toBe(201);
      const body = JSON.parse(response.body);
      expect(typeof body.job_id).toBe('string');

      const job = await repo.get(body.job_id);
      expect(job?.state).toBe('queued');
      expect(job?.params).toEqual({ prompt: 'a lighthouse at dusk', model: 'juggernaut-pro-flux' });
      expect(job?.maxAttempts).toBe(3);
      expect(await queue.getStats()).toEqual({ ready: 1, inFlight: 0, delayed: 0 });
    });

    it('should reject an unknown kind', async () => {
      await start();

      const response = await app.inject({ method: 'POST', url: '/jobs', payload: { kind: 'transcode', params: {} } });

      expect(response.statusCode).toBe(400);
      const body = JSON.parse(response.body);
      expect(body.code).toBe('VALIDATION_ERROR');
      expect(body.message).toBe('Request validation failed');
      expect(Array.isArray(body.details)).toBe(true);
    });

    it('should reject a promo video with a single input', async () => {
      await start();

      const response = await app.inject({
        method: 'POST',
        url: '/jobs',
        payload: { kind: 'promo-video', input_refs: ['local://media/a.mp4'], params: { text: 'Hi' } },
      });

      expect(response.statusCode).toBe(400);
    });

    it('should reject params over the size limit', async () => {
      await start({ JOB_MAX_PARAMS_BYTES: '100' });

      const response = await app.inject({
        method: 'POST',
        url: '/jobs',
        payload: { kind: 'text-to-image', params: { prompt: 'x'.repeat(200) } },
      });

      expect(response.statusCode).toBe(413);
      expect(JSON.parse(response.body)).toEqual({
        error: 'Payload Too Large',
        message: 'Job params exceed the maximum size of 100 bytes',
        code: 'PARAMS_TOO_LARGE',
      });
      expect(await repo.getStats()).toMatchObject({ queued: 0 });
    });

    it('should return the existing job for a repeated idempotency key', async () => {
      await start();
      const request = { method: 'POST' as const, url: '/jobs', headers: { 'idempotency-key': 'order-42' }, payload: textToImage };

      const first = await app.inject(request);
      const second = await app.inject(request);

      expect(first.statusCode).toBe(201);
      expect(second.statusCode).toBe(200);
      expect(JSON.parse(second.body).job_id).toBe(JSON.parse(first.body).job_id);
      expect(await repo.getStats()).toMatchObject({ queued: 1 });
      // The still-queued job is enqueued again; workers drop the duplicate.
      expect(await queue.getStats()).toMatchObject({ ready: 2 });
    });

    it('should answer 503 when the queue is down and keep the job record', async () => {
      await start({}, { queue: new UnavailableQueue() });

      const response = await app.inject({ method: 'POST', url: '/jobs', payload: textToImage });

      expect(response.statusCode).toBe(503);
      expect(JSON.parse(response.body).code).toBe('QUEUE_UNAVAILABLE');
      expect(await repo.getStats()).toMatchObject({ queued: 1 });
    });

    it('should reject malformed JSON', async () => {
      await start();

      const response = await app.inject({
        method: 'POST',
        url: '/jobs',
        headers: { 'content-type': 'application/json' },
        payload: '{"kind":',
      });

      expect(response.statusCode).toBe(400);
      expect(JSON.parse(response.body).code).toBe('BAD_REQUEST');
    });

    it('should require the API key when one is configured', async () => {
      await start({ JOBS_API_KEY: 'test-secret' });

      const denied = await app.inject({ method: 'POST', url: '/jobs', payload: textToImage });
      expect(denied.statusCode).toBe(401);
      expect(JSON.parse(denied.body).code).toBe('INVALID_API_KEY');

      const allowed = await app.inject({ method: 'POST', url: '/jobs', headers: { 'x-api-key': 'test-secret' }, payload: textToImage });
      expect(allowed.statusCode).toBe(201);
    });

    it('should rate limit submissions when enabled', async () => {
      await start({ RATE_LIMIT_ENABLED: '1', ENQUEUE_BURST: '1', ENQUEUE_SUSTAINED_PER_MIN: '1' });

      const first = await app.inject({ method: 'POST', url: '/jobs', payload: textToImage });
      const second = await app.inject({ method: 'POST', url: '/jobs', payload: textToImage });

      expect(first.statusCode).toBe(201);
      expect(first.headers['x-ratelimit-remaining']).toBe('0');
      expect(second.statusCode).toBe(429);
      expect(second.headers['retry-after']).toBe('60');
      expect(JSON.parse(second.body).code).toBe('RATE_LIMITED');
    });
  });

  describe('GET /jobs/:jobId', () => {
    it('should return the job in wire format', async () => {
      await start();
      const job = await repo.create({ kind: 'split-screen', inputRefs: ['local://media/a.mp4', 'local://media/b.mp4'], maxAttempts: 2 });

      const response = await app.inject({ method: 'GET', url: `/jobs/${job.id}` });

      expect(response.statusCode).toBe(200);
      expect(JSON.parse(response.body)).toEqual({
        job_id: job.id,
        kind: 'split-screen',
        state: 'queued',
        attempt_count: 0,
        max_attempts: 2,
        created_at: job.createdAt.toISOString(),
        updated_at: job.updatedAt.toISOString(),
      });
    });

    it('should answer the same body every time once a job has finished', async () => {
      await start();
      const job = await repo.create({ kind: 'text-to-image', inputRefs: [] });
      await repo.compareAndTransition(job.id, 'queued', 'running', { incrementAttempt: true, leaseId: 'lease-1' });
      const error = toJobError(new PermanentJobError('UNSUPPORTED_INPUT', 'Invalid data found', { step: 'generate' }), 1, new Date());
      await repo.compareAndTransition(job.id, 'running', 'failed', { error, leaseId: null, finishedAt: new Date() }, { leaseId: 'lease-1' });

      const first = await app.inject({ method: 'GET', url: `/jobs/${job.id}` });
      const second = await app.inject({ method: 'GET', url: `/jobs/${job.id}` });

      expect(first.statusCode).toBe(200);
      expect(second.body).toBe(first.body);
      expect(JSON.parse(first.body)).toMatchObject({
        state: 'failed',
        attempt_count: 1,
        error: { type: 'PermanentJobError', code: 'UNSUPPORTED_INPUT', attempt: 1, retryable: false },
      });
    });

    it('should return 404 for an unknown job', async () => {
      await start();

      const response = await app.inject({ method: 'GET', url: '/jobs/01UNKNOWN' });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body)).toEqual({ error: 'Not Found', message: 'Job not found', code: 'JOB_NOT_FOUND' });
    });
  });

  describe('GET /jobs/:jobId/artifact', () => {
    async function succeededJob(outputRef: string) {
      const job = await repo.create({ kind: 'text-to-image', inputRefs: [] });
      await repo.compareAndTransition(job.id, 'queued', 'running', { incrementAttempt: true, leaseId: 'lease-1' });
      await repo.compareAndTransition(job.id, 'running', 'succeeded', { outputRef, leaseId: null });
      return job;
    }

    it('should refuse while the job has not succeeded', async () => {
      await start();
      const job = await repo.create({ kind: 'text-to-image', inputRefs: [] });

      const response = await app.inject({ method: 'GET', url: `/jobs/${job.id}/artifact` });

      expect(response.statusCode).toBe(409);
      expect(JSON.parse(response.body)).toEqual({
        error: 'Conflict',
        message: 'Job has no artifact in state queued',
        code: 'ARTIFACT_NOT_READY',
        details: { state: 'queued' },
      });
    });

    it('should stream local artifacts', async () => {
      await start();
      const source = path.join(root, 'out.png');
      await writeFile(source, 'png-bytes');
      const job = await succeededJob(await store.putFile('outputs/job/attempt-1.png', source, 'image/png'));

      const response = await app.inject({ method: 'GET', url: `/jobs/${job.id}/artifact` });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('image/png');
      expect(response.body).toBe('png-bytes');
    });

    it('should report an artifact that has gone missing', async () => {
      await start();
      const job = await succeededJob('local://media/outputs/gone/attempt-1.mp4');

      const response = await app.inject({ method: 'GET', url: `/jobs/${job.id}/artifact` });

      expect(response.statusCode).toBe(404);
      expect(JSON.parse(response.body).code).toBe('ARTIFACT_MISSING');
    });

    it('should redirect to a presigned URL when the store issues one', async () => {
      const s3 = new S3ArtifactStore({ bucket: 'media', region: 'eu-west-1', accessKeyId: 'test-access-key', secretAccessKey: 'test-secret' });
      await start({ ARTIFACT_URL_TTL_SEC: '120' }, { store: s3 });
      const job = await succeededJob('s3://media/outputs/job/attempt-1.mp4');

      const response = await app.inject({ method: 'GET', url: `/jobs/${job.id}/artifact` });

      expect(response.statusCode).toBe(302);
      const location = new URL(String(response.headers.location));
      expect(location.hostname).toBe('media.s3.eu-west-1.amazonaws.com');
      expect(location.pathname).toBe('/outputs/job/attempt-1.mp4');
      expect(location.searchParams.get('X-Amz-Expires')).toBe('120');
    });
  });
});
