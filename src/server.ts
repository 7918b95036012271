import path from 'node:path';
import Fastify, { type FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { ulid } from 'ulid';
import type { AppConfig } from './config.js';
import { TransientInfraError, ValidationError, replyWithError } from './errors.js';
import { fmt } from './lib/error-messages.js';
import { loggerOptions } from './logger.js';
import { requireApiKey } from './middleware/auth.js';
import { createRateLimiter } from './middleware/rate-limit.js';
import { parseWith, validateBody, validateParams } from './middleware/validation.js';
import type { TaskQueue } from './queue/base.js';
import type { JobRepository } from './repositories/base.js';
import { CreateJobSchema, IdempotencyKeySchema, JobParamsSchema } from './schemas/job.js';
import { type ArtifactLocation, type ArtifactStore, ArtifactNotFoundError, InvalidArtifactRefError } from './storage/base.js';
import type { Job, JobError, JobKind, JobState } from './types/job.js';
import { loggableParams } from './utils/payload-scrubber.js';
import type { JobReaper } from './worker/reaper.js';
import type { JobWorker } from './worker/index.js';

export type ServerConfig = Pick<AppConfig, 'api' | 'log' | 'repo' | 'storage'>;

export interface ServerDependencies {
  config: ServerConfig;
  repo: JobRepository;
  queue: TaskQueue;
  store: ArtifactStore;
  /** Present when this process also runs the worker pool; stopped on close. */
  worker?: JobWorker;
  reaper?: JobReaper;
}

export interface JobResponse {
  job_id: string;
  kind: JobKind;
  state: JobState;
  attempt_count: number;
  max_attempts: number;
  created_at: string;
  updated_at: string;
  output_ref?: string;
  error?: JobError;
  last_error?: JobError;
}

const CONTENT_TYPES: Record<string, string> = {
  '.mp4': 'video/mp4',
  '.png': 'image/png',
  '.jpg': 'image/jpeg',
  '.jpeg': 'image/jpeg',
};

export function presentJob(job: Job): JobResponse {
  return {
    job_id: job.id,
    kind: job.kind,
    state: job.state,
    attempt_count: job.attemptCount,
    max_attempts: job.maxAttempts,
    created_at: job.createdAt.toISOString(),
    updated_at: job.updatedAt.toISOString(),
    ...(job.outputRef ? { output_ref: job.outputRef } : {}),
    ...(job.error ? { error: job.error } : {}),
    ...(job.lastError ? { last_error: job.lastError } : {}),
  };
}

export async function createServer(deps: ServerDependencies): Promise<FastifyInstance> {
  const { config, repo, queue, store, worker, reaper } = deps;
  const { api } = config;

  const app = Fastify({
    logger: loggerOptions(config),
    genReqId: () => ulid(),
    requestIdHeader: 'x-request-id',
  });

  // Security
  await app.register(helmet, {
    contentSecurityPolicy: false,
  });

  if (api.corsOrigins.length > 0) {
    await app.register(cors, {
      origin: api.corsOrigins,
    });
  }

  // OpenAPI documentation
  await app.register(swagger, {
    mode: 'static',
    specification: {
      path: './contracts/openapi.yaml',
      baseDir: '.',
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: false,
    },
  });

  // Echo X-Request-ID
  app.addHook('onRequest', async (request, reply) => {
    reply.header('X-Request-ID', request.id);
  });

  app.setErrorHandler((error, request, reply) => {
    if (error instanceof ValidationError) {
      return replyWithError(reply, 400, 'VALIDATION_ERROR', 'BAD_INPUT_SCHEMA', error.issues, error.message);
    }
    if (error instanceof TransientInfraError) {
      request.log.error({ err: error }, 'Backing service unavailable');
      return replyWithError(reply, 503, 'SERVICE_UNAVAILABLE', 'QUEUE_UNAVAILABLE');
    }
    if (error.statusCode === 413) {
      return replyWithError(reply, 413, 'PAYLOAD_TOO_LARGE', 'BAD_INPUT_SCHEMA', undefined, error.message);
    }
    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      return replyWithError(reply, error.statusCode, 'BAD_REQUEST', 'BAD_INPUT_SCHEMA', undefined, error.message);
    }

    request.log.error({ err: error }, 'Unhandled error');
    return replyWithError(reply, 500, 'INTERNAL', 'INTERNAL_UNEXPECTED');
  });

  app.get('/health', async () => {
    const [jobs, queueStats] = await Promise.all([repo.getStats(), queue.getStats()]);

    return {
      ok: true,
      repo: { kind: config.repo.kind },
      storage: { kind: config.storage.kind },
      jobs,
      queue: queueStats,
      worker: worker?.getStats() ?? null,
    };
  });

  const enqueueHooks = [requireApiKey(api.apiKey), createRateLimiter(api.rateLimit)];

  // POST /jobs - Submit a job
  app.post('/jobs', { preHandler: enqueueHooks }, async (request, reply) => {
    const data = validateBody(CreateJobSchema, request.body);

    const paramsBytes = Buffer.byteLength(JSON.stringify(data.params), 'utf8');
    if (paramsBytes > api.maxParamsBytes) {
      return replyWithError(reply, 413, 'PARAMS_TOO_LARGE', 'PARAMS_TOO_LARGE', undefined,
        fmt('PARAMS_TOO_LARGE', { limit: api.maxParamsBytes }));
    }

    const idempotencyKey = parseWith(IdempotencyKeySchema.optional(), request.headers['idempotency-key']);
    if (idempotencyKey) {
      const existing = await repo.findByIdempotencyKey(idempotencyKey, 24);
      if (existing) {
        // A job whose first enqueue failed gets another chance.
        if (existing.state === 'queued' && existing.attemptCount === 0) {
          await queue.enqueue(existing.id);
        }
        return reply.code(200).send({ job_id: existing.id });
      }
    }

    const job = await repo.create({
      kind: data.kind,
      inputRefs: data.input_refs,
      params: data.params,
      maxAttempts: data.max_attempts,
      idempotencyKey,
    });
    request.log.info({ jobId: job.id, kind: job.kind, jobParams: loggableParams(data.params) }, 'Job submitted');

    try {
      await queue.enqueue(job.id);
    } catch (error) {
      request.log.error({ jobId: job.id, err: error }, 'Enqueue failed');
      return replyWithError(reply, 503, 'QUEUE_UNAVAILABLE', 'QUEUE_UNAVAILABLE');
    }

    return reply.code(201).send({ job_id: job.id });
  });

  // GET /jobs/:jobId - Job status
  app.get('/jobs/:jobId', async (request, reply) => {
    const { jobId } = validateParams(JobParamsSchema, request.params);

    const job = await repo.get(jobId);
    if (!job) {
      return replyWithError(reply, 404, 'JOB_NOT_FOUND', 'JOB_NOT_FOUND');
    }
    return presentJob(job);
  });

  // GET /jobs/:jobId/artifact - Redirect to, or stream, the output
  app.get('/jobs/:jobId/artifact', async (request, reply) => {
    const { jobId } = validateParams(JobParamsSchema, request.params);

    const job = await repo.get(jobId);
    if (!job) {
      return replyWithError(reply, 404, 'JOB_NOT_FOUND', 'JOB_NOT_FOUND');
    }
    if (job.state !== 'succeeded' || !job.outputRef) {
      return replyWithError(reply, 409, 'ARTIFACT_NOT_READY', 'ARTIFACT_NOT_READY', { state: job.state },
        fmt('ARTIFACT_NOT_READY', { state: job.state }));
    }

    let location: ArtifactLocation;
    try {
      location = store.parseRef(job.outputRef);
    } catch (error) {
      if (error instanceof InvalidArtifactRefError) {
        request.log.warn({ jobId, err: error }, 'Output ref does not belong to this store');
        return replyWithError(reply, 404, 'ARTIFACT_MISSING', 'ARTIFACT_MISSING');
      }
      throw error;
    }

    const url = await store.getDownloadUrl(location, config.storage.urlTtlSec);
    if (url) {
      return reply.redirect(url);
    }

    try {
      const stream = await store.read(location);
      return reply
        .type(CONTENT_TYPES[path.extname(location.key).toLowerCase()] ?? 'application/octet-stream')
        .send(stream);
    } catch (error) {
      if (error instanceof ArtifactNotFoundError) {
        return replyWithError(reply, 404, 'ARTIFACT_MISSING', 'ARTIFACT_MISSING');
      }
      throw error;
    }
  });

  app.addHook('onClose', async () => {
    reaper?.stop();
    await worker?.stop();
  });

  return app;
}
