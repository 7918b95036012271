import os from 'node:os';
import { z } from 'zod';

const flag = (fallback: '0' | '1') => z.enum(['0', '1']).default(fallback).transform(v => v === '1');
const int = (fallback: number) => z.coerce.number().int().min(0).default(fallback);
const optionalString = z.string().trim().min(1).optional();

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  ROLE: z.enum(['api', 'worker', 'all']).default('all'),
  HOST: z.string().default('0.0.0.0'),
  PORT: int(4500),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Job records and queue
  REPO_KIND: z.enum(['memory', 'redis']).default('memory'),
  UPSTASH_REDIS_REST_URL: optionalString,
  UPSTASH_REDIS_REST_TOKEN: optionalString,
  REDIS_KEY_PREFIX: z.string().default('mjs'),
  QUEUE_VISIBILITY_TIMEOUT_MS: int(15 * 60 * 1000),

  // Artifacts
  STORAGE_KIND: z.enum(['local', 's3']).default('local'),
  ARTIFACT_ROOT_PATH: z.string().default('.data/artifacts'),
  S3_BUCKET_NAME: z.string().default('media-jobs'),
  AWS_REGION: optionalString,
  AWS_ACCESS_KEY_ID: optionalString,
  AWS_SECRET_ACCESS_KEY: optionalString,
  S3_ENDPOINT: optionalString,
  S3_FORCE_PATH_STYLE: flag('0'),
  ARTIFACT_URL_TTL_SEC: int(3600),

  // Generation APIs
  MINIMAX_API_KEY: optionalString,
  MINIMAX_BASE_URL: z.string().url().default('https://api.minimaxi.chat/v1'),
  MINIMAX_POLL_INTERVAL_MS: int(20_000),
  MINIMAX_MAX_POLLS: int(30),
  SEGMIND_API_KEY: optionalString,
  SEGMIND_BASE_URL: z.string().url().default('https://api.segmind.com/v1'),
  GENERATION_MAX_RETRIES: int(4),
  GENERATION_RETRY_BASE_MS: int(1000),
  GENERATION_REQUEST_TIMEOUT_MS: int(30_000),

  // Transform engine
  FFMPEG_PATH: z.string().default('ffmpeg'),
  FFPROBE_PATH: z.string().default('ffprobe'),
  FONT_DIR: z.string().default('assets/fonts'),
  TRANSFORM_TMP_DIR: z.string().default(os.tmpdir()),
  TRANSFORM_TIMEOUT_MS: int(5 * 60 * 1000),
  TRANSFORM_TEMP_QUOTA_BYTES: int(2 * 1024 * 1024 * 1024),

  // Worker pool and reaper
  WORKER_CONCURRENCY: z.coerce.number().int().min(1).default(2),
  WORKER_POLL_INTERVAL_MS: int(1000),
  JOB_MAX_ATTEMPTS: z.coerce.number().int().min(1).max(10).default(3),
  JOB_MAX_RUN_MS: int(20 * 60 * 1000),
  JOB_HEARTBEAT_MS: int(10_000),
  JOB_RETRY_BASE_MS: int(1000),
  JOB_RETRY_MAX_MS: int(60_000),
  JOB_QUEUED_TTL_MS: int(60 * 60 * 1000),
  JOB_STALE_RUNNING_MS: int(2 * 60 * 1000),
  JOB_RETENTION_MS: int(60 * 60 * 1000),
  REAPER_INTERVAL_MS: int(30_000),

  // API surface
  JOBS_API_KEY: optionalString,
  CORS_ORIGINS: z.string().default(''),
  RATE_LIMIT_ENABLED: flag('0'),
  ENQUEUE_BURST: int(60),
  ENQUEUE_SUSTAINED_PER_MIN: int(600),
  JOB_MAX_PARAMS_BYTES: int(65_536),
});

export type Env = z.input<typeof EnvSchema>;

export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new Error(`Invalid configuration: ${problems}`);
  }
  const e = parsed.data;

  if (e.REPO_KIND === 'redis' && (!e.UPSTASH_REDIS_REST_URL || !e.UPSTASH_REDIS_REST_TOKEN)) {
    throw new Error('UPSTASH_REDIS_REST_URL and UPSTASH_REDIS_REST_TOKEN must be set when REPO_KIND=redis');
  }

  const config = {
    env: e.NODE_ENV,
    role: e.ROLE,
    server: { host: e.HOST, port: e.PORT },
    log: { level: e.LOG_LEVEL },
    repo: {
      kind: e.REPO_KIND,
      redisUrl: e.UPSTASH_REDIS_REST_URL,
      redisToken: e.UPSTASH_REDIS_REST_TOKEN,
      keyPrefix: e.REDIS_KEY_PREFIX,
    },
    queue: { visibilityTimeoutMs: e.QUEUE_VISIBILITY_TIMEOUT_MS },
    storage: {
      kind: e.STORAGE_KIND,
      rootPath: e.ARTIFACT_ROOT_PATH,
      bucket: e.S3_BUCKET_NAME,
      region: e.AWS_REGION,
      accessKeyId: e.AWS_ACCESS_KEY_ID,
      secretAccessKey: e.AWS_SECRET_ACCESS_KEY,
      endpoint: e.S3_ENDPOINT,
      forcePathStyle: e.S3_FORCE_PATH_STYLE,
      urlTtlSec: e.ARTIFACT_URL_TTL_SEC,
    },
    generation: {
      maxRetries: e.GENERATION_MAX_RETRIES,
      retryBaseMs: e.GENERATION_RETRY_BASE_MS,
      requestTimeoutMs: e.GENERATION_REQUEST_TIMEOUT_MS,
      minimax: {
        apiKey: e.MINIMAX_API_KEY,
        baseUrl: e.MINIMAX_BASE_URL,
        pollIntervalMs: e.MINIMAX_POLL_INTERVAL_MS,
        maxPolls: e.MINIMAX_MAX_POLLS,
      },
      segmind: { apiKey: e.SEGMIND_API_KEY, baseUrl: e.SEGMIND_BASE_URL },
    },
    transform: {
      ffmpegPath: e.FFMPEG_PATH,
      ffprobePath: e.FFPROBE_PATH,
      fontDir: e.FONT_DIR,
      tempDir: e.TRANSFORM_TMP_DIR,
      timeoutMs: e.TRANSFORM_TIMEOUT_MS,
      tempQuotaBytes: e.TRANSFORM_TEMP_QUOTA_BYTES,
    },
    worker: {
      concurrency: e.WORKER_CONCURRENCY,
      pollIntervalMs: e.WORKER_POLL_INTERVAL_MS,
      jobMaxRunMs: e.JOB_MAX_RUN_MS,
      heartbeatIntervalMs: e.JOB_HEARTBEAT_MS,
      queuedTtlMs: e.JOB_QUEUED_TTL_MS,
      retryBaseDelayMs: e.JOB_RETRY_BASE_MS,
      retryMaxDelayMs: e.JOB_RETRY_MAX_MS,
    },
    reaper: {
      intervalMs: e.REAPER_INTERVAL_MS,
      queuedTtlMs: e.JOB_QUEUED_TTL_MS,
      redeliverAfterMs: e.QUEUE_VISIBILITY_TIMEOUT_MS,
      staleRunningMs: e.JOB_STALE_RUNNING_MS,
      retentionMs: e.JOB_RETENTION_MS,
      batchSize: 100,
    },
    api: {
      apiKey: e.JOBS_API_KEY,
      corsOrigins: e.CORS_ORIGINS.split(',').map(s => s.trim()).filter(Boolean),
      defaultMaxAttempts: e.JOB_MAX_ATTEMPTS,
      maxParamsBytes: e.JOB_MAX_PARAMS_BYTES,
      rateLimit: {
        enabled: e.RATE_LIMIT_ENABLED,
        burst: e.ENQUEUE_BURST,
        sustainedPerMin: e.ENQUEUE_SUSTAINED_PER_MIN,
      },
    },
  };

  return Object.freeze(config);
}

export type AppConfig = ReturnType<typeof loadConfig>;
