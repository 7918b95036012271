import { ulid } from 'ulid';
import { z } from 'zod';
import type {
  Job,
  CreateJobData,
  JobState,
  JobStats,
  TransitionFields,
  TransitionGuard,
} from '../types/job.js';
import { JOB_STATES } from '../types/job.js';
import { JobErrorSchema, JobKindSchema, JobStateSchema } from '../schemas/job.js';
import { type FindByStateOptions, type JobRepository, newJob } from './base.js';
import { assertTransition } from './transitions.js';
import { type UpstashClient, asNumber, asStringArray, pairsToRecord } from './upstash.js';

const IDEMPOTENCY_TTL_SEC = 24 * 60 * 60;

// KEYS[1] job hash, KEYS[2] index of the expected state, KEYS[3] index of the next state
// ARGV[1] expected, ARGV[2] next, ARGV[3] lease guard ('' = none), ARGV[4] '1' to count an attempt, '-1' to release one,
// ARGV[5] updatedAt ms, ARGV[6] updatedAt ISO, ARGV[7] job id, ARGV[8..] field/value pairs ('' deletes)
const COMPARE_AND_TRANSITION = `
if redis.call('EXISTS', KEYS[1]) == 0 then return false end
local current = redis.call('HMGET', KEYS[1], 'state', 'leaseId', 'attemptCount', 'maxAttempts')
if current[1] ~= ARGV[1] then return false end
if ARGV[3] ~= '' and current[2] ~= ARGV[3] then return false end
if ARGV[4] == '1' then
  if tonumber(current[3]) >= tonumber(current[4]) then return false end
  redis.call('HINCRBY', KEYS[1], 'attemptCount', 1)
elseif ARGV[4] == '-1' and tonumber(current[3]) > 0 then
  redis.call('HINCRBY', KEYS[1], 'attemptCount', -1)
end
redis.call('HSET', KEYS[1], 'state', ARGV[2], 'updatedAt', ARGV[6])
for i = 8, #ARGV, 2 do
  if ARGV[i + 1] == '' then
    redis.call('HDEL', KEYS[1], ARGV[i])
  else
    redis.call('HSET', KEYS[1], ARGV[i], ARGV[i + 1])
  end
end
redis.call('ZREM', KEYS[2], ARGV[7])
redis.call('ZADD', KEYS[3], ARGV[5], ARGV[7])
return redis.call('HGETALL', KEYS[1])
`;

function jsonField<T extends z.ZodTypeAny>(schema: T) {
  return z.string().transform((raw, ctx) => {
    try {
      return JSON.parse(raw);
    } catch {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'invalid JSON' });
      return z.NEVER;
    }
  }).pipe(schema);
}

const isoDate = z.string().datetime().transform(s => new Date(s));

const StoredJobSchema = z.object({
  id: z.string(),
  kind: JobKindSchema,
  state: JobStateSchema,
  inputRefs: jsonField(z.array(z.string())),
  params: jsonField(z.unknown()),
  outputRef: z.string().optional(),
  error: jsonField(JobErrorSchema).optional(),
  lastError: jsonField(JobErrorSchema).optional(),
  attemptCount: z.coerce.number().int(),
  maxAttempts: z.coerce.number().int(),
  leaseId: z.string().optional(),
  startedAt: isoDate.optional(),
  finishedAt: isoDate.optional(),
  lastHeartbeatAt: isoDate.optional(),
  idempotencyKey: z.string().optional(),
  createdAt: isoDate,
  updatedAt: isoDate,
});

export interface RedisJobRepositoryOptions {
  keyPrefix?: string;
  defaultMaxAttempts?: number;
}

/**
 * Jobs live in one hash each; a sorted set per state, scored by updatedAt,
 * serves the reaper scans. Transitions run as a single Lua script.
 */
export class RedisJobRepository implements JobRepository {
  private readonly prefix: string;
  private readonly defaultMaxAttempts: number;

  constructor(private client: UpstashClient, options: RedisJobRepositoryOptions = {}) {
    this.prefix = options.keyPrefix ?? 'mjs';
    this.defaultMaxAttempts = options.defaultMaxAttempts ?? 3;
  }

  private jobKey(id: string): string {
    return `${this.prefix}:job:${id}`;
  }

  private stateKey(state: JobState): string {
    return `${this.prefix}:jobs:state:${state}`;
  }

  private idempotencyKey(key: string): string {
    return `${this.prefix}:idem:${key}`;
  }

  private serializeJob(job: Job): string[] {
    const fields: Array<[string, string | null]> = [
      ['id', job.id],
      ['kind', job.kind],
      ['state', job.state],
      ['inputRefs', JSON.stringify(job.inputRefs)],
      ['params', JSON.stringify(job.params)],
      ['outputRef', job.outputRef],
      ['error', job.error ? JSON.stringify(job.error) : null],
      ['lastError', job.lastError ? JSON.stringify(job.lastError) : null],
      ['attemptCount', String(job.attemptCount)],
      ['maxAttempts', String(job.maxAttempts)],
      ['leaseId', job.leaseId],
      ['startedAt', job.startedAt?.toISOString() ?? null],
      ['finishedAt', job.finishedAt?.toISOString() ?? null],
      ['lastHeartbeatAt', job.lastHeartbeatAt?.toISOString() ?? null],
      ['idempotencyKey', job.idempotencyKey],
      ['createdAt', job.createdAt.toISOString()],
      ['updatedAt', job.updatedAt.toISOString()],
    ];
    return fields.flatMap(([name, value]) => (value === null ? [] : [name, value]));
  }

  private serializeFields(fields: TransitionFields): string[] {
    const args: string[] = [];
    if (fields.outputRef !== undefined) args.push('outputRef', fields.outputRef);
    if (fields.error !== undefined) args.push('error', JSON.stringify(fields.error));
    if (fields.lastError !== undefined) args.push('lastError', JSON.stringify(fields.lastError));
    if (fields.leaseId !== undefined) args.push('leaseId', fields.leaseId ?? '');
    if (fields.startedAt !== undefined) args.push('startedAt', fields.startedAt.toISOString());
    if (fields.finishedAt !== undefined) args.push('finishedAt', fields.finishedAt.toISOString());
    if (fields.lastHeartbeatAt !== undefined) args.push('lastHeartbeatAt', fields.lastHeartbeatAt.toISOString());
    return args;
  }

  private deserializeJob(record: Record<string, string>): Job {
    const parsed = StoredJobSchema.parse(record);
    return {
      ...parsed,
      params: parsed.params,
      outputRef: parsed.outputRef ?? null,
      error: parsed.error ?? null,
      lastError: parsed.lastError ?? null,
      leaseId: parsed.leaseId ?? null,
      startedAt: parsed.startedAt ?? null,
      finishedAt: parsed.finishedAt ?? null,
      lastHeartbeatAt: parsed.lastHeartbeatAt ?? null,
      idempotencyKey: parsed.idempotencyKey ?? null,
    };
  }

  async create(data: CreateJobData): Promise<Job> {
    const job = newJob(ulid(), data, this.defaultMaxAttempts, new Date());

    await this.client.command(['HSET', this.jobKey(job.id), ...this.serializeJob(job)]);
    await this.client.command(['ZADD', this.stateKey('queued'), job.updatedAt.getTime(), job.id]);

    if (job.idempotencyKey) {
      await this.client.command(['SET', this.idempotencyKey(job.idempotencyKey), job.id, 'EX', IDEMPOTENCY_TTL_SEC, 'NX']);
    }

    return job;
  }

  async get(id: string): Promise<Job | null> {
    const record = pairsToRecord(await this.client.command(['HGETALL', this.jobKey(id)]));
    return Object.keys(record).length > 0 ? this.deserializeJob(record) : null;
  }

  async compareAndTransition(
    id: string,
    expected: JobState,
    next: JobState,
    fields: TransitionFields = {},
    guard: TransitionGuard = {}
  ): Promise<Job | null> {
    assertTransition(expected, next, fields);

    const now = new Date();
    const reply = await this.client.eval(
      COMPARE_AND_TRANSITION,
      [this.jobKey(id), this.stateKey(expected), this.stateKey(next)],
      [
        expected,
        next,
        guard.leaseId ?? '',
        attemptDelta(fields),
        now.getTime(),
        now.toISOString(),
        id,
        ...this.serializeFields(fields),
      ]
    );

    if (!Array.isArray(reply)) return null;
    return this.deserializeJob(pairsToRecord(reply));
  }

  async findByState(state: JobState, options: FindByStateOptions): Promise<Job[]> {
    const ids = asStringArray(await this.client.command([
      'ZRANGEBYSCORE',
      this.stateKey(state),
      '-inf',
      `(${options.updatedBefore.getTime()}`,
      'LIMIT',
      0,
      options.limit,
    ]));

    const jobs: Job[] = [];
    for (const id of ids) {
      const job = await this.get(id);
      // The index can briefly trail a concurrent transition.
      if (job && job.state === state) {
        jobs.push(job);
      }
    }
    return jobs;
  }

  async delete(id: string): Promise<boolean> {
    const job = await this.get(id);
    if (!job) return false;

    await this.client.command(['DEL', this.jobKey(id)]);
    await this.client.command(['ZREM', this.stateKey(job.state), id]);
    return true;
  }

  async getStats(): Promise<JobStats> {
    const counts = await Promise.all(
      JOB_STATES.map(state => this.client.command(['ZCARD', this.stateKey(state)]))
    );

    const stats: JobStats = { queued: 0, running: 0, succeeded: 0, failed: 0, expired: 0 };
    JOB_STATES.forEach((state, i) => {
      stats[state] = asNumber(counts[i]);
    });
    return stats;
  }

  async findByIdempotencyKey(idempotencyKey: string, withinHours = 24): Promise<Job | null> {
    const id = await this.client.command(['GET', this.idempotencyKey(idempotencyKey)]);
    if (typeof id !== 'string') return null;

    const job = await this.get(id);
    const cutoff = Date.now() - withinHours * 60 * 60 * 1000;
    return job && job.createdAt.getTime() >= cutoff ? job : null;
  }
}

function attemptDelta(fields: TransitionFields): string {
  if (fields.incrementAttempt) return '1';
  if (fields.releaseAttempt) return '-1';
  return '0';
}
