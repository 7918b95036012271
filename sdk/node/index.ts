// Node SDK for the media jobs API: submit a job, read its status, wait for it to settle.
// Node 20: uses the global fetch.

import { z } from 'zod';

const JobErrorSchema = z.object({
  type: z.string(),
  code: z.string(),
  message: z.string(),
  retryable: z.boolean(),
  attempt: z.number(),
  step: z.string().optional(),
  occurredAt: z.string(),
});

const JobStatusSchema = z.object({
  job_id: z.string(),
  kind: z.string(),
  state: z.enum(['queued', 'running', 'succeeded', 'failed', 'expired']),
  attempt_count: z.number(),
  max_attempts: z.number(),
  created_at: z.string(),
  updated_at: z.string(),
  output_ref: z.string().optional(),
  error: JobErrorSchema.optional(),
  last_error: JobErrorSchema.optional(),
});

const SubmitResponseSchema = z.object({ job_id: z.string() });

const ErrorBodySchema = z.object({
  code: z.string(),
  message: z.string(),
}).passthrough();

export type JobStatus = z.infer<typeof JobStatusSchema>;
export type JobStateName = JobStatus['state'];

export interface SubmitJobRequest {
  kind: 'promo-video' | 'image-to-video' | 'text-to-image' | 'split-screen';
  input_refs?: string[];
  params?: Record<string, unknown>;
  max_attempts?: number;
}

export interface JobsClientOptions {
  baseUrl: string;
  apiKey?: string;
  fetch?: typeof fetch;
}

export interface WaitOptions {
  intervalMs?: number;
  timeoutMs?: number;
  signal?: AbortSignal;
}

export class JobsApiError extends Error {
  constructor(readonly status: number, readonly code: string, message: string) {
    super(message);
    this.name = 'JobsApiError';
  }
}

const TERMINAL: ReadonlySet<JobStateName> = new Set(['succeeded', 'failed', 'expired']);

export function createJobsClient(options: JobsClientOptions) {
  const baseUrl = options.baseUrl.replace(/\/$/, '');
  const fetchImpl = options.fetch ?? fetch;

  async function request(pathname: string, init: RequestInit = {}): Promise<{ status: number; body: unknown }> {
    const headers: Record<string, string> = { accept: 'application/json' };
    if (options.apiKey) headers['x-api-key'] = options.apiKey;
    if (init.body !== undefined) headers['content-type'] = 'application/json';

    const res = await fetchImpl(`${baseUrl}${pathname}`, {
      ...init,
      headers: { ...headers, ...Object.fromEntries(new Headers(init.headers).entries()) },
    });
    const text = await res.text();
    let body: unknown = null;
    if (text) {
      try {
        body = JSON.parse(text);
      } catch {
        body = text;
      }
    }

    if (!res.ok) {
      const parsed = ErrorBodySchema.safeParse(body);
      throw parsed.success
        ? new JobsApiError(res.status, parsed.data.code, parsed.data.message)
        : new JobsApiError(res.status, `HTTP_${res.status}`, `Request failed with status ${res.status}`);
    }
    return { status: res.status, body };
  }

  async function status(jobId: string): Promise<JobStatus> {
    const { body } = await request(`/jobs/${encodeURIComponent(jobId)}`);
    return JobStatusSchema.parse(body);
  }

  return {
    /** Returns the job id; with an idempotency key a repeat submit returns the original id. */
    async submit(job: SubmitJobRequest, submitOptions: { idempotencyKey?: string } = {}): Promise<string> {
      const { body } = await request('/jobs', {
        method: 'POST',
        headers: submitOptions.idempotencyKey ? { 'idempotency-key': submitOptions.idempotencyKey } : {},
        body: JSON.stringify(job),
      });
      return SubmitResponseSchema.parse(body).job_id;
    },

    status,

    artifactUrl(jobId: string): string {
      return `${baseUrl}/jobs/${encodeURIComponent(jobId)}/artifact`;
    },

    /** Polls until the job reaches succeeded, failed or expired. */
    async waitFor(jobId: string, waitOptions: WaitOptions = {}): Promise<JobStatus> {
      const { intervalMs = 2000, timeoutMs = 30 * 60 * 1000, signal } = waitOptions;
      const deadline = Date.now() + timeoutMs;

      for (;;) {
        signal?.throwIfAborted();
        const current = await status(jobId);
        if (TERMINAL.has(current.state)) return current;
        if (Date.now() + intervalMs > deadline) {
          throw new JobsApiError(408, 'WAIT_TIMEOUT', `Job ${jobId} still ${current.state} after ${timeoutMs}ms`);
        }
        await new Promise(resolve => setTimeout(resolve, intervalMs));
      }
    },
  };
}

export type JobsClient = ReturnType<typeof createJobsClient>;
