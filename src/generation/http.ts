import type { ZodType, ZodTypeDef } from 'zod';
import { PermanentJobError, PipelineError, TransientUpstreamError } from '../errors.js';
import type { Logger } from '../logger.js';
import { withRetry, type RetryConfig } from '../utils/retry.js';

export interface GenerationHttpOptions {
  provider: string;
  retry: RetryConfig;
  requestTimeoutMs: number;
  fetch?: typeof fetch;
  log?: Logger;
}

export interface RequestOptions {
  step: string;
  signal?: AbortSignal;
}

const BODY_PREVIEW_CHARS = 200;

/**
 * Shared transport for the generation providers: per-call timeout, bounded
 * retry on transient failures and a stable error classification.
 */
export class GenerationHttp {
  private readonly fetchImpl: typeof fetch;

  constructor(private options: GenerationHttpOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async json<T>(url: string, init: RequestInit, schema: ZodType<T, ZodTypeDef, unknown>, options: RequestOptions): Promise<T> {
    return this.retrying(async () => {
      const text = await this.attempt(url, init, options, response => response.text());
      const parsed = schema.safeParse(parseJson(text));
      if (!parsed.success) {
        throw new TransientUpstreamError('UPSTREAM_BAD_RESPONSE', `${this.options.provider} returned an unexpected response`, {
          step: options.step,
        });
      }
      return parsed.data;
    }, options);
  }

  async bytes(url: string, init: RequestInit, options: RequestOptions): Promise<{ data: Uint8Array; headers: Headers }> {
    return this.retrying(
      () => this.attempt(url, init, options, async response => ({
        data: new Uint8Array(await response.arrayBuffer()),
        headers: response.headers,
      })),
      options
    );
  }

  private retrying<T>(fn: () => Promise<T>, options: RequestOptions): Promise<T> {
    return withRetry(fn, this.options.retry, {
      signal: options.signal,
      onLog: entry => {
        if (!entry.success) {
          this.options.log?.warn({ provider: this.options.provider, step: options.step, ...entry }, 'Generation request failed');
        }
      },
    });
  }

  /** The timeout and the caller's signal cover the whole exchange, body included. */
  private async attempt<T>(
    url: string,
    init: RequestInit,
    options: RequestOptions,
    read: (response: Response) => Promise<T>
  ): Promise<T> {
    const { provider, requestTimeoutMs } = this.options;
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), requestTimeoutMs);
    const onAbort = () => controller.abort();
    options.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const response = await this.fetchImpl(url, { ...init, signal: controller.signal });
      if (!response.ok) {
        const body = (await response.text().catch(() => '')).slice(0, BODY_PREVIEW_CHARS);
        throw classifyStatus(provider, response.status, body, options.step);
      }
      return await read(response);
    } catch (error) {
      if (options.signal?.aborted) {
        throw options.signal.reason;
      }
      if (error instanceof PipelineError) {
        throw error;
      }
      if (controller.signal.aborted) {
        throw new TransientUpstreamError('UPSTREAM_TIMEOUT', `${provider} did not answer within ${requestTimeoutMs}ms`, {
          step: options.step,
          cause: error,
        });
      }
      throw new TransientUpstreamError('UPSTREAM_UNAVAILABLE', `${provider} request failed`, { step: options.step, cause: error });
    } finally {
      clearTimeout(timer);
      options.signal?.removeEventListener('abort', onAbort);
    }
  }
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

export function classifyStatus(provider: string, status: number, body: string, step: string): Error {
  const message = `${provider} responded ${status}${body ? `: ${body}` : ''}`;

  if (status === 401 || status === 403) {
    return new PermanentJobError('UPSTREAM_AUTH', message, { step });
  }
  if (status === 408 || status === 429 || status >= 500) {
    return new TransientUpstreamError(status === 429 ? 'UPSTREAM_RATE_LIMITED' : 'UPSTREAM_UNAVAILABLE', message, { step });
  }
  return new PermanentJobError('UPSTREAM_REJECTED', message, { step });
}
