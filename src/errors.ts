import type { FastifyReply } from 'fastify';
import type { ZodIssue } from 'zod';
import type { ErrorType, JobError } from './types/job.js';
import { msg, type ErrKey } from './lib/error-messages.js';

export interface PipelineErrorOptions {
  step?: string;
  cause?: unknown;
}

/**
 * Base of the job error taxonomy. `retryable` decides whether the worker
 * requeues the job or fails it.
 */
export abstract class PipelineError extends Error {
  abstract readonly type: ErrorType;
  abstract readonly retryable: boolean;
  readonly step?: string;

  constructor(readonly code: string, message: string, options: PipelineErrorOptions = {}) {
    super(message, { cause: options.cause });
    this.name = new.target.name;
    this.step = options.step;
  }
}

export class ValidationError extends PipelineError {
  readonly type = 'ValidationError';
  readonly retryable = false;

  constructor(message: string, readonly issues: ZodIssue[] = []) {
    super('VALIDATION_ERROR', message);
  }
}

export class TransientInfraError extends PipelineError {
  readonly type = 'TransientInfraError';
  readonly retryable = true;
}

export class TransientUpstreamError extends PipelineError {
  readonly type = 'TransientUpstreamError';
  readonly retryable = true;
}

export class PermanentJobError extends PipelineError {
  readonly type = 'PermanentJobError';
  readonly retryable = false;
}

export class ExpiredError extends PipelineError {
  readonly type = 'ExpiredError';
  readonly retryable = false;

  constructor(message = 'Job expired before a worker picked it up') {
    super('EXPIRED', message);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isRetryable(error: unknown): boolean {
  return !(error instanceof PipelineError) || error.retryable;
}

/** Converts any thrown value into the record stored on a job. Unknown errors count as transient. */
export function toJobError(error: unknown, attempt: number, now: Date = new Date()): JobError {
  if (error instanceof PipelineError) {
    return {
      type: error.type,
      code: error.code,
      message: error.message,
      retryable: error.retryable,
      attempt,
      ...(error.step ? { step: error.step } : {}),
      occurredAt: now.toISOString(),
    };
  }

  return {
    type: 'TransientInfraError',
    code: 'INTERNAL',
    message: errorMessage(error),
    retryable: true,
    attempt,
    occurredAt: now.toISOString(),
  };
}

// HTTP error bodies share one shape: { error, message, code, details? }

export interface HttpErrorBody {
  error: string;
  message: string;
  code: string;
  details?: unknown;
}

export function replyWithError(
  reply: FastifyReply,
  statusCode: number,
  code: string,
  key: ErrKey,
  details?: unknown,
  message?: string
): FastifyReply {
  const body: HttpErrorBody = {
    error: httpReason(statusCode),
    message: message ?? msg(key),
    code,
    ...(details === undefined ? {} : { details }),
  };
  return reply.code(statusCode).send(body);
}

function httpReason(statusCode: number): string {
  switch (statusCode) {
    case 400: return 'Validation Error';
    case 401: return 'Unauthorized';
    case 404: return 'Not Found';
    case 409: return 'Conflict';
    case 413: return 'Payload Too Large';
    case 429: return 'Too Many Requests';
    case 503: return 'Service Unavailable';
    default: return 'Internal Server Error';
  }
}
