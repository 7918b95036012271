import type { z } from 'zod';
import { PermanentJobError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { Job, JobKind } from '../types/job.js';

export interface JobContext {
  job: Job;
  /** Scratch directory owned by this run; removed when the run ends. */
  workspace: string;
  signal: AbortSignal;
  heartbeat: () => Promise<void>;
  /** Downloads `job.inputRefs[index]` into the workspace and returns the local path. */
  fetchInput: (index: number, name: string) => Promise<string>;
  log: Logger;
}

export interface ProducedArtifact {
  path: string;
  contentType: string;
  extension: string;
}

export interface JobHandler {
  readonly kind: JobKind;
  execute(context: JobContext): Promise<ProducedArtifact>;
}

export type JobHandlerRegistry = Map<JobKind, JobHandler>;

/** Params were checked at submission; a record that no longer parses cannot succeed on retry. */
export function parseParams<S extends z.ZodTypeAny>(schema: S, params: unknown): z.output<S> {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    throw new PermanentJobError('INVALID_PARAMS', `Invalid job params: ${parsed.error.issues[0]?.message ?? 'unknown'}`, {
      step: 'validate',
    });
  }
  return parsed.data;
}

export function generationKey(job: Job): string {
  return `${job.id}:${job.attemptCount}`;
}
