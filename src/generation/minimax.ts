import { z } from 'zod';
import { PermanentJobError, TransientUpstreamError } from '../errors.js';
import type { Logger } from '../logger.js';
import { sleep } from '../utils/retry.js';
import type { GenerateOptions, GeneratedContent, VideoGenerationClient, VideoGenerationRequest } from './base.js';
import type { GenerationHttp } from './http.js';

const BaseRespSchema = z.object({
  status_code: z.number(),
  status_msg: z.string().default(''),
});

const SubmitResponseSchema = z.object({
  task_id: z.string().optional(),
  base_resp: BaseRespSchema,
});

const QueryResponseSchema = z.object({
  status: z.string().optional(),
  file_id: z.string().optional(),
  base_resp: BaseRespSchema,
});

const RetrieveResponseSchema = z.object({
  file: z.object({ download_url: z.string().url().optional() }).optional(),
  base_resp: BaseRespSchema,
});

const PENDING_STATUSES = new Set(['Queueing', 'Preparing', 'Processing']);

export interface MiniMaxVideoClientOptions {
  http: GenerationHttp;
  apiKey?: string;
  baseUrl: string;
  pollIntervalMs: number;
  maxPolls: number;
  log?: Logger;
}

/** Image-to-video through MiniMax: submit, poll the task, retrieve and download the file. */
export class MiniMaxVideoClient implements VideoGenerationClient {
  constructor(private options: MiniMaxVideoClientOptions) {}

  async generate(request: VideoGenerationRequest, options: GenerateOptions): Promise<GeneratedContent> {
    const taskId = await this.submit(request, options);
    const fileId = await this.poll(taskId, options);
    const downloadUrl = await this.retrieve(fileId, options);

    const { data } = await this.options.http.bytes(downloadUrl, { method: 'GET' }, { step: 'download', signal: options.signal });
    return { data, contentType: 'video/mp4', extension: '.mp4' };
  }

  private headers(options: GenerateOptions): Record<string, string> {
    if (!this.options.apiKey) {
      throw new PermanentJobError('UPSTREAM_AUTH', 'MiniMax API key is not configured', { step: 'submit' });
    }
    return {
      'Authorization': `Bearer ${this.options.apiKey}`,
      'Idempotency-Key': options.idempotencyKey,
    };
  }

  private async submit(request: VideoGenerationRequest, options: GenerateOptions): Promise<string> {
    const firstFrame = `data:${request.imageMimeType};base64,${Buffer.from(request.image).toString('base64')}`;
    const body = {
      model: request.model,
      ...(request.prompt ? { prompt: request.prompt } : {}),
      first_frame_image: firstFrame,
      prompt_optimizer: true,
    };

    const response = await this.options.http.json(
      `${this.options.baseUrl}/video_generation`,
      {
        method: 'POST',
        headers: { ...this.headers(options), 'Content-Type': 'application/json' },
        body: JSON.stringify(body),
      },
      SubmitResponseSchema,
      { step: 'submit', signal: options.signal }
    );
    checkBaseResp(response.base_resp, 'submit');

    if (!response.task_id) {
      throw new TransientUpstreamError('UPSTREAM_BAD_RESPONSE', 'MiniMax returned no task_id', { step: 'submit' });
    }
    this.options.log?.info({ taskId: response.task_id }, 'Video generation submitted');
    return response.task_id;
  }

  private async poll(taskId: string, options: GenerateOptions): Promise<string> {
    const url = `${this.options.baseUrl}/query/video_generation?task_id=${encodeURIComponent(taskId)}`;

    for (let poll = 1; poll <= this.options.maxPolls; poll++) {
      await sleep(this.options.pollIntervalMs, options.signal);

      const result = await this.options.http.json(
        url,
        { method: 'GET', headers: this.headers(options) },
        QueryResponseSchema,
        { step: 'poll', signal: options.signal }
      );
      checkBaseResp(result.base_resp, 'poll');
      this.options.log?.debug({ taskId, status: result.status, poll }, 'Video generation status');

      if (result.status === 'Success') {
        if (!result.file_id) {
          throw new TransientUpstreamError('UPSTREAM_BAD_RESPONSE', 'MiniMax returned no file_id', { step: 'poll' });
        }
        return result.file_id;
      }
      if (result.status === 'Fail' || result.status === 'Unknown') {
        throw new TransientUpstreamError('GENERATION_FAILED', `Video generation ended with status ${result.status}`, { step: 'poll' });
      }
      if (!result.status || !PENDING_STATUSES.has(result.status)) {
        throw new TransientUpstreamError('UPSTREAM_BAD_RESPONSE', `Unknown task status: ${result.status ?? 'none'}`, { step: 'poll' });
      }
    }

    throw new TransientUpstreamError('GENERATION_TIMEOUT', `Video not ready after ${this.options.maxPolls} polls`, { step: 'poll' });
  }

  private async retrieve(fileId: string, options: GenerateOptions): Promise<string> {
    const response = await this.options.http.json(
      `${this.options.baseUrl}/files/retrieve?file_id=${encodeURIComponent(fileId)}`,
      { method: 'GET', headers: this.headers(options) },
      RetrieveResponseSchema,
      { step: 'retrieve', signal: options.signal }
    );
    checkBaseResp(response.base_resp, 'retrieve');

    const downloadUrl = response.file?.download_url;
    if (!downloadUrl) {
      throw new TransientUpstreamError('UPSTREAM_BAD_RESPONSE', 'MiniMax returned no download_url', { step: 'retrieve' });
    }
    return downloadUrl;
  }
}

/** Maps a non-zero `base_resp.status_code` to the error taxonomy. */
export function checkBaseResp(baseResp: z.infer<typeof BaseRespSchema>, step: string): void {
  const { status_code: code, status_msg: statusMsg } = baseResp;
  if (code === 0) return;

  const message = `MiniMax error ${code}: ${statusMsg || 'unknown error'}`;
  switch (code) {
    case 1002:
      throw new TransientUpstreamError('UPSTREAM_RATE_LIMITED', message, { step });
    case 1004:
    case 1008:
      throw new PermanentJobError('UPSTREAM_AUTH', message, { step });
    case 1026:
    case 2013:
      throw new PermanentJobError('UPSTREAM_REJECTED', message, { step });
    default:
      throw new TransientUpstreamError('UPSTREAM_ERROR', message, { step });
  }
}
