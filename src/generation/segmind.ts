import { PermanentJobError } from '../errors.js';
import type { Logger } from '../logger.js';
import type { GenerateOptions, GeneratedContent, ImageGenerationClient, ImageGenerationRequest } from './base.js';
import type { GenerationHttp } from './http.js';

export interface SegmindImageClientOptions {
  http: GenerationHttp;
  apiKey?: string;
  baseUrl: string;
  log?: Logger;
}

const DEFAULT_SEED = 1184522;
const NEGATIVE_PROMPT = 'cartoon, blurry, low quality, extra limbs, deformed';

export class SegmindImageClient implements ImageGenerationClient {
  constructor(private options: SegmindImageClientOptions) {}

  async generate(request: ImageGenerationRequest, options: GenerateOptions): Promise<GeneratedContent> {
    if (!this.options.apiKey) {
      throw new PermanentJobError('UPSTREAM_AUTH', 'Segmind API key is not configured', { step: 'generate' });
    }

    const { data, headers } = await this.options.http.bytes(
      `${this.options.baseUrl}/${request.model}`,
      {
        method: 'POST',
        headers: {
          'x-api-key': this.options.apiKey,
          'Content-Type': 'application/json',
          'Idempotency-Key': options.idempotencyKey,
        },
        body: JSON.stringify(buildPayload(request)),
      },
      { step: 'generate', signal: options.signal }
    );

    this.options.log?.info(
      { model: request.model, remainingCredits: headers.get('x-remaining-credits') ?? 'n/a' },
      'Image generated'
    );

    return request.model === 'gpt-image-1'
      ? { data, contentType: 'image/png', extension: '.png' }
      : { data, contentType: 'image/jpeg', extension: '.jpg' };
  }
}

export function buildPayload(request: ImageGenerationRequest): Record<string, unknown> {
  switch (request.model) {
    case 'juggernaut-pro-flux':
      return {
        positivePrompt: request.prompt,
        negativePrompt: NEGATIVE_PROMPT,
        width: 576,
        height: 1024,
        steps: 25,
        seed: request.seed ?? DEFAULT_SEED,
        CFGScale: 7,
        outputFormat: 'JPG',
        scheduler: 'Euler',
      };
    case 'gpt-image-1':
      return {
        prompt: request.prompt,
        size: 'auto',
        quality: 'auto',
        background: 'opaque',
        output_compression: 100,
        output_format: 'png',
      };
  }
}
