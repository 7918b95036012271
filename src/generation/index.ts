import type { AppConfig } from '../config.js';
import type { Logger } from '../logger.js';
import type { ImageGenerationClient, VideoGenerationClient } from './base.js';
import { GenerationHttp } from './http.js';
import { MiniMaxVideoClient } from './minimax.js';
import { SegmindImageClient } from './segmind.js';

export * from './base.js';
export * from './http.js';
export * from './minimax.js';
export * from './segmind.js';

export interface GenerationClients {
  video: VideoGenerationClient;
  image: ImageGenerationClient;
}

export function createGenerationClients(
  config: Pick<AppConfig, 'generation'>,
  log?: Logger,
  fetchImpl?: typeof fetch
): GenerationClients {
  const { generation } = config;
  const retry = {
    maxAttempts: generation.maxRetries,
    initialDelayMs: generation.retryBaseMs,
    maxDelayMs: generation.retryBaseMs * 8,
    multiplier: 2,
  };
  const http = (provider: string) => new GenerationHttp({
    provider,
    retry,
    requestTimeoutMs: generation.requestTimeoutMs,
    fetch: fetchImpl,
    log,
  });

  return {
    video: new MiniMaxVideoClient({
      http: http('MiniMax'),
      apiKey: generation.minimax.apiKey,
      baseUrl: generation.minimax.baseUrl,
      pollIntervalMs: generation.minimax.pollIntervalMs,
      maxPolls: generation.minimax.maxPolls,
      log,
    }),
    image: new SegmindImageClient({
      http: http('Segmind'),
      apiKey: generation.segmind.apiKey,
      baseUrl: generation.segmind.baseUrl,
      log,
    }),
  };
}
