export interface GeneratedContent {
  data: Uint8Array;
  contentType: string;
  extension: string;
}

export interface GenerateOptions {
  /** `<jobId>:<attemptCount>`; sent upstream as Idempotency-Key. */
  idempotencyKey: string;
  signal?: AbortSignal;
}

export type ImageMimeType = 'image/jpeg' | 'image/png';

export interface VideoGenerationRequest {
  image: Uint8Array;
  imageMimeType: ImageMimeType;
  prompt?: string;
  model: string;
}

export interface ImageGenerationRequest {
  prompt: string;
  model: 'juggernaut-pro-flux' | 'gpt-image-1';
  seed?: number;
}

export interface GenerationClient<TRequest> {
  generate(request: TRequest, options: GenerateOptions): Promise<GeneratedContent>;
}

export type VideoGenerationClient = GenerationClient<VideoGenerationRequest>;
export type ImageGenerationClient = GenerationClient<ImageGenerationRequest>;
