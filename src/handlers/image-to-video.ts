import path from 'node:path';
import { readFile, writeFile } from 'node:fs/promises';
import { PermanentJobError } from '../errors.js';
import type { ImageMimeType, VideoGenerationClient } from '../generation/base.js';
import type { MediaTransformEngine } from '../media/engine.js';
import { ImageToVideoParamsSchema } from '../schemas/job.js';
import { type JobContext, type JobHandler, type ProducedArtifact, generationKey, parseParams } from './base.js';

const MAX_IMAGE_BYTES = 20 * 1024 * 1024;
const MIN_ASPECT = 0.4;
const MAX_ASPECT = 2.5;
const MIN_SHORT_SIDE = 300;

export function detectImageType(data: Uint8Array): ImageMimeType | null {
  if (data[0] === 0xff && data[1] === 0xd8 && data[2] === 0xff) return 'image/jpeg';
  if (data[0] === 0x89 && data[1] === 0x50 && data[2] === 0x4e && data[3] === 0x47) return 'image/png';
  return null;
}

/** Animates a still image with the video generation API, then fits it to 576x1024. */
export class ImageToVideoHandler implements JobHandler {
  readonly kind = 'image-to-video';

  constructor(private engine: MediaTransformEngine, private client: VideoGenerationClient) {}

  async execute(context: JobContext): Promise<ProducedArtifact> {
    const { job, workspace, signal, heartbeat, fetchInput } = context;
    const params = parseParams(ImageToVideoParamsSchema, job.params);

    const imagePath = await fetchInput(0, 'image');
    const image = new Uint8Array(await readFile(imagePath));
    const imageMimeType = await this.validateImage(imagePath, image, signal);

    const generated = await this.client.generate(
      { image, imageMimeType, prompt: params.prompt, model: params.model },
      { idempotencyKey: generationKey(job), signal }
    );
    await heartbeat();

    const rawVideo = path.join(workspace, `generated${generated.extension}`);
    await writeFile(rawVideo, generated.data);

    const output = path.join(workspace, 'output.mp4');
    await this.engine.fitPortrait(rawVideo, output, { still: false }, signal);
    return { path: output, contentType: 'video/mp4', extension: '.mp4' };
  }

  private async validateImage(imagePath: string, image: Uint8Array, signal: AbortSignal): Promise<ImageMimeType> {
    const mimeType = detectImageType(image);
    if (!mimeType) {
      throw new PermanentJobError('UNSUPPORTED_INPUT', 'Image must be JPG or PNG', { step: 'validate' });
    }
    if (image.byteLength > MAX_IMAGE_BYTES) {
      throw new PermanentJobError('UNSUPPORTED_INPUT', `Image is ${image.byteLength} bytes, over the 20MB limit`, { step: 'validate' });
    }

    const { width, height } = await this.engine.probe(imagePath, signal);
    const aspect = width / height;
    if (aspect < MIN_ASPECT || aspect > MAX_ASPECT) {
      throw new PermanentJobError('UNSUPPORTED_INPUT', `Image aspect ratio ${aspect.toFixed(2)} must be between 2:5 and 5:2`, {
        step: 'validate',
      });
    }
    if (Math.min(width, height) <= MIN_SHORT_SIDE) {
      throw new PermanentJobError('UNSUPPORTED_INPUT', `Image shorter side must exceed ${MIN_SHORT_SIDE}px`, { step: 'validate' });
    }
    return mimeType;
  }
}
