import path from 'node:path';
import { writeFile } from 'node:fs/promises';
import type { ImageGenerationClient } from '../generation/base.js';
import type { MediaTransformEngine } from '../media/engine.js';
import { TextToImageParamsSchema } from '../schemas/job.js';
import { type JobContext, type JobHandler, type ProducedArtifact, generationKey, parseParams } from './base.js';

export class TextToImageHandler implements JobHandler {
  readonly kind = 'text-to-image';

  constructor(private engine: MediaTransformEngine, private client: ImageGenerationClient) {}

  async execute(context: JobContext): Promise<ProducedArtifact> {
    const { job, workspace, signal, heartbeat } = context;
    const params = parseParams(TextToImageParamsSchema, job.params);

    const generated = await this.client.generate(
      { prompt: params.prompt, model: params.model, seed: params.seed },
      { idempotencyKey: generationKey(job), signal }
    );
    await heartbeat();

    const rawImage = path.join(workspace, `generated${generated.extension}`);
    await writeFile(rawImage, generated.data);

    const output = path.join(workspace, 'output.png');
    await this.engine.fitPortrait(rawImage, output, { still: true }, signal);
    return { path: output, contentType: 'image/png', extension: '.png' };
  }
}
