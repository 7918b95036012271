import path from 'node:path';
import type { MediaTransformEngine } from '../media/engine.js';
import { SplitScreenParamsSchema } from '../schemas/job.js';
import { type JobContext, type JobHandler, type ProducedArtifact, parseParams } from './base.js';

export class SplitScreenHandler implements JobHandler {
  readonly kind = 'split-screen';

  constructor(private engine: MediaTransformEngine) {}

  async execute(context: JobContext): Promise<ProducedArtifact> {
    const { job, workspace, signal, fetchInput } = context;
    const params = parseParams(SplitScreenParamsSchema, job.params);

    const primary = await fetchInput(0, 'primary');
    const secondary = await fetchInput(1, 'secondary');

    const output = path.join(workspace, 'output.mp4');
    await this.engine.stackVertical(primary, secondary, output, { primaryPosition: params.primary_position }, signal);
    return { path: output, contentType: 'video/mp4', extension: '.mp4' };
  }
}
