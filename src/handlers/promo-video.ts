import path from 'node:path';
import type { MediaTransformEngine } from '../media/engine.js';
import { PromoVideoParamsSchema } from '../schemas/job.js';
import { type JobContext, type JobHandler, type ProducedArtifact, parseParams } from './base.js';

/** Captioned avatar clip, followed by the demo clip, with optional background music. */
export class PromoVideoHandler implements JobHandler {
  readonly kind = 'promo-video';

  constructor(private engine: MediaTransformEngine) {}

  async execute(context: JobContext): Promise<ProducedArtifact> {
    const { job, workspace, signal, heartbeat, fetchInput, log } = context;
    const params = parseParams(PromoVideoParamsSchema, job.params);

    const avatar = await fetchInput(0, 'avatar');
    const demo = await fetchInput(1, 'demo');
    const music = job.inputRefs.length > 2 ? await fetchInput(2, 'music') : null;

    const captioned = path.join(workspace, 'captioned.mp4');
    await this.engine.overlayText(avatar, captioned, {
      text: params.text,
      fontStyle: params.font_style,
      position: params.text_position,
    }, signal);
    await heartbeat();

    const combined = path.join(workspace, 'combined.mp4');
    await this.engine.concat(captioned, demo, combined, signal);
    await heartbeat();

    if (!music) {
      return { path: combined, contentType: 'video/mp4', extension: '.mp4' };
    }

    log.debug({ volume: params.bgm_volume }, 'Adding background music');
    const final = path.join(workspace, 'final.mp4');
    await this.engine.addBackgroundMusic(combined, music, final, params.bgm_volume, signal);
    return { path: final, contentType: 'video/mp4', extension: '.mp4' };
  }
}
