import type { GenerationClients } from '../generation/index.js';
import type { MediaTransformEngine } from '../media/engine.js';
import type { JobHandler, JobHandlerRegistry } from './base.js';
import { ImageToVideoHandler } from './image-to-video.js';
import { PromoVideoHandler } from './promo-video.js';
import { SplitScreenHandler } from './split-screen.js';
import { TextToImageHandler } from './text-to-image.js';

export * from './base.js';
export * from './image-to-video.js';
export * from './promo-video.js';
export * from './split-screen.js';
export * from './text-to-image.js';

export interface HandlerDependencies {
  engine: MediaTransformEngine;
  generation: GenerationClients;
}

export function createJobHandlers(deps: HandlerDependencies): JobHandlerRegistry {
  const handlers: JobHandler[] = [
    new PromoVideoHandler(deps.engine),
    new ImageToVideoHandler(deps.engine, deps.generation.video),
    new TextToImageHandler(deps.engine, deps.generation.image),
    new SplitScreenHandler(deps.engine),
  ];

  return new Map(handlers.map(handler => [handler.kind, handler]));
}
