import type { AppConfig } from './config.js';
import { createGenerationClients, type GenerationClients } from './generation/index.js';
import { createJobHandlers } from './handlers/index.js';
import type { JobHandlerRegistry } from './handlers/base.js';
import type { Logger } from './logger.js';
import { MediaTransformEngine } from './media/engine.js';
import { createTaskQueue, type TaskQueue } from './queue/index.js';
import { createJobRepository, type JobRepository, UpstashClient } from './repositories/index.js';
import { createArtifactStore, type ArtifactStore } from './storage/index.js';
import { JobReaper } from './worker/reaper.js';
import { JobWorker } from './worker/index.js';

export interface Services {
  repo: JobRepository;
  queue: TaskQueue;
  store: ArtifactStore;
  engine: MediaTransformEngine;
  generation: GenerationClients;
  handlers: JobHandlerRegistry;
}

/** One Redis connection per process, shared by the repository and the queue. */
export function createServices(config: AppConfig, log: Logger): Services {
  const client = config.repo.kind === 'redis' && config.repo.redisUrl && config.repo.redisToken
    ? new UpstashClient(config.repo.redisUrl, config.repo.redisToken)
    : null;

  const engine = new MediaTransformEngine({ ...config.transform, log: log.child({ component: 'media' }) });
  const generation = createGenerationClients(config, log.child({ component: 'generation' }));

  return {
    repo: createJobRepository(config, client),
    queue: createTaskQueue(config, client),
    store: createArtifactStore(config),
    engine,
    generation,
    handlers: createJobHandlers({ engine, generation }),
  };
}

export function createWorker(services: Services, config: AppConfig, log: Logger): JobWorker {
  return new JobWorker({ ...services, log }, config.worker);
}

export function createReaper(services: Services, config: AppConfig, log: Logger): JobReaper {
  return new JobReaper({ ...services, log }, config.reaper);
}
