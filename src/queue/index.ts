import type { AppConfig } from '../config.js';
import type { UpstashClient } from '../repositories/upstash.js';
import type { TaskQueue } from './base.js';
import { InMemoryTaskQueue } from './memory.js';
import { RedisTaskQueue } from './redis.js';

export * from './base.js';
export * from './memory.js';
export * from './redis.js';

// The queue follows the repository's backend: both live in the same Redis.
export function createTaskQueue(config: Pick<AppConfig, 'repo' | 'queue'>, client: UpstashClient | null): TaskQueue {
  switch (config.repo.kind) {
    case 'memory':
      return new InMemoryTaskQueue({ visibilityTimeoutMs: config.queue.visibilityTimeoutMs });

    case 'redis':
      if (!client) {
        throw new Error('A Redis client is required when REPO_KIND=redis');
      }
      return new RedisTaskQueue(client, {
        keyPrefix: config.repo.keyPrefix,
        visibilityTimeoutMs: config.queue.visibilityTimeoutMs,
      });
  }
}
