import type { AppConfig } from '../config.js';
import type { JobRepository } from './base.js';
import { InMemoryJobRepository } from './memory.js';
import { RedisJobRepository } from './redis.js';
import type { UpstashClient } from './upstash.js';

export * from './base.js';
export * from './memory.js';
export * from './redis.js';
export * from './transitions.js';
export * from './upstash.js';

export function createJobRepository(config: Pick<AppConfig, 'repo' | 'api'>, client: UpstashClient | null): JobRepository {
  switch (config.repo.kind) {
    case 'memory':
      return new InMemoryJobRepository({ defaultMaxAttempts: config.api.defaultMaxAttempts });

    case 'redis':
      if (!client) {
        throw new Error('A Redis client is required when REPO_KIND=redis');
      }
      return new RedisJobRepository(client, {
        keyPrefix: config.repo.keyPrefix,
        defaultMaxAttempts: config.api.defaultMaxAttempts,
      });
  }
}
