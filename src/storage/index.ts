import type { AppConfig } from '../config.js';
import type { ArtifactStore } from './base.js';
import { LocalArtifactStore } from './local.js';
import { S3ArtifactStore } from './s3.js';

export * from './base.js';
export * from './local.js';
export * from './s3.js';

export function createArtifactStore(config: Pick<AppConfig, 'storage'>): ArtifactStore {
  const { storage } = config;
  switch (storage.kind) {
    case 'local':
      return new LocalArtifactStore(storage.rootPath, storage.bucket);

    case 's3':
      return new S3ArtifactStore({
        bucket: storage.bucket,
        region: storage.region,
        accessKeyId: storage.accessKeyId,
        secretAccessKey: storage.secretAccessKey,
        endpoint: storage.endpoint,
        forcePathStyle: storage.forcePathStyle,
      });
  }
}
