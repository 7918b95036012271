import type { Readable } from 'node:stream';

export interface ArtifactLocation {
  bucket: string;
  key: string;
}

export class InvalidArtifactRefError extends Error {
  constructor(readonly ref: string, reason: string) {
    super(`Invalid artifact reference: ${reason}`);
    this.name = 'InvalidArtifactRefError';
  }
}

export class ArtifactNotFoundError extends Error {
  constructor(readonly location: ArtifactLocation, options: { cause?: unknown } = {}) {
    super(`Artifact not found: ${location.bucket}/${location.key}`, options);
    this.name = 'ArtifactNotFoundError';
  }
}

export class ArtifactExistsError extends Error {
  constructor(readonly location: ArtifactLocation, options: { cause?: unknown } = {}) {
    super(`Artifact already exists: ${location.bucket}/${location.key}`, options);
    this.name = 'ArtifactExistsError';
  }
}

/**
 * Immutable blobs addressed as `<scheme>://<bucket>/<key>`. Writes never
 * overwrite: a second put to the same key throws ArtifactExistsError.
 */
export interface ArtifactStore {
  readonly scheme: string;
  parseRef(ref: string): ArtifactLocation;
  formatRef(location: ArtifactLocation): string;
  /** Uploads a local file under `key` in the default bucket and returns its ref. */
  putFile(key: string, sourcePath: string, contentType: string): Promise<string>;
  read(location: ArtifactLocation): Promise<Readable>;
  download(location: ArtifactLocation, destinationPath: string): Promise<void>;
  /** Time-limited URL, or null when the store cannot issue one and the caller must stream. */
  getDownloadUrl(location: ArtifactLocation, ttlSec: number): Promise<string | null>;
  delete(location: ArtifactLocation): Promise<void>;
}

export function outputKey(jobId: string, attempt: number, extension: string): string {
  return `outputs/${jobId}/attempt-${attempt}${extension}`;
}

/** Splits `scheme://bucket/key`; the key keeps its inner slashes. */
export function parseSchemeRef(ref: string, scheme: string): ArtifactLocation {
  let url: URL;
  try {
    url = new URL(ref);
  } catch {
    throw new InvalidArtifactRefError(ref, 'not a URL');
  }
  if (url.protocol !== `${scheme}:`) {
    throw new InvalidArtifactRefError(ref, `expected ${scheme}:// scheme`);
  }

  const key = decodeURIComponent(url.pathname.replace(/^\/+/, ''));
  if (!url.hostname || !key) {
    throw new InvalidArtifactRefError(ref, 'bucket and key are required');
  }
  return { bucket: url.hostname, key };
}
