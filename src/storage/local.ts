import path from 'node:path';
import { constants, createReadStream } from 'node:fs';
import { copyFile, mkdir, rm, stat } from 'node:fs/promises';
import type { Readable } from 'node:stream';
import {
  type ArtifactLocation,
  type ArtifactStore,
  ArtifactExistsError,
  ArtifactNotFoundError,
  InvalidArtifactRefError,
  parseSchemeRef,
} from './base.js';

function isErrno(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code;
}

/** Filesystem store for development and tests: `local://<bucket>/<key>` under a root directory. */
export class LocalArtifactStore implements ArtifactStore {
  readonly scheme = 'local';

  constructor(private rootPath: string, private bucket: string) {}

  parseRef(ref: string): ArtifactLocation {
    const location = parseSchemeRef(ref, this.scheme);
    this.resolve(location, ref);
    return location;
  }

  formatRef(location: ArtifactLocation): string {
    return `${this.scheme}://${location.bucket}/${location.key}`;
  }

  async putFile(key: string, sourcePath: string, _contentType: string): Promise<string> {
    const location = { bucket: this.bucket, key };
    const target = this.resolve(location, key);
    await mkdir(path.dirname(target), { recursive: true });

    try {
      await copyFile(sourcePath, target, constants.COPYFILE_EXCL);
    } catch (error) {
      if (isErrno(error, 'EEXIST')) {
        throw new ArtifactExistsError(location, { cause: error });
      }
      throw error;
    }
    return this.formatRef(location);
  }

  async read(location: ArtifactLocation): Promise<Readable> {
    const file = this.resolve(location, location.key);
    try {
      await stat(file);
    } catch (error) {
      throw this.mapError(error, location);
    }
    return createReadStream(file);
  }

  async download(location: ArtifactLocation, destinationPath: string): Promise<void> {
    try {
      await copyFile(this.resolve(location, location.key), destinationPath);
    } catch (error) {
      throw this.mapError(error, location);
    }
  }

  async getDownloadUrl(_location: ArtifactLocation, _ttlSec: number): Promise<string | null> {
    return null;
  }

  async delete(location: ArtifactLocation): Promise<void> {
    await rm(this.resolve(location, location.key), { force: true });
  }

  private resolve(location: ArtifactLocation, ref: string): string {
    const base = path.resolve(this.rootPath);
    const bucketDir = path.resolve(base, location.bucket);
    const file = path.resolve(bucketDir, location.key);
    if (!bucketDir.startsWith(base + path.sep) || !file.startsWith(bucketDir + path.sep)) {
      throw new InvalidArtifactRefError(ref, 'path escapes the artifact root');
    }
    return file;
  }

  private mapError(error: unknown, location: ArtifactLocation): unknown {
    return isErrno(error, 'ENOENT') ? new ArtifactNotFoundError(location, { cause: error }) : error;
  }
}
