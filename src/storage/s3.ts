import { createReadStream, createWriteStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { Readable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import {
  DeleteObjectCommand,
  GetObjectCommand,
  NoSuchKey,
  PutObjectCommand,
  S3Client,
  S3ServiceException,
} from '@aws-sdk/client-s3';
import { getSignedUrl } from '@aws-sdk/s3-request-presigner';
import { TransientInfraError } from '../errors.js';
import {
  type ArtifactLocation,
  type ArtifactStore,
  ArtifactExistsError,
  ArtifactNotFoundError,
  InvalidArtifactRefError,
  parseSchemeRef,
} from './base.js';

export interface S3ArtifactStoreOptions {
  bucket: string;
  region?: string;
  accessKeyId?: string;
  secretAccessKey?: string;
  endpoint?: string;
  forcePathStyle?: boolean;
  client?: S3Client;
}

export class S3ArtifactStore implements ArtifactStore {
  readonly scheme = 's3';
  private readonly client: S3Client;
  private readonly bucket: string;

  constructor(options: S3ArtifactStoreOptions) {
    this.bucket = options.bucket;
    this.client = options.client ?? new S3Client({
      region: options.region,
      endpoint: options.endpoint,
      forcePathStyle: options.forcePathStyle,
      credentials: options.accessKeyId && options.secretAccessKey
        ? { accessKeyId: options.accessKeyId, secretAccessKey: options.secretAccessKey }
        : undefined,
    });
  }

  /** Accepts `s3://bucket/key` and virtual-hosted https URLs, presigned or not. */
  parseRef(ref: string): ArtifactLocation {
    if (!ref.startsWith('https://')) {
      return parseSchemeRef(ref, this.scheme);
    }

    let url: URL;
    try {
      url = new URL(ref);
    } catch {
      throw new InvalidArtifactRefError(ref, 'not a URL');
    }
    const [bucket, service] = url.hostname.split('.');
    const key = decodeURIComponent(url.pathname.replace(/^\/+/, ''));
    if (!bucket || !service?.startsWith('s3') || !key) {
      throw new InvalidArtifactRefError(ref, 'not an S3 object URL');
    }
    return { bucket, key };
  }

  formatRef(location: ArtifactLocation): string {
    return `${this.scheme}://${location.bucket}/${location.key}`;
  }

  async putFile(key: string, sourcePath: string, contentType: string): Promise<string> {
    const location = { bucket: this.bucket, key };
    const { size } = await stat(sourcePath);

    try {
      await this.client.send(new PutObjectCommand({
        Bucket: location.bucket,
        Key: key,
        Body: createReadStream(sourcePath),
        ContentType: contentType,
        ContentLength: size,
        IfNoneMatch: '*',
      }));
    } catch (error) {
      if (error instanceof S3ServiceException && error.$metadata.httpStatusCode === 412) {
        throw new ArtifactExistsError(location, { cause: error });
      }
      throw this.mapError(error, location);
    }
    return this.formatRef(location);
  }

  async read(location: ArtifactLocation): Promise<Readable> {
    try {
      const response = await this.client.send(new GetObjectCommand({ Bucket: location.bucket, Key: location.key }));
      if (!(response.Body instanceof Readable)) {
        throw new TransientInfraError('STORAGE_UNAVAILABLE', 'S3 returned no object body');
      }
      return response.Body;
    } catch (error) {
      throw this.mapError(error, location);
    }
  }

  async download(location: ArtifactLocation, destinationPath: string): Promise<void> {
    const body = await this.read(location);
    try {
      await pipeline(body, createWriteStream(destinationPath));
    } catch (error) {
      throw new TransientInfraError('STORAGE_UNAVAILABLE', `Download of ${location.key} failed`, { cause: error });
    }
  }

  async getDownloadUrl(location: ArtifactLocation, ttlSec: number): Promise<string | null> {
    const command = new GetObjectCommand({ Bucket: location.bucket, Key: location.key });
    return getSignedUrl(this.client, command, { expiresIn: ttlSec });
  }

  async delete(location: ArtifactLocation): Promise<void> {
    try {
      await this.client.send(new DeleteObjectCommand({ Bucket: location.bucket, Key: location.key }));
    } catch (error) {
      throw this.mapError(error, location);
    }
  }

  private mapError(error: unknown, location: ArtifactLocation): unknown {
    if (error instanceof NoSuchKey) {
      return new ArtifactNotFoundError(location, { cause: error });
    }
    if (error instanceof S3ServiceException && error.$metadata.httpStatusCode === 404) {
      return new ArtifactNotFoundError(location, { cause: error });
    }
    if (error instanceof TransientInfraError || error instanceof ArtifactNotFoundError) {
      return error;
    }
    return new TransientInfraError('STORAGE_UNAVAILABLE', `S3 request failed for ${location.key}`, { cause: error });
  }
}
