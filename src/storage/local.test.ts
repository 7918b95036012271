import os from 'node:os';
import path from 'node:path';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { text } from 'node:stream/consumers';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { LocalArtifactStore } from './local.js';
import { ArtifactExistsError, ArtifactNotFoundError, InvalidArtifactRefError, outputKey } from './base.js';

describe('LocalArtifactStore', () => {
  let root: string;
  let store: LocalArtifactStore;
  let source: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'artifacts-'));
    store = new LocalArtifactStore(root, 'media');
    source = path.join(root, 'source.mp4');
    await writeFile(source, 'video-bytes');
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should store a file and hand back its ref', async () => {
    const ref = await store.putFile(outputKey('01JOB', 2, '.mp4'), source, 'video/mp4');
    expect(ref).toBe('local://media/outputs/01JOB/attempt-2.mp4');

    const location = store.parseRef(ref);
    expect(location).toEqual({ bucket: 'media', key: 'outputs/01JOB/attempt-2.mp4' });
    expect(await text(await store.read(location))).toBe('video-bytes');

    const copy = path.join(root, 'copy.mp4');
    await store.download(location, copy);
    expect(await readFile(copy, 'utf8')).toBe('video-bytes');
  });

  it('should never overwrite an existing artifact', async () => {
    await store.putFile('outputs/a.mp4', source, 'video/mp4');
    await expect(store.putFile('outputs/a.mp4', source, 'video/mp4')).rejects.toBeInstanceOf(ArtifactExistsError);
  });

  it('should report missing artifacts', async () => {
    const location = { bucket: 'media', key: 'inputs/missing.mp4' };
    await expect(store.read(location)).rejects.toBeInstanceOf(ArtifactNotFoundError);
    await expect(store.download(location, path.join(root, 'x.mp4'))).rejects.toBeInstanceOf(ArtifactNotFoundError);
  });

  it('should reject refs with another scheme or escaping the root', () => {
    expect(() => store.parseRef('s3://media/a.mp4')).toThrow(InvalidArtifactRefError);
    expect(() => store.parseRef('local://media/..%2F..%2Fsecret')).toThrow('Invalid artifact reference: path escapes the artifact root');
    expect(() => store.parseRef('not a ref')).toThrow('Invalid artifact reference: not a URL');
  });

  it('should delete artifacts and offer no download URL', async () => {
    const ref = await store.putFile('outputs/b.png', source, 'image/png');
    const location = store.parseRef(ref);

    expect(await store.getDownloadUrl(location, 60)).toBeNull();
    await store.delete(location);
    await expect(store.read(location)).rejects.toBeInstanceOf(ArtifactNotFoundError);
  });
});
