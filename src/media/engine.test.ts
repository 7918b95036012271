import os from 'node:os';
import path from 'node:path';
import { mkdtemp, readFile, rm, stat, writeFile } from 'node:fs/promises';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { MediaTransformEngine, escapeFilterValue } from './engine.js';
import { ToolInvocationError } from './runner.js';
import { PermanentJobError, TransientInfraError, TransientUpstreamError } from '../errors.js';
import { FakeToolRunner, silentLog } from '../testing/fakes.js';

function argAfter(args: string[], flag: string): string {
  return args[args.indexOf(flag) + 1] ?? '';
}

describe('MediaTransformEngine', () => {
  let dir: string;
  let fontDir: string;
  let runner: FakeToolRunner;
  let engine: MediaTransformEngine;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(os.tmpdir(), 'engine-test-'));
    fontDir = await mkdtemp(path.join(os.tmpdir(), 'engine-fonts-'));
    await writeFile(path.join(fontDir, 'Poppins-ExtraBold.ttf'), '');
    runner = new FakeToolRunner();
    engine = new MediaTransformEngine({
      ffmpegPath: 'ffmpeg',
      ffprobePath: 'ffprobe',
      fontDir,
      tempDir: os.tmpdir(),
      timeoutMs: 1000,
      tempQuotaBytes: 1024 * 1024,
      runner,
      log: silentLog,
    });
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
    await rm(fontDir, { recursive: true, force: true });
  });

  describe('probe', () => {
    it('should read dimensions, duration and audio presence', async () => {
      runner.probes.set('clip.mp4', { width: 720, height: 1280, durationSec: 12.5, hasAudio: false });

      expect(await engine.probe(path.join(dir, 'clip.mp4'))).toEqual({
        width: 720,
        height: 1280,
        durationSec: 12.5,
        hasAudio: false,
      });
      expect(runner.calls[0]?.args.slice(0, 6)).toEqual(['-v', 'error', '-print_format', 'json', '-show_streams', '-show_format']);
    });

    it('should reject output that is not JSON', async () => {
      const brokenRunner = { run: async () => ({ stdout: 'not json', stderr: '' }) };
      const broken = new MediaTransformEngine({
        ffmpegPath: 'ffmpeg', ffprobePath: 'ffprobe', fontDir, tempDir: os.tmpdir(),
        timeoutMs: 1000, tempQuotaBytes: 1024, runner: brokenRunner,
      });

      await expect(broken.probe('clip.mp4')).rejects.toMatchObject({ code: 'UNSUPPORTED_INPUT', step: 'probe' });
    });
  });

  describe('overlayText', () => {
    it('should write the wrapped caption and burn it in with drawtext', async () => {
      runner.probes.set('avatar.mp4', { width: 720, height: 1280, durationSec: 4, hasAudio: true });
      const output = path.join(dir, 'captioned.mp4');

      await engine.overlayText(path.join(dir, 'avatar.mp4'), output, {
        text: 'Big launch today',
        fontStyle: 'poppins',
        position: 'bottom',
      });

      expect(await readFile(`${output}.caption.txt`, 'utf8')).toBe('Big launch today');

      const [call] = runner.ffmpegCalls();
      const vf = argAfter(call?.args ?? [], '-vf');
      expect(vf.startsWith('drawtext=fontfile=')).toBe(true);
      expect(vf).toContain(':fontsize=48:fontcolor=white:borderw=2:bordercolor=black:line_spacing=-10:x=(w-text_w)/2:y=h*0.8-text_h');
      expect(call?.args.slice(0, 4)).toEqual(['-y', '-hide_banner', '-loglevel', 'error']);
      expect(call?.args[call.args.length - 1]).toBe(output);
    });

    it('should fail permanently when the font file is missing', async () => {
      await expect(
        engine.overlayText('in.mp4', path.join(dir, 'out.mp4'), { text: 'Hi', fontStyle: 'titanOne', position: 'top' })
      ).rejects.toMatchObject({ code: 'FONT_UNAVAILABLE', retryable: false });
      expect(runner.calls).toHaveLength(0);
    });
  });

  describe('concat', () => {
    it('should pad the first clip with silence when the second has audio', async () => {
      runner.probes.set('first.mp4', { width: 720, height: 1280, durationSec: 3.5, hasAudio: false });

      await engine.concat(path.join(dir, 'first.mp4'), path.join(dir, 'second.mp4'), path.join(dir, 'out.mp4'));

      const [call] = runner.ffmpegCalls();
      const filter = argAfter(call?.args ?? [], '-filter_complex');
      expect(filter).toContain('anullsrc=channel_layout=stereo:sample_rate=44100,atrim=duration=3.5[a0]');
      expect(filter).toContain('[v0][a0][v1][a1]concat=n=2:v=1:a=1[v][a]');
      expect(call?.args).toContain('-c:a');
    });

    it('should concatenate video only when the second clip is silent', async () => {
      runner.probes.set('second.mp4', { width: 1920, height: 1080, durationSec: 8, hasAudio: false });

      await engine.concat(path.join(dir, 'first.mp4'), path.join(dir, 'second.mp4'), path.join(dir, 'out.mp4'));

      const [call] = runner.ffmpegCalls();
      expect(argAfter(call?.args ?? [], '-filter_complex')).toContain('[v0][v1]concat=n=2:v=1:a=0[v]');
      expect(call?.args).not.toContain('-c:a');
    });
  });

  describe('addBackgroundMusic', () => {
    it('should mix the music under existing audio', async () => {
      await engine.addBackgroundMusic(path.join(dir, 'in.mp4'), path.join(dir, 'music.mp3'), path.join(dir, 'out.mp4'), 0.3);

      const [call] = runner.ffmpegCalls();
      expect(argAfter(call?.args ?? [], '-filter_complex')).toBe('[1:a]volume=0.3[bgm];[0:a][bgm]amix=inputs=2:duration=first[a]');
      expect(argAfter(call?.args ?? [], '-c:v')).toBe('copy');
    });

    it('should reject a volume outside 0..1 before running anything', async () => {
      await expect(engine.addBackgroundMusic('in.mp4', 'music.mp3', path.join(dir, 'out.mp4'), 1.5))
        .rejects.toMatchObject({ code: 'INVALID_PARAMS' });
      expect(runner.calls).toHaveLength(0);
    });
  });

  describe('fitPortrait', () => {
    it('should emit a single frame for stills', async () => {
      await engine.fitPortrait(path.join(dir, 'in.jpg'), path.join(dir, 'out.png'), { still: true });

      const [call] = runner.ffmpegCalls();
      expect(argAfter(call?.args ?? [], '-vf')).toBe("crop=w='min(iw,ih*9/16)':h='min(ih,iw*16/9)',scale=576:1024,setsar=1");
      expect(argAfter(call?.args ?? [], '-frames:v')).toBe('1');
    });
  });

  describe('stackVertical', () => {
    it('should put the primary clip below when asked and cut to its duration', async () => {
      runner.probes.set('primary.mp4', { width: 1080, height: 1920, durationSec: 9, hasAudio: true });

      await engine.stackVertical(
        path.join(dir, 'primary.mp4'),
        path.join(dir, 'secondary.mp4'),
        path.join(dir, 'out.mp4'),
        { primaryPosition: 'bottom' }
      );

      const [call] = runner.ffmpegCalls();
      const args = call?.args ?? [];
      expect(argAfter(args, '-filter_complex')).toBe(
        '[0:v]scale=900:960:force_original_aspect_ratio=increase,crop=900:960,setsar=1[p];' +
        '[1:v]scale=900:640:force_original_aspect_ratio=increase,crop=900:640,setsar=1[s];' +
        '[s][p]vstack=inputs=2[v]'
      );
      expect(argAfter(args, '-stream_loop')).toBe('-1');
      expect(argAfter(args, '-t')).toBe('9');
    });
  });

  describe('tool failures', () => {
    it('should classify unreadable input as permanent', async () => {
      runner.failWith = () => new ToolInvocationError('ffmpeg', 'exit', 1, 'frame=0\n[mov] moov atom not found\n');

      const attempt = engine.fitPortrait('in.mp4', path.join(dir, 'out.mp4'), { still: false });
      await expect(attempt).rejects.toBeInstanceOf(PermanentJobError);
      await expect(attempt).rejects.toMatchObject({ code: 'UNSUPPORTED_INPUT', message: '[mov] moov atom not found' });
    });

    it('should classify other exits as transient', async () => {
      runner.failWith = () => new ToolInvocationError('ffmpeg', 'exit', 1, 'Conversion failed!');

      const attempt = engine.fitPortrait('in.mp4', path.join(dir, 'out.mp4'), { still: false });
      await expect(attempt).rejects.toBeInstanceOf(TransientUpstreamError);
      await expect(attempt).rejects.toMatchObject({ code: 'TRANSFORM_FAILED', message: 'Conversion failed!' });
    });

    it('should classify timeouts and missing binaries', async () => {
      runner.failWith = () => new ToolInvocationError('ffmpeg', 'timeout', undefined, '');
      await expect(engine.fitPortrait('in.mp4', path.join(dir, 'out.mp4'), { still: false }))
        .rejects.toMatchObject({ code: 'TRANSFORM_TIMEOUT' });

      runner.failWith = () => new ToolInvocationError('ffmpeg', 'spawn', undefined, '');
      await expect(engine.fitPortrait('in.mp4', path.join(dir, 'out.mp4'), { still: false }))
        .rejects.toBeInstanceOf(TransientInfraError);
    });

    it('should surface the abort reason when a run is cancelled', async () => {
      const controller = new AbortController();
      const reason = new TransientUpstreamError('JOB_TIMEOUT', 'too slow');
      controller.abort(reason);
      runner.failWith = () => new ToolInvocationError('ffmpeg', 'cancelled', undefined, '');

      await expect(engine.fitPortrait('in.mp4', path.join(dir, 'out.mp4'), { still: false }, controller.signal)).rejects.toBe(reason);
    });
  });

  describe('temp quota', () => {
    it('should fail once the workspace grows past the quota', async () => {
      const tight = new MediaTransformEngine({
        ffmpegPath: 'ffmpeg', ffprobePath: 'ffprobe', fontDir, tempDir: os.tmpdir(),
        timeoutMs: 1000, tempQuotaBytes: 10, runner,
      });

      await expect(tight.fitPortrait('in.jpg', path.join(dir, 'out.png'), { still: true })).rejects.toMatchObject({
        code: 'TEMP_QUOTA_EXCEEDED',
        message: 'Workspace uses 16 bytes, over the 10 byte limit',
      });
    });
  });

  describe('withWorkspace', () => {
    it('should remove the directory afterwards, even on failure', async () => {
      let seen = '';
      await expect(engine.withWorkspace('job-1', async workspace => {
        seen = workspace;
        await writeFile(path.join(workspace, 'partial.mp4'), 'x');
        throw new Error('boom');
      })).rejects.toThrow('boom');

      expect(path.basename(seen).startsWith('mjs-job-1-')).toBe(true);
      await expect(stat(seen)).rejects.toMatchObject({ code: 'ENOENT' });
    });
  });
});

describe('escapeFilterValue', () => {
  it('should escape for the option and the filtergraph level', () => {
    expect(escapeFilterValue('a:b')).toBe('a\\\\:b');
    expect(escapeFilterValue('x,y')).toBe('x\\,y');
    expect(escapeFilterValue('/tmp/fonts/Poppins.ttf')).toBe('/tmp/fonts/Poppins.ttf');
  });
});
