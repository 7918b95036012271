import path from 'node:path';
import { mkdtemp, readdir, rm, stat, writeFile } from 'node:fs/promises';
import { z } from 'zod';
import { PermanentJobError, TransientInfraError, TransientUpstreamError } from '../errors.js';
import type { Logger } from '../logger.js';
import { resolveFont, type FontStyleName } from './fonts.js';
import { ExecaToolRunner, ToolInvocationError, type ToolRunner } from './runner.js';
import { wrapText } from './text.js';

export interface TransformEngineOptions {
  ffmpegPath: string;
  ffprobePath: string;
  fontDir: string;
  tempDir: string;
  timeoutMs: number;
  tempQuotaBytes: number;
  runner?: ToolRunner;
  log?: Logger;
}

export interface MediaInfo {
  width: number;
  height: number;
  durationSec: number;
  hasAudio: boolean;
}

export type TextPosition = 'top' | 'center' | 'bottom';

export interface OverlayTextOptions {
  text: string;
  fontStyle: FontStyleName;
  position: TextPosition;
}

// Output geometry
const CONCAT_SIZE = { width: 720, height: 1280, fps: 30 };
const PORTRAIT_SIZE = { width: 576, height: 1024, fps: 24 };
const STACK_SIZE = { width: 900, height: 1600, primaryShare: 0.6 };

const CAPTION_LINE_SPACING = -10;

// ffmpeg stderr that means the input itself is unusable
const UNSUPPORTED_INPUT_PATTERNS = [
  /Invalid data found when processing input/i,
  /moov atom not found/i,
  /does not contain any stream/i,
  /could not find codec parameters/i,
  /Unsupported codec/i,
  /Output file #0 does not contain any stream/i,
];

const ProbeSchema = z.object({
  streams: z.array(z.object({
    codec_type: z.string(),
    width: z.number().int().optional(),
    height: z.number().int().optional(),
    duration: z.string().optional(),
  })).default([]),
  format: z.object({
    duration: z.string().optional(),
  }).default({}),
});

/**
 * ffmpeg-backed transforms. Every job works inside a throwaway directory from
 * `withWorkspace`; each step checks the directory against the temp quota.
 */
export class MediaTransformEngine {
  private readonly runner: ToolRunner;

  constructor(private options: TransformEngineOptions) {
    this.runner = options.runner ?? new ExecaToolRunner();
  }

  async withWorkspace<T>(label: string, fn: (dir: string) => Promise<T>): Promise<T> {
    const prefix = `mjs-${label.replace(/[^a-zA-Z0-9_-]/g, '_')}-`;
    const dir = await mkdtemp(path.join(this.options.tempDir, prefix));
    try {
      return await fn(dir);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  }

  async probe(input: string, signal?: AbortSignal): Promise<MediaInfo> {
    const { stdout } = await this.invoke(
      this.options.ffprobePath,
      ['-v', 'error', '-print_format', 'json', '-show_streams', '-show_format', input],
      'probe',
      signal
    );

    let raw: unknown;
    try {
      raw = JSON.parse(stdout);
    } catch (error) {
      throw new PermanentJobError('UNSUPPORTED_INPUT', 'Could not read media info', { step: 'probe', cause: error });
    }

    const parsed = ProbeSchema.safeParse(raw);
    const video = parsed.success ? parsed.data.streams.find(s => s.codec_type === 'video') : undefined;
    if (!parsed.success || !video?.width || !video.height) {
      throw new PermanentJobError('UNSUPPORTED_INPUT', 'Input has no video or image stream', { step: 'probe' });
    }

    const duration = Number(parsed.data.format.duration ?? video.duration ?? 0);
    return {
      width: video.width,
      height: video.height,
      durationSec: Number.isFinite(duration) ? duration : 0,
      hasAudio: parsed.data.streams.some(s => s.codec_type === 'audio'),
    };
  }

  /** Burns a word-wrapped caption into the clip. */
  async overlayText(input: string, output: string, options: OverlayTextOptions, signal?: AbortSignal): Promise<void> {
    const font = await resolveFont(this.options.fontDir, options.fontStyle);
    const info = await this.probe(input, signal);

    const lines = wrapText(options.text, font.size, Math.floor(info.width * 0.9));
    const textFile = path.join(path.dirname(output), `${path.basename(output)}.caption.txt`);
    await writeFile(textFile, lines.join('\n'), 'utf8');

    const drawtext = [
      `fontfile=${escapeFilterValue(font.path)}`,
      `textfile=${escapeFilterValue(textFile)}`,
      `fontsize=${font.size}`,
      'fontcolor=white',
      'borderw=2',
      'bordercolor=black',
      `line_spacing=${CAPTION_LINE_SPACING}`,
      'x=(w-text_w)/2',
      `y=${captionY(options.position)}`,
    ].join(':');

    await this.ffmpeg([
      '-i', input,
      '-vf', `drawtext=${drawtext}`,
      '-c:v', 'libx264',
      '-preset', 'ultrafast',
      '-c:a', 'aac',
      output,
    ], 'overlay_text', signal);
  }

  /** Plays `first` silently, then `second` with its own audio, both at 720x1280. */
  async concat(first: string, second: string, output: string, signal?: AbortSignal): Promise<void> {
    const firstInfo = await this.probe(first, signal);
    const secondInfo = await this.probe(second, signal);
    const { width, height, fps } = CONCAT_SIZE;
    const fit = `scale=${width}:${height}:force_original_aspect_ratio=increase,crop=${width}:${height},setsar=1,fps=${fps}`;

    const filters = [`[0:v]${fit}[v0]`, `[1:v]${fit}[v1]`];
    const maps: string[] = [];
    if (secondInfo.hasAudio) {
      filters.push(
        `anullsrc=channel_layout=stereo:sample_rate=44100,atrim=duration=${firstInfo.durationSec}[a0]`,
        '[1:a]aresample=44100,aformat=channel_layouts=stereo[a1]',
        '[v0][a0][v1][a1]concat=n=2:v=1:a=1[v][a]'
      );
      maps.push('-map', '[v]', '-map', '[a]');
    } else {
      filters.push('[v0][v1]concat=n=2:v=1:a=0[v]');
      maps.push('-map', '[v]');
    }

    await this.ffmpeg([
      '-i', first,
      '-i', second,
      '-filter_complex', filters.join(';'),
      ...maps,
      '-c:v', 'libx264',
      '-preset', 'fast',
      '-b:v', '4000k',
      '-r', String(fps),
      ...(secondInfo.hasAudio ? ['-c:a', 'aac'] : []),
      output,
    ], 'concat', signal);
  }

  /** Mixes music under the clip's audio without re-encoding the video stream. */
  async addBackgroundMusic(input: string, music: string, output: string, volume: number, signal?: AbortSignal): Promise<void> {
    if (volume < 0 || volume > 1) {
      throw new PermanentJobError('INVALID_PARAMS', `Music volume must be between 0 and 1, got ${volume}`, { step: 'add_music' });
    }
    const info = await this.probe(input, signal);

    const filter = info.hasAudio
      ? `[1:a]volume=${volume}[bgm];[0:a][bgm]amix=inputs=2:duration=first[a]`
      : `[1:a]volume=${volume}[a]`;

    await this.ffmpeg([
      '-i', input,
      '-i', music,
      '-c:v', 'copy',
      '-filter_complex', filter,
      '-map', '0:v:0',
      '-map', '[a]',
      '-c:a', 'aac',
      '-shortest',
      output,
    ], 'add_music', signal);
  }

  /** Center-crops to 9:16 and scales to 576x1024. Stills come out as a single frame. */
  async fitPortrait(input: string, output: string, options: { still: boolean }, signal?: AbortSignal): Promise<void> {
    const { width, height, fps } = PORTRAIT_SIZE;
    const vf = `crop=w='min(iw,ih*9/16)':h='min(ih,iw*16/9)',scale=${width}:${height},setsar=1`;

    const args = options.still
      ? ['-i', input, '-vf', vf, '-frames:v', '1', output]
      : ['-i', input, '-vf', vf, '-r', String(fps), '-c:v', 'libx264', '-preset', 'medium', '-c:a', 'aac', output];

    await this.ffmpeg(args, 'fit_portrait', signal);
  }

  /**
   * Primary clip takes 60% of a 900x1600 frame; the secondary loops underneath
   * (or above) for the primary's duration. Only the primary's audio is kept.
   */
  async stackVertical(
    primary: string,
    secondary: string,
    output: string,
    options: { primaryPosition: 'top' | 'bottom' },
    signal?: AbortSignal
  ): Promise<void> {
    const info = await this.probe(primary, signal);
    const { width, height, primaryShare } = STACK_SIZE;
    const primaryHeight = Math.round(height * primaryShare);
    const secondaryHeight = height - primaryHeight;
    const fit = (h: number) => `scale=${width}:${h}:force_original_aspect_ratio=increase,crop=${width}:${h},setsar=1`;

    const order = options.primaryPosition === 'top' ? '[p][s]' : '[s][p]';
    const filter = [
      `[0:v]${fit(primaryHeight)}[p]`,
      `[1:v]${fit(secondaryHeight)}[s]`,
      `${order}vstack=inputs=2[v]`,
    ].join(';');

    await this.ffmpeg([
      '-i', primary,
      '-stream_loop', '-1',
      '-i', secondary,
      '-filter_complex', filter,
      '-map', '[v]',
      '-map', '0:a?',
      '-t', String(info.durationSec),
      '-c:v', 'libx264',
      '-preset', 'faster',
      '-b:v', '4000k',
      '-c:a', 'aac',
      output,
    ], 'stack_vertical', signal);
  }

  private async ffmpeg(args: string[], step: string, signal?: AbortSignal): Promise<void> {
    const output = args[args.length - 1];
    await this.invoke(this.options.ffmpegPath, ['-y', '-hide_banner', '-loglevel', 'error', ...args], step, signal);
    if (output) {
      await this.checkQuota(path.dirname(output), step);
    }
  }

  private async invoke(command: string, args: string[], step: string, signal?: AbortSignal) {
    this.options.log?.debug({ step, command }, 'Running media tool');
    try {
      return await this.runner.run(command, args, { timeoutMs: this.options.timeoutMs, signal });
    } catch (error) {
      throw classifyToolError(error, step, signal);
    }
  }

  private async checkQuota(dir: string, step: string): Promise<void> {
    const used = await directorySize(dir);
    if (used > this.options.tempQuotaBytes) {
      throw new PermanentJobError(
        'TEMP_QUOTA_EXCEEDED',
        `Workspace uses ${used} bytes, over the ${this.options.tempQuotaBytes} byte limit`,
        { step }
      );
    }
  }
}

function classifyToolError(error: unknown, step: string, signal?: AbortSignal): unknown {
  if (!(error instanceof ToolInvocationError)) return error;

  switch (error.reason) {
    case 'timeout':
      return new TransientUpstreamError('TRANSFORM_TIMEOUT', `${error.tool} timed out`, { step, cause: error });
    case 'cancelled':
      return signal?.reason ?? new TransientUpstreamError('TRANSFORM_CANCELLED', `${error.tool} was cancelled`, { step, cause: error });
    case 'spawn':
      return new TransientInfraError('TOOL_UNAVAILABLE', `${error.tool} could not be started`, { step, cause: error });
    case 'exit':
      if (UNSUPPORTED_INPUT_PATTERNS.some(pattern => pattern.test(error.stderr))) {
        return new PermanentJobError('UNSUPPORTED_INPUT', lastLine(error.stderr) || 'Unsupported input', { step, cause: error });
      }
      return new TransientUpstreamError('TRANSFORM_FAILED', lastLine(error.stderr) || error.message, { step, cause: error });
  }
}

function captionY(position: TextPosition): string {
  switch (position) {
    case 'top': return 'h*0.1';
    case 'bottom': return 'h*0.8-text_h';
    case 'center': return '(h-text_h)/2';
  }
}

/** Escapes a drawtext option value for both the option and the filtergraph level. */
export function escapeFilterValue(value: string): string {
  const option = value.replace(/[\\:']/g, '\\$&');
  return option.replace(/[\\'[\],;]/g, '\\$&');
}

function lastLine(text: string): string {
  const lines = text.trim().split('\n');
  return lines[lines.length - 1] ?? '';
}

async function directorySize(dir: string): Promise<number> {
  let total = 0;
  for (const entry of await readdir(dir, { withFileTypes: true })) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      total += await directorySize(entryPath);
    } else if (entry.isFile()) {
      total += (await stat(entryPath)).size;
    }
  }
  return total;
}
