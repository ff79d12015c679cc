/**
 * FFmpeg operations: segment muxing, stream-copy concatenation, text-card
 * rendering and duration probing.
 *
 * All functions reject with FfmpegError on non-zero exit, timeout or spawn
 * failure. Argument builders are exported separately so the exact command
 * lines can be checked without running ffmpeg.
 */
import { spawn } from 'child_process';
import * as fs from 'fs/promises';
import { env, RENDER_PROFILE, type FrameSize } from '../config.js';
import { FfmpegError } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { VisualSource } from '../types.js';

const STDERR_TAIL_CHARS = 4_000;

// ── Types ─────────────────────────────────────────────────────────────────────

export interface MuxJob {
  visual: VisualSource;
  audioPath: string;
  outputPath: string;
  frame: FrameSize;
}

export interface TextCardJob {
  textFilePath: string;
  frame: FrameSize;
  outputPath: string;
}

/** Everything the pipeline needs from the transcode tool. */
export interface MediaToolkit {
  muxSegment(job: MuxJob, signal?: AbortSignal): Promise<void>;
  concatenateClips(clipPaths: string[], listPath: string, outputPath: string, signal?: AbortSignal): Promise<void>;
  renderTextCard(job: TextCardJob, signal?: AbortSignal): Promise<void>;
  probeDuration(mediaPath: string): Promise<number>;
}

// ── Helpers ────────────────────────────────────────────────────────────────────

function runProcess(bin: string, args: string[], label: string, signal?: AbortSignal): Promise<string> {
  logger.debug(`FFmpeg [${label}]`, { bin, args });
  return new Promise((resolve, reject) => {
    const child = spawn(bin, args, {
      stdio: ['ignore', 'pipe', 'pipe'],
      timeout: env.FFMPEG_TIMEOUT_MS,
      signal,
    });
    let stdout = '';
    let stderr = '';
    child.stdout.on('data', (chunk: Buffer) => { stdout += chunk.toString(); });
    child.stderr.on('data', (chunk: Buffer) => {
      stderr = (stderr + chunk.toString()).slice(-STDERR_TAIL_CHARS);
    });
    child.on('error', (err) => {
      reject(new FfmpegError(`${label}: ${bin} could not run: ${err.message}`, null, stderr, { cause: err }));
    });
    child.on('close', (code, killedBy) => {
      if (code === 0) {
        resolve(stdout);
        return;
      }
      const reason = killedBy ? `killed by ${killedBy}` : `exited with ${code}`;
      reject(new FfmpegError(`${label}: ${bin} ${reason}`, code, stderr.trim()));
    });
  });
}

function runFfmpeg(args: string[], label: string, signal?: AbortSignal): Promise<string> {
  return runProcess(env.FFMPEG_PATH, ['-nostdin', '-y', '-hide_banner', ...args], label, signal);
}

/** Quote a value for the concat demuxer and filter options. */
function quote(value: string): string {
  return `'${value.replace(/'/g, "'\\''")}'`;
}

// ── Argument builders ──────────────────────────────────────────────────────────

/**
 * Scale to fit inside the frame, then pad to centre. Never crops.
 */
export function buildFrameFilter(frame: FrameSize): string {
  const { width: w, height: h } = frame;
  return [
    `scale=${w}:${h}:force_original_aspect_ratio=decrease`,
    `pad=${w}:${h}:(ow-iw)/2:(oh-ih)/2`,
    'setsar=1',
    `fps=${RENDER_PROFILE.fps}`,
    `format=${RENDER_PROFILE.pixelFormat}`,
  ].join(',');
}

export function buildEncodeArgs(): string[] {
  return [
    '-c:v', RENDER_PROFILE.videoCodec,
    '-preset', RENDER_PROFILE.preset,
    '-pix_fmt', RENDER_PROFILE.pixelFormat,
    '-r', String(RENDER_PROFILE.fps),
    '-c:a', RENDER_PROFILE.audioCodec,
    '-b:a', RENDER_PROFILE.audioBitrate,
    '-ar', String(RENDER_PROFILE.audioSampleRate),
    '-ac', String(RENDER_PROFILE.audioChannels),
  ];
}

/**
 * Images loop for as long as the narration runs. Videos loop indefinitely and
 * -shortest cuts the output at the end of the narration.
 */
export function buildMuxArgs(job: MuxJob): string[] {
  const visualInput = job.visual.kind === 'image'
    ? ['-loop', '1', '-framerate', String(RENDER_PROFILE.fps), '-i', job.visual.filePath]
    : ['-stream_loop', '-1', '-i', job.visual.filePath];

  return [
    ...visualInput,
    '-i', job.audioPath,
    '-map', '0:v:0',
    '-map', '1:a:0',
    '-vf', buildFrameFilter(job.frame),
    ...buildEncodeArgs(),
    '-shortest',
    '-movflags', '+faststart',
    job.outputPath,
  ];
}

export function buildConcatManifest(clipPaths: string[]): string {
  return clipPaths.map((p) => `file ${quote(p)}`).join('\n') + '\n';
}

export function buildConcatArgs(listPath: string, outputPath: string): string[] {
  return ['-f', 'concat', '-safe', '0', '-i', listPath, '-c', 'copy', '-movflags', '+faststart', outputPath];
}

export function buildTextCardArgs(job: TextCardJob): string[] {
  const { width, height } = job.frame;
  const fontSize = Math.round(Math.min(width, height) / 12);
  const drawtext = [
    `drawtext=textfile=${quote(job.textFilePath)}`,
    'fontcolor=white',
    `fontsize=${fontSize}`,
    'x=(w-text_w)/2',
    'y=(h-text_h)/2',
  ].join(':');
  return [
    '-f', 'lavfi',
    '-i', `color=c=0x111111:s=${width}x${height}`,
    '-vf', drawtext,
    '-frames:v', '1',
    job.outputPath,
  ];
}

// ── Public API ─────────────────────────────────────────────────────────────────

export async function muxSegment(job: MuxJob, signal?: AbortSignal): Promise<void> {
  logger.info('FFmpeg: muxing segment', {
    kind: job.visual.kind,
    frame: `${job.frame.width}x${job.frame.height}`,
    outputPath: job.outputPath,
  });
  await runFfmpeg(buildMuxArgs(job), 'muxSegment', signal);
}

/**
 * Concatenate clips with the concat demuxer. All clips must share codec,
 * resolution and fps; muxSegment guarantees that for its own output.
 */
export async function concatenateClips(
  clipPaths: string[],
  listPath: string,
  outputPath: string,
  signal?: AbortSignal,
): Promise<void> {
  logger.info('FFmpeg: concatenating clips', { count: clipPaths.length, outputPath });
  if (clipPaths.length === 0) throw new Error('concatenateClips: no clips provided');

  await fs.writeFile(listPath, buildConcatManifest(clipPaths), 'utf-8');
  await runFfmpeg(buildConcatArgs(listPath, outputPath), 'concatenateClips', signal);

  logger.info('FFmpeg: concatenation complete', { outputPath });
}

export async function renderTextCard(job: TextCardJob, signal?: AbortSignal): Promise<void> {
  await runFfmpeg(buildTextCardArgs(job), 'renderTextCard', signal);
}

/** Container duration in seconds, or 0 when it cannot be probed. */
export async function probeDuration(mediaPath: string): Promise<number> {
  try {
    const raw = await runProcess(
      env.FFPROBE_PATH,
      ['-v', 'error', '-show_entries', 'format=duration', '-of', 'csv=p=0', mediaPath],
      'probeDuration',
    );
    return parseFloat(raw.trim()) || 0;
  } catch (err) {
    logger.warn('FFprobe: could not probe duration', { mediaPath, err });
    return 0;
  }
}

export const ffmpegToolkit: MediaToolkit = {
  muxSegment,
  concatenateClips,
  renderTextCard,
  probeDuration,
};
