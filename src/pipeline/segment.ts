/**
 * Segment Renderer: narration audio plus one visual source in, one
 * fixed-profile clip out. Any failure is reported as SegmentRenderError for
 * this slot only.
 */
import * as fs from 'fs/promises';
import type { SpeechSynthesizer } from '../ai/voice.js';
import { FRAME_SIZES } from '../config.js';
import { SegmentRenderError, describeError } from '../errors.js';
import type { MediaToolkit } from '../media/ffmpeg.js';
import type { Logger } from '../utils/logger.js';
import type { LengthMode, RenderedSegment, VisualSource } from '../types.js';
import { synthesizeNarration } from './narrator.js';

export interface SegmentJob {
  slot: string;
  slotIndex: number;
  text: string;
  visual: VisualSource;
  mode: LengthMode;
  /** Temporary narration file; removed whatever the outcome. */
  audioPath: string;
  outputPath: string;
}

export interface SegmentDeps {
  speech: SpeechSynthesizer;
  media: MediaToolkit;
  chunkLimit: number;
  logger: Logger;
}

export async function renderSegment(job: SegmentJob, deps: SegmentDeps, signal?: AbortSignal): Promise<RenderedSegment> {
  const log = deps.logger.child({ slot: job.slot });
  log.info('Segment: rendering', { kind: job.visual.kind, mode: job.mode });

  try {
    const audio = await synthesizeNarration(job.text, job.audioPath, deps.speech, {
      chunkLimit: deps.chunkLimit,
      signal,
      logger: log,
    });
    log.debug('Segment: narration ready', { bytes: audio.bytes, chunks: audio.chunks });

    await deps.media.muxSegment(
      { visual: job.visual, audioPath: audio.path, outputPath: job.outputPath, frame: FRAME_SIZES[job.mode] },
      signal,
    );
  } catch (err) {
    if (signal?.aborted) throw err;
    await fs.rm(job.outputPath, { force: true });
    throw new SegmentRenderError(`Segment ${job.slot} failed: ${describeError(err)}`, job.slot, { cause: err });
  } finally {
    await fs.rm(job.audioPath, { force: true });
  }

  log.info('Segment: rendered', { outputPath: job.outputPath });
  return { slotIndex: job.slotIndex, filePath: job.outputPath };
}
