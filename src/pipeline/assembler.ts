/**
 * Stitcher. Stream-copies the surviving segments into the final video in
 * declared slot order.
 */
import * as fs from 'fs/promises';
import * as path from 'path';
import { ConcatenationError, NoSegmentsError, describeError } from '../errors.js';
import type { MediaToolkit } from '../media/ffmpeg.js';
import type { Logger } from '../utils/logger.js';
import type { RenderedSegment } from '../types.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface StitchJob {
  segments: readonly RenderedSegment[];
  /** Manifest location inside the request workspace. */
  listPath: string;
  finalPath: string;
}

export interface AssembledVideo {
  videoPath: string;
  segmentCount: number;
  duration: number;
}

// ── Public API ─────────────────────────────────────────────────────────────────

/**
 * Stitch segments into `finalPath`.
 *
 * Steps:
 * 1. Order segments by slot index; absent slots are simply not there.
 * 2. Refuse an empty list before touching any existing artifact.
 * 3. Remove the stale artifact, then concatenate without re-encoding.
 * 4. Probe the result's duration for the log.
 */
export async function stitchSegments(
  job: StitchJob,
  media: MediaToolkit,
  log: Logger,
  signal?: AbortSignal,
): Promise<AssembledVideo> {
  const ordered = [...job.segments].sort((a, b) => a.slotIndex - b.slotIndex);
  log.info('Assembler: stitching', { segmentCount: ordered.length, finalPath: job.finalPath });

  if (ordered.length === 0) {
    throw new NoSegmentsError('Every segment failed to render; nothing to stitch');
  }

  await fs.mkdir(path.dirname(job.finalPath), { recursive: true });
  await fs.rm(job.finalPath, { force: true });

  try {
    await media.concatenateClips(ordered.map((s) => s.filePath), job.listPath, job.finalPath, signal);
  } catch (err) {
    await fs.rm(job.finalPath, { force: true });
    if (signal?.aborted) throw err;
    throw new ConcatenationError(`Concatenation failed: ${describeError(err)}`, { cause: err });
  }

  const duration = await media.probeDuration(job.finalPath);
  log.info('Assembler: final video ready', { videoPath: job.finalPath, segmentCount: ordered.length, duration });
  return { videoPath: job.finalPath, segmentCount: ordered.length, duration };
}
