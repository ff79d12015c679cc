/**
 * Pipeline Coordinator. One run per request.
 *
 *   ResolvingMedia ┐
 *                  ├─> Rendering ─> Stitching ─> Done
 *   GeneratingScript┘                   └──────> Failed
 *
 * Media resolution and script generation run side by side. Rendering fans out
 * one task per slot under a concurrency limit; stitching waits for every
 * render to settle. Only a script failure or zero surviving segments (and a
 * rejected concatenation) fail the run; everything else drops its slot.
 */
import { randomUUID } from 'crypto';
import * as path from 'path';
import { FRAME_SIZES, SLOT_LABELS } from '../config.js';
import { describeError } from '../errors.js';
import type { TextGenerator } from '../ai/llm.js';
import type { SpeechSynthesizer } from '../ai/voice.js';
import type { MediaToolkit } from '../media/ffmpeg.js';
import type { MediaSearch } from '../media/lookup.js';
import type { PlaceholderSource } from '../media/placeholder.js';
import { logger } from '../utils/logger.js';
import { mapSettled } from '../utils/pool.js';
import { RequestWorkspace } from '../utils/workspace.js';
import type {
  LengthMode,
  NarrationSet,
  RenderedSegment,
  SceneDescriptor,
  SegmentOutcome,
  Slot,
  UploadedMedia,
  VisualSource,
} from '../types.js';
import { stitchSegments } from './assembler.js';
import { resolveMedia, type MediaSlotRequest } from './media-resolver.js';
import { generateNarration } from './scriptwriter.js';
import { renderSegment } from './segment.js';
import { buildSlots, formKey, narrationFor, slotKey } from './slots.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export type PipelineState = 'ResolvingMedia' | 'GeneratingScript' | 'Rendering' | 'Stitching' | 'Done' | 'Failed';

export interface PipelineRequest {
  /** Letters, digits, '-' and '_' only; generated when absent. */
  requestId?: string;
  topic: string;
  category: string;
  mode: LengthMode;
  scenes: readonly SceneDescriptor[];
  /** Caller uploads keyed by form field (media_intro, media_0, …, media_outro). */
  uploads?: Readonly<Record<string, UploadedMedia>>;
}

export interface PipelineDeps {
  text: TextGenerator;
  speech: SpeechSynthesizer;
  search: MediaSearch | null;
  placeholders: readonly PlaceholderSource[];
  media: MediaToolkit;
}

export interface PipelineSettings {
  tempRoot: string;
  outputDir: string;
  concurrency: number;
  chunkLimit: number;
}

export interface PipelineRunOptions {
  signal?: AbortSignal;
  onStateChange?: (state: PipelineState) => void;
}

export interface PipelineResult {
  requestId: string;
  artifactName: string;
  artifactPath: string;
  narration: NarrationSet;
  segments: SegmentOutcome[];
  duration: number;
}

interface SlotPlan {
  slot: Slot;
  slotIndex: number;
  key: string;
}

const REQUEST_ID = /^[A-Za-z0-9_-]{1,64}$/;

export function artifactNameFor(requestId: string): string {
  return `${requestId}.mp4`;
}

// ── Slot requests ─────────────────────────────────────────────────────────────

function mediaRequestFor(plan: SlotPlan, req: PipelineRequest): MediaSlotRequest {
  const field = formKey(plan.slot);
  const base = { slot: plan.key, formKey: field, upload: req.uploads?.[field] };
  switch (plan.slot.kind) {
    case 'intro':
      return { ...base, fallbackLabel: req.topic, allowLookup: false };
    case 'outro':
      return { ...base, fallbackLabel: SLOT_LABELS.outro, allowLookup: false };
    case 'scene':
      return {
        ...base,
        fallbackLabel: req.scenes[plan.slot.index]?.name ?? '',
        allowLookup: req.category.toLowerCase() === 'movie',
      };
  }
}

// ── Main run ──────────────────────────────────────────────────────────────────

export async function runPipeline(
  req: PipelineRequest,
  deps: PipelineDeps,
  settings: PipelineSettings,
  opts: PipelineRunOptions = {},
): Promise<PipelineResult> {
  const requestId = req.requestId ?? randomUUID();
  if (!REQUEST_ID.test(requestId)) throw new Error(`Invalid request id: ${requestId}`);

  const { signal } = opts;
  const log = logger.child({ requestId });
  const frame = FRAME_SIZES[req.mode];
  const plans: SlotPlan[] = buildSlots(req.scenes.length).map((slot, slotIndex) => ({
    slot,
    slotIndex,
    key: slotKey(slot),
  }));

  const enter = (state: PipelineState) => {
    log.info('Pipeline: state', { state });
    opts.onStateChange?.(state);
  };

  log.info('Pipeline: starting', {
    topic: req.topic,
    category: req.category,
    mode: req.mode,
    scenes: req.scenes.length,
    uploads: Object.keys(req.uploads ?? {}).length,
  });

  const workspace = await RequestWorkspace.create(settings.tempRoot, requestId);
  try {
    // ── Step 1: media + script, side by side ───────────────────────────────
    // A failed script makes the media pointless; stop fetching it
    const mediaScope = new AbortController();
    const mediaSignal = signal ? AbortSignal.any([signal, mediaScope.signal]) : mediaScope.signal;

    enter('ResolvingMedia');
    const mediaTask = mapSettled(
      plans,
      settings.concurrency,
      (plan) => resolveMedia(
        mediaRequestFor(plan, req),
        { search: deps.search, placeholders: deps.placeholders, logger: log },
        { dir: workspace.dir, frame, signal: mediaSignal },
      ),
      mediaSignal,
    );

    enter('GeneratingScript');
    const scriptTask = generateNarration(
      { topic: req.topic, category: req.category, mode: req.mode, scenes: req.scenes },
      deps.text,
      signal,
    ).catch((err: unknown) => {
      mediaScope.abort(err);
      throw err;
    });

    const [media, script] = await Promise.allSettled([mediaTask, scriptTask]);
    if (script.status === 'rejected') throw script.reason;
    if (media.status === 'rejected') throw media.reason;
    const narration = script.value;

    const outcomes = new Map<number, SegmentOutcome>();
    const ready: Array<SlotPlan & { visual: VisualSource }> = [];
    for (const result of media.value) {
      if (result.status === 'fulfilled') {
        ready.push({ ...result.item, visual: result.value });
      } else {
        const reason = describeError(result.reason);
        log.warn('Pipeline: slot has no media, skipping', { slot: result.item.key, reason });
        outcomes.set(result.item.slotIndex, { slot: result.item.key, status: 'skipped', reason });
      }
    }

    // ── Step 2: render every slot that has media ───────────────────────────
    enter('Rendering');
    const renders = await mapSettled(
      ready,
      settings.concurrency,
      (plan) => renderSegment(
        {
          slot: plan.key,
          slotIndex: plan.slotIndex,
          text: narrationFor(plan.slot, narration),
          visual: plan.visual,
          mode: req.mode,
          audioPath: workspace.file(`${plan.key}.mp3`),
          outputPath: workspace.file(`seg_${plan.key}.mp4`),
        },
        { speech: deps.speech, media: deps.media, chunkLimit: settings.chunkLimit, logger: log },
        signal,
      ),
      signal,
    );

    const segments: RenderedSegment[] = [];
    for (const result of renders) {
      if (result.status === 'fulfilled') {
        segments.push(result.value);
        outcomes.set(result.item.slotIndex, { slot: result.item.key, status: 'rendered', filePath: result.value.filePath });
      } else {
        const reason = describeError(result.reason);
        log.warn('Pipeline: segment failed, omitting from final video', { slot: result.item.key, reason });
        outcomes.set(result.item.slotIndex, { slot: result.item.key, status: 'skipped', reason });
      }
    }

    // ── Step 3: stitch ─────────────────────────────────────────────────────
    enter('Stitching');
    const artifactName = artifactNameFor(requestId);
    const assembled = await stitchSegments(
      { segments, listPath: workspace.file('list.txt'), finalPath: path.join(settings.outputDir, artifactName) },
      deps.media,
      log,
      signal,
    );

    enter('Done');
    return {
      requestId,
      artifactName,
      artifactPath: assembled.videoPath,
      narration,
      segments: plans.flatMap((plan) => {
        const outcome = outcomes.get(plan.slotIndex);
        return outcome ? [outcome] : [];
      }),
      duration: assembled.duration,
    };
  } catch (err) {
    enter('Failed');
    log.error('Pipeline: run failed', { error: describeError(err) });
    throw err;
  } finally {
    await workspace.dispose();
  }
}
