import type { LengthMode } from './config.js';

export type { LengthMode };

// ── Request ───────────────────────────────────────────────────────────────────

export interface SceneDescriptor {
  readonly name: string;
  readonly details: string;
}

/** A file the caller attached to a slot, held in memory until resolved. */
export interface UploadedMedia {
  originalName: string;
  mimeType?: string;
  data: Buffer;
}

// ── Script ────────────────────────────────────────────────────────────────────

export interface NarrationSet {
  intro: string;
  /** At least one entry per scene; extra entries are never rendered. */
  items: string[];
  outro: string;
}

// ── Slots ─────────────────────────────────────────────────────────────────────

export type Slot =
  | { kind: 'intro' }
  | { kind: 'scene'; index: number }
  | { kind: 'outro' };

export type VisualKind = 'image' | 'video';

export interface VisualSource {
  filePath: string;
  kind: VisualKind;
}

export interface RenderedSegment {
  /** Position in the full slot sequence (intro = 0, outro = scenes + 1). */
  slotIndex: number;
  filePath: string;
}

export type SegmentOutcome =
  | { slot: string; status: 'rendered'; filePath: string }
  | { slot: string; status: 'skipped'; reason: string };
