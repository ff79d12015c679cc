/**
 * Media Resolver: one visual source per slot, first match wins:
 *   1. the caller's upload, saved verbatim
 *   2. an external lookup (when enabled for the slot)
 *   3. a generated placeholder card carrying the slot label
 *
 * Lookup failures fall through silently. Only a failure of every placeholder
 * source raises MediaResolutionError.
 */
import * as fs from 'fs/promises';
import * as path from 'path';
import { SLOT_LABELS, VIDEO_EXTENSIONS, type FrameSize } from '../config.js';
import { MediaResolutionError, describeError } from '../errors.js';
import type { MediaSearch } from '../media/lookup.js';
import type { PlaceholderSource } from '../media/placeholder.js';
import type { Logger } from '../utils/logger.js';
import type { UploadedMedia, VisualKind, VisualSource } from '../types.js';

export interface MediaSlotRequest {
  /** Slot label used for logs and errors. */
  slot: string;
  /** Multipart field name; also the base file name. */
  formKey: string;
  fallbackLabel: string;
  allowLookup: boolean;
  upload?: UploadedMedia;
}

export interface ResolverDeps {
  search: MediaSearch | null;
  placeholders: readonly PlaceholderSource[];
  logger: Logger;
}

export interface ResolveContext {
  /** Directory the resolved file is written to. */
  dir: string;
  frame: FrameSize;
  signal?: AbortSignal;
}

const VIDEO_EXTENSION_SET: ReadonlySet<string> = new Set(VIDEO_EXTENSIONS);

export function classifyUpload(upload: UploadedMedia): VisualKind {
  const ext = path.extname(upload.originalName).toLowerCase();
  if (VIDEO_EXTENSION_SET.has(ext)) return 'video';
  return upload.mimeType?.startsWith('video/') ? 'video' : 'image';
}

/** The upload's own extension, case kept; `.jpg` when it is missing or unsafe. */
export function uploadExtension(upload: UploadedMedia): string {
  const ext = path.extname(upload.originalName);
  return /^\.[A-Za-z0-9]{1,8}$/.test(ext) ? ext : '.jpg';
}

export async function resolveMedia(
  req: MediaSlotRequest,
  deps: ResolverDeps,
  ctx: ResolveContext,
): Promise<VisualSource> {
  const log = deps.logger.child({ slot: req.slot });
  const base = path.join(ctx.dir, req.formKey);

  // 1. Caller upload
  if (req.upload) {
    const filePath = `${base}${uploadExtension(req.upload)}`;
    await fs.writeFile(filePath, req.upload.data);
    const kind = classifyUpload(req.upload);
    log.info('Media: using upload', { filePath, kind, bytes: req.upload.data.length });
    return { filePath, kind };
  }

  const label = req.fallbackLabel.trim();

  // 2. External lookup
  if (req.allowLookup && label && deps.search) {
    const filePath = `${base}.jpg`;
    try {
      const [best] = await deps.search.findImages(label, ctx.signal);
      if (best) {
        await deps.search.download(best, filePath, ctx.signal);
        log.info('Media: using lookup result', { query: label });
        return { filePath, kind: 'image' };
      }
      log.info('Media: lookup found nothing', { query: label });
    } catch (err) {
      if (ctx.signal?.aborted) throw err;
      log.warn('Media: lookup failed, using placeholder', { query: label, error: describeError(err) });
    }
  }

  // 3. Placeholder
  const text = label || SLOT_LABELS.fallback;
  const failures: string[] = [];
  for (const source of deps.placeholders) {
    try {
      const filePath = await source.render({ label: text, frame: ctx.frame, destBase: base }, ctx.signal);
      log.info('Media: using placeholder', { source: source.name, label: text });
      return { filePath, kind: 'image' };
    } catch (err) {
      if (ctx.signal?.aborted) throw err;
      failures.push(`${source.name}: ${describeError(err)}`);
      log.warn('Media: placeholder source failed', { source: source.name, error: describeError(err) });
    }
  }

  throw new MediaResolutionError(
    `No visual source for ${req.slot}: ${failures.join('; ') || 'no placeholder sources configured'}`,
    req.slot,
  );
}
