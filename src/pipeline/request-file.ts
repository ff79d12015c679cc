/**
 * Request files for the `render` command: the HTTP form, as JSON, with media
 * given as local paths keyed by slot (intro, outro, scene_0, …).
 */
import { readFile } from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import type { UploadedMedia } from '../types.js';
import { logger } from '../utils/logger.js';
import type { PipelineRequest } from './index.js';

const RequestFileSchema = z.object({
  requestId: z.string().optional(),
  topic:     z.string().default(''),
  category:  z.string().default(''),
  type:      z.enum(['short', 'long']).default('short'),
  scenes:    z.array(z.object({ name: z.string().default(''), details: z.string().default('') })).default([]),
  media:     z.record(z.string()).default({}),
});

export type RequestFile = z.infer<typeof RequestFileSchema>;

/** Form field for a slot key, or null when the request has no such slot. */
export function mediaFieldFor(slotKey: string, sceneCount: number): string | null {
  if (slotKey === 'intro' || slotKey === 'outro') return `media_${slotKey}`;
  const scene = /^scene_(\d+)$/.exec(slotKey);
  if (!scene?.[1]) return null;
  const index = Number(scene[1]);
  return index < sceneCount ? `media_${index}` : null;
}

/** Reads and validates a request file; media paths resolve against its directory. */
export async function loadRequestFile(filePath: string): Promise<PipelineRequest> {
  const absolute = path.resolve(filePath);
  const request = RequestFileSchema.parse(JSON.parse(await readFile(absolute, 'utf8')));

  const uploads: Record<string, UploadedMedia> = {};
  for (const [slot, file] of Object.entries(request.media)) {
    const field = mediaFieldFor(slot, request.scenes.length);
    if (!field) {
      logger.warn('Request file: ignoring media for unknown slot', { slot });
      continue;
    }
    const mediaPath = path.resolve(path.dirname(absolute), file);
    uploads[field] = { originalName: path.basename(mediaPath), data: await readFile(mediaPath) };
  }

  return {
    requestId: request.requestId,
    topic: request.topic,
    category: request.category,
    mode: request.type,
    scenes: request.scenes,
    uploads,
  };
}
