/**
 * POST /generate-multi-scene: multipart form in, video URL out.
 *
 * Fields: topic, category, type (short|long), scenes (JSON array of
 * {name, details}). Files: media_intro, media_outro, media_<i>.
 */
import { Router, type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import { z } from 'zod';
import type { PipelineRequest, PipelineResult, PipelineRunOptions } from '../../pipeline/index.js';
import type { LengthMode, SceneDescriptor, UploadedMedia } from '../../types.js';
import { logger } from '../../utils/logger.js';

export type RunPipeline = (req: PipelineRequest, opts: PipelineRunOptions) => Promise<PipelineResult>;

export interface GenerateRouteOptions {
  run: RunPipeline;
  maxUploadBytes: number;
  /** Files per request; the multipart parse fails past this count. */
  maxUploadFiles: number;
  publicBaseUrl?: string;
}

// Upload fields a request can carry; scene indexes are checked against the
// scene list once the form is parsed
const MEDIA_FIELD = /^media_(?:intro|outro|0|[1-9]\d*)$/;

export function isMediaField(fieldname: string): boolean {
  return MEDIA_FIELD.test(fieldname);
}

const FormSchema = z.object({
  topic:    z.string().trim().default(''),
  category: z.string().trim().default(''),
  type:     z.string().trim().optional(),
  scenes:   z.string().default(''),
});

const ScenesSchema = z.array(z.object({
  name:    z.string().default(''),
  details: z.string().default(''),
}));

export function parseScenes(raw: string): SceneDescriptor[] | null {
  try {
    const parsed = ScenesSchema.safeParse(JSON.parse(raw));
    return parsed.success ? parsed.data : null;
  } catch {
    return null;
  }
}

export function parseMode(value: string | undefined): LengthMode {
  return value?.toLowerCase() === 'long' ? 'long' : 'short';
}

/** Keep only files whose field names a slot of this request. */
export function collectUploads(files: Express.Multer.File[], sceneCount: number): Record<string, UploadedMedia> {
  const uploads: Record<string, UploadedMedia> = {};
  for (const file of files) {
    const scene = /^media_(\d+)$/.exec(file.fieldname);
    const known = isMediaField(file.fieldname)
      && (scene?.[1] === undefined || Number(scene[1]) < sceneCount);
    if (!known || uploads[file.fieldname]) continue;
    uploads[file.fieldname] = { originalName: file.originalname, mimeType: file.mimetype, data: file.buffer };
  }
  return uploads;
}

function publicUrl(req: Request, artifactName: string, publicBaseUrl?: string): string {
  const proto = req.secure || req.get('x-forwarded-proto') === 'https' ? 'https' : 'http';
  const base = publicBaseUrl?.replace(/\/+$/, '') ?? `${proto}://${req.get('host') ?? 'localhost'}`;
  return `${base}/videos/${encodeURIComponent(artifactName)}`;
}

export function createGenerateRouter(opts: GenerateRouteOptions): Router {
  const router = Router();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: opts.maxUploadBytes, files: opts.maxUploadFiles },
    fileFilter: (_req, file, accept) => {
      if (isMediaField(file.fieldname)) accept(null, true);
      else accept(new multer.MulterError('LIMIT_UNEXPECTED_FILE', file.fieldname));
    },
  });

  async function handle(req: Request, res: Response): Promise<void> {
    const form = FormSchema.parse(req.body ?? {});
    const scenes = parseScenes(form.scenes);
    if (!scenes) {
      res.status(400).json({ error: 'Invalid scenes JSON' });
      return;
    }

    const files = Array.isArray(req.files) ? req.files : [];
    const mode = parseMode(form.type);
    logger.info('HTTP: generate request', {
      topic: form.topic,
      category: form.category,
      mode,
      scenes: scenes.length,
      files: files.length,
    });

    // A client that hangs up cancels the run and its temp files
    const controller = new AbortController();
    res.on('close', () => {
      if (!res.writableFinished) controller.abort();
    });

    const result = await opts.run(
      {
        topic: form.topic,
        category: form.category,
        mode,
        scenes,
        uploads: collectUploads(files, scenes.length),
      },
      { signal: controller.signal },
    );

    res.json({
      status: 'success',
      request_id: result.requestId,
      video_url: publicUrl(req, result.artifactName, opts.publicBaseUrl),
      skipped: result.segments.filter((s) => s.status === 'skipped').map((s) => s.slot),
    });
  }

  router.post('/generate-multi-scene', upload.any(), (req: Request, res: Response, next: NextFunction) => {
    handle(req, res).catch(next);
  });

  return router;
}
