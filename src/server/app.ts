import express, { type NextFunction, type Request, type Response } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { PipelineError, ScriptGenerationError, type PipelineErrorCode } from '../errors.js';
import { logger } from '../utils/logger.js';
import { createGenerateRouter, type RunPipeline } from './routes/generate.js';

export interface AppOptions {
  run: RunPipeline;
  outputDir: string;
  maxUploadBytes: number;
  maxUploadFiles: number;
  publicBaseUrl?: string;
}

const STATUS_BY_CODE: Partial<Record<PipelineErrorCode, number>> = {
  script_generation_failed: 502,
  no_segments:              422,
  concatenation_failed:     500,
};

// Enough of a bad model reply to diagnose it without echoing megabytes
const RAW_RESPONSE_PREVIEW_CHARS = 2_000;

export function createApp(opts: AppOptions): express.Express {
  const app = express();

  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  app.use('/videos', express.static(opts.outputDir));
  app.use(createGenerateRouter({
    run: opts.run,
    maxUploadBytes: opts.maxUploadBytes,
    maxUploadFiles: opts.maxUploadFiles,
    publicBaseUrl: opts.publicBaseUrl,
  }));

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof multer.MulterError) {
      const status = err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
      res.status(status).json({ error: 'invalid_upload', message: err.message });
      return;
    }
    if (err instanceof ZodError) {
      res.status(400).json({ error: 'invalid_request', message: err.issues.map((i) => i.message).join('; ') });
      return;
    }
    if (err instanceof PipelineError) {
      const status = STATUS_BY_CODE[err.code] ?? 500;
      logger.warn('HTTP: pipeline failed', { code: err.code, status, error: err.message });
      res.status(status).json({
        error: err.code,
        message: err.message,
        ...(err instanceof ScriptGenerationError && err.rawResponse !== undefined
          ? { raw: err.rawResponse.slice(0, RAW_RESPONSE_PREVIEW_CHARS) }
          : {}),
      });
      return;
    }
    logger.error('HTTP: unhandled error', { error: err instanceof Error ? err.message : String(err) });
    res.status(500).json({ error: 'internal_error', message: err instanceof Error ? err.message : String(err) });
  });

  return app;
}
