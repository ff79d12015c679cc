#!/usr/bin/env node
/**
 * scenecast entry point.
 *
 *   scenecast [server]              serve POST /generate-multi-scene on PORT
 *   scenecast render <request.json> run one request from a JSON file
 */
import { env } from './config.js';
import { createDefaultDeps, defaultSettings } from './pipeline/deps.js';
import { runPipeline } from './pipeline/index.js';
import { loadRequestFile } from './pipeline/request-file.js';
import { createApp } from './server/app.js';
import { logger } from './utils/logger.js';

// ── Commands ──────────────────────────────────────────────────────────────────

async function render(requestPath: string | undefined): Promise<void> {
  if (!requestPath) throw new Error('Usage: scenecast render <request.json>');

  const request = await loadRequestFile(requestPath);
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  const result = await runPipeline(
    request,
    createDefaultDeps(),
    defaultSettings(),
    { signal: controller.signal },
  );

  for (const segment of result.segments) {
    if (segment.status === 'skipped') logger.warn('CLI: segment skipped', { slot: segment.slot, reason: segment.reason });
  }
  console.log(result.artifactPath);
}

function serve(): void {
  const settings = defaultSettings();
  const deps = createDefaultDeps();
  const app = createApp({
    run: (req, opts) => runPipeline(req, deps, settings, opts),
    outputDir: settings.outputDir,
    maxUploadBytes: env.MAX_UPLOAD_BYTES,
    maxUploadFiles: env.MAX_UPLOAD_FILES,
    publicBaseUrl: env.PUBLIC_BASE_URL,
  });

  app.listen(env.PORT, () => {
    logger.info('Server: listening', { port: env.PORT, outputDir: settings.outputDir });
  });
}

async function main(): Promise<void> {
  const [command = 'server', ...args] = process.argv.slice(2);
  switch (command) {
    case 'server':
      serve();
      return;
    case 'render':
      await render(args[0]);
      return;
    default:
      throw new Error(`Unknown command: ${command} (expected server | render)`);
  }
}

main().catch((err: unknown) => {
  logger.error('Fatal error', { error: err instanceof Error ? err.message : String(err) });
  process.exit(1);
});
