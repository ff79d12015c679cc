import * as path from 'path';
import { env } from '../config.js';
import { createTextGenerator } from '../ai/llm.js';
import { createSpeechSynthesizer } from '../ai/voice.js';
import { ffmpegToolkit } from '../media/ffmpeg.js';
import { createMediaSearch } from '../media/lookup.js';
import { createLocalPlaceholder, createRemotePlaceholder } from '../media/placeholder.js';
import type { PipelineDeps, PipelineSettings } from './index.js';

/** Collaborators wired from the environment. */
export function createDefaultDeps(): PipelineDeps {
  return {
    text: createTextGenerator(),
    speech: createSpeechSynthesizer(),
    search: createMediaSearch(),
    placeholders: [createRemotePlaceholder(env.PLACEHOLDER_BASE_URL), createLocalPlaceholder(ffmpegToolkit)],
    media: ffmpegToolkit,
  };
}

export function defaultSettings(): PipelineSettings {
  return {
    tempRoot: path.resolve(env.TEMP_DIR),
    outputDir: path.resolve(env.OUTPUT_DIR),
    concurrency: env.RENDER_CONCURRENCY,
    chunkLimit: env.TTS_CHUNK_LIMIT,
  };
}
