import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

// Blank values in .env count as unset
const optional = <T extends z.ZodTypeAny>(schema: T) =>
  z.preprocess(v => (v === '' ? undefined : v), schema.optional());

const EnvSchema = z.object({
  // Text generation
  SCRIPT_PROVIDER:         z.enum(['groq', 'anthropic']).default('groq'),
  GROQ_API_KEY:            optional(z.string().min(1)),
  GROQ_BASE_URL:           z.string().url().default('https://api.groq.com/openai/v1'),
  GROQ_MODEL:              z.string().min(1).default('llama-3.3-70b-versatile'),
  ANTHROPIC_API_KEY:       optional(z.string().min(1)),
  ANTHROPIC_MODEL:         z.string().min(1).default('claude-sonnet-4-5'),

  // Speech synthesis
  OPENAI_API_KEY:          optional(z.string().min(1)),
  TTS_MODEL:               z.string().min(1).default('tts-1'),
  TTS_VOICE:               z.enum(['alloy', 'ash', 'coral', 'echo', 'fable', 'onyx', 'nova', 'sage', 'shimmer']).default('alloy'),
  TTS_CHUNK_LIMIT:         z.coerce.number().int().min(16).max(4096).default(4000),

  // Media search
  TMDB_API_KEY:            optional(z.string().min(1)),
  TMDB_API_TOKEN:          optional(z.string().min(1)),
  TMDB_BASE_URL:           z.string().url().default('https://api.themoviedb.org/3'),
  TMDB_IMAGE_BASE_URL:     z.string().url().default('https://image.tmdb.org/t/p/original'),
  PLACEHOLDER_BASE_URL:    z.string().url().default('https://placehold.co'),

  // Rendering
  FFMPEG_PATH:             z.string().min(1).default('ffmpeg'),
  FFPROBE_PATH:            z.string().min(1).default('ffprobe'),
  FFMPEG_TIMEOUT_MS:       z.coerce.number().int().positive().default(300_000),
  HTTP_TIMEOUT_MS:         z.coerce.number().int().positive().default(30_000),
  RENDER_CONCURRENCY:      z.coerce.number().int().min(1).max(16).default(2),

  // Local storage
  TEMP_DIR:                z.string().min(1).default(path.join(os.tmpdir(), 'scenecast')),
  OUTPUT_DIR:              z.string().min(1).default('output'),

  // HTTP
  PORT:                    z.coerce.number().int().positive().default(8080),
  MAX_UPLOAD_BYTES:        z.coerce.number().int().positive().default(100 * 1024 * 1024),
  MAX_UPLOAD_FILES:        z.coerce.number().int().positive().default(32),
  PUBLIC_BASE_URL:         optional(z.string().url()),

  // Logging
  LOG_LEVEL:               z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:              z.enum(['text', 'json']).default('text'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const invalid = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${invalid}`);
}

export const env = parsed.data;

export type Env = typeof env;

// ── Domain Types ─────────────────────────────────────────────────────────────

export const LENGTH_MODES = ['short', 'long'] as const;

export type LengthMode = typeof LENGTH_MODES[number];

// ── Frame Sizes ───────────────────────────────────────────────────────────────
// short = portrait (Shorts/Reels), long = landscape

export interface FrameSize {
  width: number;
  height: number;
}

export const FRAME_SIZES: Record<LengthMode, FrameSize> = {
  short: { width: 1080, height: 1920 },
  long:  { width: 1920, height: 1080 },
};

// ── Render Profile ────────────────────────────────────────────────────────────
// Every segment of a request is encoded with this profile; the stitcher
// stream-copies segments and rejects any drift between them.

export const RENDER_PROFILE = {
  videoCodec:      'libx264',
  preset:          'fast',
  pixelFormat:     'yuv420p',
  fps:             30,
  audioCodec:      'aac',
  audioBitrate:    '192k',
  audioSampleRate: 44_100,
  audioChannels:   2,
} as const;

export type RenderProfile = typeof RENDER_PROFILE;

// ── Slot Defaults ─────────────────────────────────────────────────────────────

export const SLOT_LABELS = {
  outro:    'Thanks for watching!',
  fallback: 'Scene',
} as const;

export const VIDEO_EXTENSIONS = ['.mp4', '.mov', '.avi', '.mkv', '.webm', '.m4v'] as const;
