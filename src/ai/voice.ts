/**
 * Speech synthesis via OpenAI TTS, MP3 output.
 *
 * MP3 frames are self-contained, so the byte streams of consecutive requests
 * can be appended to one file and still play back as one track.
 */
import OpenAI from 'openai';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';

type Voice = typeof env.TTS_VOICE;

export interface SpeechSynthesizer {
  /** Provider-side input limit in characters. */
  readonly maxChars: number;
  /** Raw audio bytes for `text`; rejects on transport errors and non-2xx. */
  synthesize(text: string, signal?: AbortSignal): Promise<Buffer>;
}

export interface OpenAiSpeechOptions {
  apiKey: string;
  model: string;
  voice: Voice;
}

// OpenAI documents 4096 characters per request
export const OPENAI_TTS_MAX_CHARS = 4096;

export function createOpenAiSpeech(opts: OpenAiSpeechOptions): SpeechSynthesizer {
  const client = new OpenAI({ apiKey: opts.apiKey, maxRetries: 0 });

  return {
    maxChars: OPENAI_TTS_MAX_CHARS,
    async synthesize(text, signal) {
      logger.debug('Voice: synthesizing chunk', { chars: text.length, voice: opts.voice });
      const res = await client.audio.speech.create(
        { model: opts.model, voice: opts.voice, input: text, response_format: 'mp3' },
        { signal },
      );
      return Buffer.from(await res.arrayBuffer());
    },
  };
}

export function createSpeechSynthesizer(): SpeechSynthesizer {
  if (!env.OPENAI_API_KEY) {
    return {
      maxChars: OPENAI_TTS_MAX_CHARS,
      synthesize: () => Promise.reject(new Error('OPENAI_API_KEY is not set')),
    };
  }
  return createOpenAiSpeech({ apiKey: env.OPENAI_API_KEY, model: env.TTS_MODEL, voice: env.TTS_VOICE });
}
