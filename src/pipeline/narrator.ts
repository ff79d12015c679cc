/**
 * Chunked Speech Synthesizer.
 *
 * Narration is split into sentence-like units; units over the provider limit
 * are packed word by word. Each chunk is synthesized in text order and its raw
 * bytes appended to one MP3 file. Failed chunks are skipped; only an empty
 * result fails the segment.
 */
import * as fs from 'fs/promises';
import type { SpeechSynthesizer } from '../ai/voice.js';
import { SpeechSynthesisError, describeError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export interface NarrationAudio {
  path: string;
  bytes: number;
  chunks: number;
  failedChunks: number;
}

// A run of non-terminal characters closed by terminal punctuation, or the
// unterminated tail of the text
const SENTENCE = /[^.!?]*[.!?]+|[^.!?]+$/g;

/** Split into sentence-like units; whitespace-only units are dropped. */
export function splitSentences(text: string): string[] {
  return (text.match(SENTENCE) ?? [])
    .map((unit) => unit.trim())
    .filter((unit) => unit.length > 0);
}

/**
 * Greedy word packing. A word longer than the limit on its own is the one
 * case that gets cut, at the limit.
 */
export function packWords(unit: string, limit: number): string[] {
  const chunks: string[] = [];
  let current = '';

  for (const word of unit.split(/\s+/).filter(Boolean)) {
    if (word.length > limit) {
      if (current) chunks.push(current);
      current = '';
      for (let i = 0; i < word.length; i += limit) {
        const piece = word.slice(i, i + limit);
        if (piece.length === limit) chunks.push(piece);
        else current = piece;
      }
      continue;
    }
    const candidate = current ? `${current} ${word}` : word;
    if (candidate.length > limit) {
      chunks.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }

  if (current) chunks.push(current);
  return chunks;
}

/** Chunks in text order, none longer than `limit`, none blank. */
export function splitIntoChunks(text: string, limit: number): string[] {
  if (limit < 1) throw new RangeError(`chunk limit must be positive, got ${limit}`);
  return splitSentences(text).flatMap((unit) => (unit.length <= limit ? [unit] : packWords(unit, limit)));
}

export interface SynthesizeOptions {
  /** Characters per request; capped at the provider's own limit. */
  chunkLimit: number;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Synthesize `text` into `outputPath`. Chunks are requested one after another
 * so the file keeps text order.
 */
export async function synthesizeNarration(
  text: string,
  outputPath: string,
  speech: SpeechSynthesizer,
  opts: SynthesizeOptions,
): Promise<NarrationAudio> {
  const log = opts.logger ?? rootLogger;
  const limit = Math.min(opts.chunkLimit, speech.maxChars);
  const chunks = splitIntoChunks(text, limit);
  log.info('Narrator: synthesizing', { chars: text.length, chunks: chunks.length, limit });

  await fs.writeFile(outputPath, Buffer.alloc(0));

  let bytes = 0;
  let failedChunks = 0;
  for (const [index, chunk] of chunks.entries()) {
    opts.signal?.throwIfAborted();
    let audio: Buffer;
    try {
      audio = await speech.synthesize(chunk, opts.signal);
    } catch (err) {
      if (opts.signal?.aborted) throw err;
      failedChunks++;
      log.warn('Narrator: chunk failed, skipping', { index, chars: chunk.length, error: describeError(err) });
      continue;
    }
    await fs.appendFile(outputPath, audio);
    bytes += audio.length;
  }

  if (bytes === 0) {
    throw new SpeechSynthesisError(
      chunks.length === 0
        ? 'Narration is empty'
        : `No audio produced (${failedChunks}/${chunks.length} chunks failed)`,
      failedChunks,
    );
  }

  if (failedChunks > 0) {
    log.warn('Narrator: partial narration', { failedChunks, chunks: chunks.length });
  }
  return { path: outputPath, bytes, chunks: chunks.length, failedChunks };
}
