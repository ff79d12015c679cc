import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import type { SpeechSynthesizer } from '../ai/voice.js';
import { SpeechSynthesisError } from '../errors.js';
import { packWords, splitIntoChunks, splitSentences, synthesizeNarration } from './narrator.js';

describe('splitSentences', () => {
  it('splits on terminal punctuation and keeps an unterminated tail', () => {
    expect(splitSentences('Hello world. How are you?! Fine')).toEqual(['Hello world.', 'How are you?!', 'Fine']);
  });

  it('drops blank units', () => {
    expect(splitSentences('   ')).toEqual([]);
  });
});

describe('packWords', () => {
  it('packs greedily without exceeding the limit', () => {
    expect(packWords('One two three four five.', 10)).toEqual(['One two', 'three four', 'five.']);
  });

  it('cuts a word longer than the limit', () => {
    expect(packWords('abcdefghijkl xy', 5)).toEqual(['abcde', 'fghij', 'kl xy']);
  });
});

describe('splitIntoChunks', () => {
  const text = 'A short one. Then a considerably longer sentence that will not fit in one chunk. End';

  it('never produces a chunk over the limit', () => {
    for (const chunk of splitIntoChunks(text, 20)) {
      expect(chunk.length).toBeLessThanOrEqual(20);
      expect(chunk.trim()).not.toBe('');
    }
  });

  it('loses no text', () => {
    const squash = (s: string) => s.replace(/\s+/g, '');
    expect(squash(splitIntoChunks(text, 20).join(''))).toBe(squash(text));
  });

  it('rejects a non-positive limit', () => {
    expect(() => splitIntoChunks(text, 0)).toThrow(RangeError);
  });
});

// ── MPEG-1 Layer III frames ───────────────────────────────────────────────────

const LAYER3_KBPS = [0, 32, 40, 48, 56, 64, 80, 96, 112, 128, 160, 192, 224, 256, 320];
const MPEG1_RATES = [44_100, 48_000, 32_000];
const SAMPLES_PER_FRAME = 1152;

const frameLength = (kbps: number, rate: number, padding: number) => Math.floor((144 * kbps * 1000) / rate) + padding;

/** One silent 44.1 kHz stereo frame: sync, MPEG-1, Layer III, no CRC, zeroed side info. */
function silentFrame(kbps: number): Buffer {
  const frame = Buffer.alloc(frameLength(kbps, 44_100, 0));
  frame.set([0xff, 0xfb, LAYER3_KBPS.indexOf(kbps) << 4, 0x00]);
  return frame;
}

/** Walks frame headers from the first byte to the last; throws on anything that is not a frame. */
function countFrames(stream: Buffer): { frames: number; seconds: number } {
  let offset = 0;
  let frames = 0;
  let samples = 0;
  while (offset < stream.length) {
    const b1 = stream[offset + 1] ?? 0;
    const b2 = stream[offset + 2] ?? 0;
    if (stream[offset] !== 0xff || (b1 & 0xfe) !== 0xfa) throw new Error(`no frame header at byte ${offset}`);
    const kbps = LAYER3_KBPS[b2 >> 4];
    const rate = MPEG1_RATES[(b2 >> 2) & 0b11];
    if (!kbps || !rate) throw new Error(`bad header at byte ${offset}`);
    offset += frameLength(kbps, rate, (b2 >> 1) & 1);
    frames++;
    samples += SAMPLES_PER_FRAME;
  }
  if (offset !== stream.length) throw new Error('stream ends inside a frame');
  return { frames, seconds: samples / 44_100 };
}

describe('synthesizeNarration', () => {
  let dir: string;
  let out: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), 'narrator-test-'));
    out = path.join(dir, 'voice.mp3');
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  function fakeSpeech(maxChars = 12, failOn?: string) {
    const calls: string[] = [];
    const speech: SpeechSynthesizer = {
      maxChars,
      async synthesize(text) {
        calls.push(text);
        if (failOn && text.includes(failOn)) throw new Error('provider error');
        return Buffer.from(`[${text}]`);
      },
    };
    return { speech, calls };
  }

  it('appends chunk audio in text order', async () => {
    const { speech, calls } = fakeSpeech();

    const audio = await synthesizeNarration('First bit. Second bit. Third.', out, speech, { chunkLimit: 4000 });

    expect(calls).toEqual(['First bit.', 'Second bit.', 'Third.']);
    expect(await fs.readFile(out, 'utf8')).toBe('[First bit.][Second bit.][Third.]');
    expect(audio).toEqual({ path: out, bytes: 33, chunks: 3, failedChunks: 0 });
  });

  it('caps chunks at the provider limit', async () => {
    const { speech, calls } = fakeSpeech(12);
    await synthesizeNarration('This sentence is far longer than twelve characters.', out, speech, { chunkLimit: 4000 });
    expect(calls.every((c) => c.length <= 12)).toBe(true);
  });

  it('skips a failed chunk and keeps the rest', async () => {
    const { speech } = fakeSpeech(12, 'Second');

    const audio = await synthesizeNarration('First bit. Second bit. Third.', out, speech, { chunkLimit: 4000 });

    expect(await fs.readFile(out, 'utf8')).toBe('[First bit.][Third.]');
    expect(audio.failedChunks).toBe(1);
    expect(audio.bytes).toBe(20);
  });

  it('fails when every chunk fails', async () => {
    const { speech } = fakeSpeech(12, ' ');
    await expect(synthesizeNarration('First bit. Second bit.', out, speech, { chunkLimit: 4000 }))
      .rejects.toThrow(new SpeechSynthesisError('No audio produced (2/2 chunks failed)', 2));
  });

  it('fails on empty narration without calling the provider', async () => {
    const { speech, calls } = fakeSpeech();
    await expect(synthesizeNarration('  \n ', out, speech, { chunkLimit: 4000 }))
      .rejects.toThrow('Narration is empty');
    expect(calls).toEqual([]);
  });

  it('appends MP3 chunks into one stream as long as its parts together', async () => {
    const parts: Record<string, Buffer> = {
      'First bit.': Buffer.concat([silentFrame(128), silentFrame(128)]),
      'Second bit.': Buffer.concat([silentFrame(64), silentFrame(64), silentFrame(64)]),
      'Third.': silentFrame(128),
    };
    const speech: SpeechSynthesizer = {
      maxChars: 12,
      async synthesize(text) {
        const audio = parts[text];
        if (!audio) throw new Error(`unexpected chunk ${text}`);
        return audio;
      },
    };

    const audio = await synthesizeNarration('First bit. Second bit. Third.', out, speech, { chunkLimit: 4000 });

    const pieces = Object.values(parts).map(countFrames);
    const whole = countFrames(await fs.readFile(out));
    expect(whole.frames).toBe(6);
    expect(whole.frames).toBe(pieces.reduce((sum, p) => sum + p.frames, 0));
    expect(whole.seconds).toBeCloseTo(pieces.reduce((sum, p) => sum + p.seconds, 0), 9);
    expect(whole.seconds).toBeCloseTo((6 * 1152) / 44_100, 9);
    expect(audio.bytes).toBe(2 * 417 + 3 * 208 + 417);
  });

  it('overwrites a previous file', async () => {
    await fs.writeFile(out, 'stale');
    const { speech } = fakeSpeech();
    await synthesizeNarration('Fresh.', out, speech, { chunkLimit: 4000 });
    expect(await fs.readFile(out, 'utf8')).toBe('[Fresh.]');
  });
});
