/**
 * Script Normalizer. Asks the text-generation service for a segmented
 * narration script and turns its untrusted output into a NarrationSet with
 * exactly one item per scene.
 */
import { z } from 'zod';
import type { TextGenerator } from '../ai/llm.js';
import { ScriptGenerationError, describeError } from '../errors.js';
import { logger } from '../utils/logger.js';
import type { LengthMode, NarrationSet, SceneDescriptor } from '../types.js';

/** Appended when the model returns fewer items than there are scenes. */
export const NARRATION_FILLER = 'And here is another pick that deserves a place on this list.';

// Details shorter than this count as "nothing provided"
const MIN_DETAIL_CHARS = 5;

export interface ScriptRequest {
  topic: string;
  category: string;
  mode: LengthMode;
  scenes: readonly SceneDescriptor[];
}

// ── Prompt ────────────────────────────────────────────────────────────────────

const PERSONAS: Record<string, { role: string; tone: string }> = {
  movie:   { role: 'You are an enthusiastic Movie Critic.',      tone: 'passionate, dramatic, and opinionated' },
  product: { role: 'You are a persuasive Sales Copywriter.',     tone: 'excited, convincing, and highlighting value' },
};

const DEFAULT_PERSONA = { role: 'You are a professional video scriptwriter.', tone: 'engaging and clear' };

const LENGTH_CONSTRAINTS: Record<LengthMode, string> = {
  short: 'Write about 2-3 sentences per item. Keep it fast.',
  long:  'Write a detailed paragraph (4-5 sentences) per item.',
};

export function buildScriptPrompt(req: ScriptRequest): string {
  const persona = PERSONAS[req.category.toLowerCase()] ?? DEFAULT_PERSONA;

  const itemsContext = req.scenes
    .map((scene, i) => {
      const details = scene.details.trim();
      const instruction = details.length < MIN_DETAIL_CHARS
        ? 'User provided NO details. You MUST supply facts (year, cast, specs) from your own knowledge.'
        : `User provided: '${details}'. YOU MUST WEAVE THESE EXACT DETAILS into the script.`;
      return `--- ITEM ${i + 1}: ${scene.name} ---\n${instruction}`;
    })
    .join('\n\n');

  return `${persona.role}
Topic: "${req.topic}"
Tone: ${persona.tone}
Constraint: ${LENGTH_CONSTRAINTS[req.mode]}

TASK:
Create a spoken script for a video.

STRICT RULES:
1. If the user provided details, you MUST say them.
2. If the user provided nothing, you MUST provide value.
3. Do not sound robotic.
4. "items" MUST contain exactly ${req.scenes.length} entries, in the order given.

INPUT DATA:
${itemsContext}

RETURN ONLY JSON:
{
  "intro": "A strong hook.",
  "items": ["Script for Item 1", "Script for Item 2"],
  "outro": "A strong conclusion."
}`;
}

// ── Response decoding ─────────────────────────────────────────────────────────

// Items arrive either as plain strings or as objects with a title and a
// spoken-text field; the spoken text wins when both are present.
const NarrationItemSchema = z.union([
  z.string(),
  z.object({
    title:     z.string().optional(),
    name:      z.string().optional(),
    script:    z.string().optional(),
    narration: z.string().optional(),
    text:      z.string().optional(),
    details:   z.string().optional(),
  }).passthrough(),
]);

const ScriptResponseSchema = z.object({
  intro: z.string().catch(''),
  items: z.array(z.unknown()).catch([]),
  outro: z.string().catch(''),
});

type NarrationItem = z.infer<typeof NarrationItemSchema>;

function reduceItem(item: NarrationItem): string {
  if (typeof item === 'string') return item;
  return item.script ?? item.narration ?? item.text ?? item.details ?? item.title ?? item.name ?? '';
}

/** Remove provider-added markdown code fences. */
export function stripCodeFences(raw: string): string {
  return raw.replace(/```(?:json)?/gi, '').trim();
}

/**
 * Decode a raw model response into a NarrationSet.
 *
 * Short item lists are padded with NARRATION_FILLER; long ones are kept whole.
 * Items of an unrecognised shape become the filler in place.
 */
export function parseScriptResponse(raw: string, sceneCount: number): NarrationSet {
  let json: unknown;
  try {
    json = JSON.parse(stripCodeFences(raw));
  } catch (err) {
    throw new ScriptGenerationError(`Script response is not valid JSON: ${describeError(err)}`, raw, { cause: err });
  }

  if (typeof json !== 'object' || json === null || Array.isArray(json)) {
    throw new ScriptGenerationError('Script response is not a JSON object', raw);
  }

  const decoded = ScriptResponseSchema.parse(json);
  const items = decoded.items.map((value) => {
    const item = NarrationItemSchema.safeParse(value);
    return item.success ? reduceItem(item.data) : NARRATION_FILLER;
  });

  const missing = Math.max(0, sceneCount - items.length);
  if (missing > 0) {
    logger.warn('Scriptwriter: model returned too few items, padding with filler', {
      expected: sceneCount,
      received: items.length,
    });
  }

  return {
    intro: decoded.intro,
    items: [...items, ...Array.from({ length: missing }, () => NARRATION_FILLER)],
    outro: decoded.outro,
  };
}

// ── Generation ────────────────────────────────────────────────────────────────

export async function generateNarration(
  req: ScriptRequest,
  generator: TextGenerator,
  signal?: AbortSignal,
): Promise<NarrationSet> {
  logger.info('Scriptwriter: generating narration', {
    provider: generator.provider,
    topic: req.topic,
    category: req.category,
    mode: req.mode,
    scenes: req.scenes.length,
  });

  let raw: string;
  try {
    raw = await generator.generate(buildScriptPrompt(req), signal);
  } catch (err) {
    throw new ScriptGenerationError(`Script generation failed: ${describeError(err)}`, undefined, { cause: err });
  }

  return parseScriptResponse(raw, req.scenes.length);
}
