/**
 * Text-generation clients for narration scripts.
 *
 * Groq is reached through the OpenAI SDK (OpenAI-compatible endpoint) and is the
 * default; Anthropic is selectable with SCRIPT_PROVIDER=anthropic. There is no
 * cross-provider fallback: one failed call fails the script step.
 */
import Anthropic from '@anthropic-ai/sdk';
import OpenAI from 'openai';
import { env } from '../config.js';
import { logger } from '../utils/logger.js';

// ── Public interfaces ─────────────────────────────────────────────────────────

export interface TextGenerator {
  readonly provider: string;
  /** Returns the raw model output for a single user-turn prompt. */
  generate(prompt: string, signal?: AbortSignal): Promise<string>;
}

export interface GroqOptions {
  apiKey: string;
  baseURL: string;
  model: string;
}

export interface AnthropicOptions {
  apiKey: string;
  model: string;
  maxTokens?: number;
}

// ── Groq (OpenAI-compatible) ──────────────────────────────────────────────────

export function createGroqGenerator(opts: GroqOptions): TextGenerator {
  const client = new OpenAI({ apiKey: opts.apiKey, baseURL: opts.baseURL, maxRetries: 0 });

  return {
    provider: 'groq',
    async generate(prompt, signal) {
      logger.debug('llm.generate', { provider: 'groq', model: opts.model, chars: prompt.length });
      const res = await client.chat.completions.create(
        {
          model: opts.model,
          messages: [{ role: 'user', content: prompt }],
          response_format: { type: 'json_object' },
        },
        { signal },
      );
      logger.debug('llm.generate complete', {
        provider: 'groq',
        promptTokens: res.usage?.prompt_tokens,
        completionTokens: res.usage?.completion_tokens,
      });
      return res.choices[0]?.message?.content ?? '';
    },
  };
}

// ── Anthropic ─────────────────────────────────────────────────────────────────

export function createAnthropicGenerator(opts: AnthropicOptions): TextGenerator {
  const client = new Anthropic({ apiKey: opts.apiKey, maxRetries: 0 });

  return {
    provider: 'anthropic',
    async generate(prompt, signal) {
      logger.debug('llm.generate', { provider: 'anthropic', model: opts.model, chars: prompt.length });
      const res = await client.messages.create(
        {
          model: opts.model,
          max_tokens: opts.maxTokens ?? 4_000,
          messages: [{ role: 'user', content: prompt }],
        },
        { signal },
      );
      logger.debug('llm.generate complete', {
        provider: 'anthropic',
        inputTokens: res.usage.input_tokens,
        outputTokens: res.usage.output_tokens,
      });
      return res.content.map(block => (block.type === 'text' ? block.text : '')).join('');
    },
  };
}

// ── Factory ───────────────────────────────────────────────────────────────────

/**
 * Build the generator selected by SCRIPT_PROVIDER. A missing key yields a
 * generator that rejects, so the failure surfaces as a script-step failure.
 */
export function createTextGenerator(): TextGenerator {
  if (env.SCRIPT_PROVIDER === 'anthropic') {
    if (!env.ANTHROPIC_API_KEY) return missingKey('anthropic', 'ANTHROPIC_API_KEY');
    return createAnthropicGenerator({ apiKey: env.ANTHROPIC_API_KEY, model: env.ANTHROPIC_MODEL });
  }
  if (!env.GROQ_API_KEY) return missingKey('groq', 'GROQ_API_KEY');
  return createGroqGenerator({ apiKey: env.GROQ_API_KEY, baseURL: env.GROQ_BASE_URL, model: env.GROQ_MODEL });
}

function missingKey(provider: string, variable: string): TextGenerator {
  return {
    provider,
    generate: () => Promise.reject(new Error(`${variable} is not set`)),
  };
}
