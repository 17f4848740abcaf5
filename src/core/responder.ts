/**
 * The responder — decides what a greeting looks like.
 *
 * A user who only says "hi" gets a short generated welcome instead of
 * having the message relayed to the operator. The LLM is the only
 * thing that can fail here, and it never fails loudly: any error or
 * empty completion turns into the configured fallback line.
 */

import type { GreetingConfig } from '../types/index.js';
import type { LLMAdapter } from '../llm/provider.js';
import { TextGenerationError, describeError } from './errors.js';

export type Language = 'bengali' | 'english';

export interface ResponderConfig {
  greeting: GreetingConfig;
  llm: LLMAdapter;
  /** Inbound text is cut to this length before it is classified */
  maxTextLength: number;
}

export interface WelcomeResult {
  content: string;
  /** How was this text produced? */
  source: 'llm' | 'fallback';
}

const BENGALI_SCRIPT = /[ঀ-৿]/;
const TRAILING_PUNCTUATION = /[\s!?.,;:…]+$/u;

export function detectLanguage(text: string): Language {
  return BENGALI_SCRIPT.test(text) ? 'bengali' : 'english';
}

export function createResponder(config: ResponderConfig) {
  const { greeting, llm, maxTextLength } = config;
  const vocabulary = new Set(greeting.vocabulary.map(word => word.toLowerCase()));
  const clip = (text: string) => text.slice(0, maxTextLength);

  return {
    /** Cut inbound text to the classification window */
    clip,

    /**
     * A greeting is a message of exactly one word from the vocabulary,
     * ignoring case and trailing punctuation. "hello world" is not one.
     */
    isGreeting(text: string): boolean {
      const tokens = clip(text).trim().split(/\s+/).filter(Boolean);
      if (tokens.length !== 1) return false;

      const word = tokens[0].toLowerCase().replace(TRAILING_PUNCTUATION, '');
      return vocabulary.has(word);
    },

    /** Generate a welcome for `name`; falls back instead of throwing. */
    async welcome(name: string | undefined, language: Language): Promise<WelcomeResult> {
      const prompt = buildWelcomePrompt(name?.trim() || greeting.defaultName, language);

      try {
        const response = await llm.chat([{ role: 'user', content: prompt }]);
        const content = response.content.trim();
        if (!content) throw new TextGenerationError(`${llm.name} returned an empty completion`);
        return { content, source: 'llm' };
      } catch (error) {
        console.warn(`[relay] Welcome generation failed, using fallback: ${describeError(error)}`);
        return { content: greeting.fallback, source: 'fallback' };
      }
    },
  };
}

export type Responder = ReturnType<typeof createResponder>;

function buildWelcomePrompt(name: string, language: Language): string {
  return [
    'Make a short friendly welcome message.',
    `Include the user's name: ${name}`,
    `Language: ${language}`,
    'Very short (1-2 lines).',
    'No emojis at the start, at most one emoji at the end.',
  ].join('\n');
}
