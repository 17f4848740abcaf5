/**
 * LLM provider factory.
 *
 * Creates the right adapter based on config.
 * Add new providers here.
 */

import type { LLMProvider } from '../types/index.js';
import type { LLMAdapter } from './provider.js';
import { createOllamaAdapter } from './ollama.js';
import { createGeminiAdapter } from './gemini.js';

export type { LLMAdapter, LLMMessage, LLMResponse } from './provider.js';

export function createLLMAdapter(config: LLMProvider): LLMAdapter {
  switch (config.type) {
    case 'ollama':
      return createOllamaAdapter(config);

    case 'gemini':
      return createGeminiAdapter(config);
  }
}
