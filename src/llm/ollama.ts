/**
 * Ollama adapter — talks to a local Ollama instance.
 *
 * This is the default provider. No API keys, no cloud, no cost.
 */

import { z } from 'zod';
import type { OllamaProvider } from '../types/index.js';
import { postJSON, reachable, requestSignal, type LLMAdapter } from './provider.js';

const DEFAULTS = {
  baseUrl: 'http://localhost:11434',
  model: 'gemma3:1b',
  maxTokens: 128,
  temperature: 0.7,
  timeout: 30,
};

const ChatResponseSchema = z.object({
  message: z.object({ content: z.string() }).optional(),
  prompt_eval_count: z.number().optional(),
  eval_count: z.number().optional(),
});

export function createOllamaAdapter(config: OllamaProvider): LLMAdapter {
  const {
    baseUrl = DEFAULTS.baseUrl,
    model = DEFAULTS.model,
    maxTokens = DEFAULTS.maxTokens,
    temperature = DEFAULTS.temperature,
    timeout = DEFAULTS.timeout,
  } = config;

  return {
    name: `ollama/${model}`,

    async chat(messages, signal) {
      const data = await postJSON(
        `${baseUrl}/api/chat`,
        {
          model,
          messages: messages.map(({ role, content }) => ({ role, content })),
          stream: false,
          options: { num_predict: maxTokens, temperature },
        },
        ChatResponseSchema,
        { label: 'Ollama', signal: requestSignal(timeout, signal) },
      );

      return {
        content: data.message?.content ?? '',
        usage: { promptTokens: data.prompt_eval_count, completionTokens: data.eval_count },
      };
    },

    health: () => reachable(`${baseUrl}/api/tags`),
  };
}
