/**
 * Gemini adapter — Google's generateContent REST endpoint.
 *
 * System messages become `systemInstruction`; everything else maps
 * onto `contents` with Gemini's user/model roles.
 */

import { z } from 'zod';
import type { GeminiProvider } from '../types/index.js';
import { postJSON, reachable, requestSignal, type LLMAdapter, type LLMMessage } from './provider.js';

const DEFAULTS = {
  baseUrl: 'https://generativelanguage.googleapis.com/v1beta',
  model: 'gemini-2.0-flash',
  maxTokens: 128,
  temperature: 0.7,
  timeout: 30,
};

const GenerateResponseSchema = z.object({
  candidates: z.array(z.object({
    content: z.object({
      parts: z.array(z.object({ text: z.string().optional() })).default([]),
    }).optional(),
  })).default([]),
  usageMetadata: z.object({
    promptTokenCount: z.number().optional(),
    candidatesTokenCount: z.number().optional(),
  }).optional(),
});

function toGeminiRequest(messages: LLMMessage[]) {
  const system = messages.filter(m => m.role === 'system').map(m => m.content).join('\n\n');
  const contents = messages
    .filter(m => m.role !== 'system')
    .map(m => ({
      role: m.role === 'assistant' ? 'model' : 'user',
      parts: [{ text: m.content }],
    }));

  return system ? { systemInstruction: { parts: [{ text: system }] }, contents } : { contents };
}

export function createGeminiAdapter(config: GeminiProvider): LLMAdapter {
  const {
    apiKey,
    baseUrl = DEFAULTS.baseUrl,
    model = DEFAULTS.model,
    maxTokens = DEFAULTS.maxTokens,
    temperature = DEFAULTS.temperature,
    timeout = DEFAULTS.timeout,
  } = config;

  const headers = { 'x-goog-api-key': apiKey };

  return {
    name: `gemini/${model}`,

    async chat(messages, signal) {
      const data = await postJSON(
        `${baseUrl}/models/${model}:generateContent`,
        {
          ...toGeminiRequest(messages),
          generationConfig: { maxOutputTokens: maxTokens, temperature },
        },
        GenerateResponseSchema,
        { label: 'Gemini', headers, signal: requestSignal(timeout, signal) },
      );

      const parts = data.candidates[0]?.content?.parts ?? [];
      return {
        content: parts.map(p => p.text ?? '').join('').trim(),
        usage: {
          promptTokens: data.usageMetadata?.promptTokenCount,
          completionTokens: data.usageMetadata?.candidatesTokenCount,
        },
      };
    },

    health: () => reachable(`${baseUrl}/models/${model}`, headers),
  };
}
