/**
 * LLM provider configuration.
 *
 * The relay only needs an LLM for one thing: a short welcome line
 * when a user says hello. By default it talks to Ollama running
 * locally, and can be pointed at Gemini instead.
 *
 * Provider config lives in data/config.yaml; API keys come from the
 * environment.
 */

export interface OllamaProvider {
  type: 'ollama';
  /** Ollama API base URL. Default: http://localhost:11434 */
  baseUrl?: string;
  /** Model name. Default: gemma3:1b */
  model?: string;
  /** Max tokens to generate */
  maxTokens?: number;
  /** Temperature (0-1). Lower = more predictable */
  temperature?: number;
  /** Request timeout in seconds (0 disables it) */
  timeout?: number;
}

export interface GeminiProvider {
  type: 'gemini';
  /** API key (GEMINI_API_KEY from env when omitted in config) */
  apiKey: string;
  baseUrl?: string;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  timeout?: number;
}

export type LLMProvider = OllamaProvider | GeminiProvider;

/** Default provider configuration */
export const DEFAULT_PROVIDER: OllamaProvider = {
  type: 'ollama',
  baseUrl: 'http://localhost:11434',
  model: 'gemma3:1b',
  maxTokens: 128,
  temperature: 0.7,
  timeout: 30,
};
