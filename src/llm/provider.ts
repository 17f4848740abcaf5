/**
 * LLM provider abstraction.
 *
 * A provider takes a list of messages and returns a response string.
 * That's it. The relay only asks for one-line welcomes, so there is
 * no streaming.
 */

import type { z } from 'zod';

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMResponse {
  content: string;
  /** How many tokens were used (if provider reports it) */
  usage?: {
    promptTokens?: number;
    completionTokens?: number;
  };
}

export interface LLMAdapter {
  /** Human-readable name for logs */
  name: string;

  /** Generate a response. Pass signal to abort the request. */
  chat(messages: LLMMessage[], signal?: AbortSignal): Promise<LLMResponse>;

  /** Check if the provider is reachable */
  health(): Promise<boolean>;
}

/**
 * Combine the request timeout with an optional caller signal.
 */
export function requestSignal(timeoutSec: number, signal?: AbortSignal): AbortSignal | undefined {
  const signals: AbortSignal[] = [];
  if (timeoutSec > 0) signals.push(AbortSignal.timeout(timeoutSec * 1000));
  if (signal) signals.push(signal);

  if (signals.length === 0) return undefined;
  if (signals.length === 1) return signals[0];
  return AbortSignal.any(signals);
}

/**
 * POST a JSON body and validate the JSON that comes back.
 * Non-2xx answers throw `<label> error (<status>): <body>`.
 */
export async function postJSON<S extends z.ZodTypeAny>(
  url: string,
  body: unknown,
  schema: S,
  options: { label: string; headers?: Record<string, string>; signal?: AbortSignal },
): Promise<z.output<S>> {
  const response = await fetch(url, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json', ...options.headers },
    body: JSON.stringify(body),
    signal: options.signal,
  });

  if (!response.ok) {
    throw new Error(`${options.label} error (${response.status}): ${await response.text()}`);
  }

  return schema.parse(await response.json());
}

const HEALTH_TIMEOUT_MS = 5_000;

/** GET `url`; any 2xx counts as reachable, network errors and timeouts do not throw. */
export async function reachable(url: string, headers?: Record<string, string>): Promise<boolean> {
  try {
    const response = await fetch(url, { headers, signal: AbortSignal.timeout(HEALTH_TIMEOUT_MS) });
    return response.ok;
  } catch {
    return false;
  }
}
