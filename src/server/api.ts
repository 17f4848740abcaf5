/**
 * Liveness routes.
 *
 * Hosting platforms that reap idle processes get something to ping:
 *   /            — plain text, always 200
 *   /api/health  — relay state, degraded when the LLM is unreachable
 */

import { Hono } from 'hono';
import type { LLMAdapter } from '../llm/provider.js';
import type { PresenceStore } from '../core/presence.js';
import type { CorrelationMap } from '../core/correlation.js';

export interface APIDeps {
  llm: LLMAdapter;
  presence: PresenceStore;
  correlations: CorrelationMap;
  version?: string;
}

export function createAPI(deps: APIDeps) {
  const { llm, presence, correlations, version = '0.1.0' } = deps;
  const api = new Hono();

  api.get('/', (c) => c.text('Relay is alive and running!'));

  api.get('/api/health', async (c) => {
    const llmHealthy = await llm.health();
    const { available } = presence.snapshot();

    return c.json({
      status: llmHealthy ? 'ok' : 'degraded',
      llm: llmHealthy ? 'connected' : 'unreachable',
      operator: available ? 'available' : 'away',
      relayRecords: correlations.size(),
      version,
    });
  });

  return api;
}
