/**
 * Top-level relay configuration.
 *
 * Policy and wording live in data/config.yaml:
 *   data/
 *     config.yaml   ← server, provider, relay policy, notices, greeting
 *
 * Secrets (bot token, operator id, API keys) come from the environment
 * and are merged in by the config loader.
 */

import type { LLMProvider } from './provider.js';

export interface RelayPolicy {
  /** Inbound text is cut to this many characters before classification */
  maxTextLength: number;

  rateLimit: {
    /** Messages closer together than this are dropped silently */
    minIntervalMs: number;
  };

  /** How long each ephemeral notice stays visible */
  ephemeral: {
    typingMs: number;
    acknowledgementMs: number;
    confirmationMs: number;
  };

  /** Correlation map retention */
  retention: {
    /** Relay records older than this are pruned (0 = no age limit) */
    maxAgeDays: number;
    /** Keep at most this many records, newest first (0 = no cap) */
    maxRecords: number;
    pruneIntervalMinutes: number;
  };
}

/** Every text the relay sends on its own behalf */
export interface Notices {
  /** Ephemeral, shown to the user while the relay works */
  typing: string;
  /** Ephemeral acknowledgement to the user */
  sent: string;
  /** Durable, first user after the operator turns available */
  available: string;
  /** Durable, first user after the operator turns away */
  away: string;
  /** Durable, a user's first message while the operator is away */
  busy: string;
  /** Operator confirmations for the presence commands */
  operatorAvailable: string;
  operatorAway: string;
  /** Operator replied to something that is not a known relayed copy */
  originNotFound: string;
  /** Operator reply could not be delivered */
  deliveryFailed: string;
  /** Ephemeral confirmation to the operator */
  delivered: string;
}

export interface GreetingConfig {
  /** Single-word messages that get a generated welcome instead of a relay */
  vocabulary: string[];
  /** Used when the LLM fails or returns nothing */
  fallback: string;
  /** Used when the sender has no first name */
  defaultName: string;
}

export interface RelayConfig {
  server: {
    port: number;
    host: string;
  };

  provider: LLMProvider;

  relay: RelayPolicy;

  notices: Notices;

  greeting: GreetingConfig;

  telegram: {
    token: string;
  };

  operator: {
    /** The one identity allowed to reply and toggle presence */
    id: number;
  };
}
