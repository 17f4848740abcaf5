/**
 * Config loader — reads data/config.yaml and the environment.
 *
 * The YAML file holds policy and wording; every key is optional and
 * falls back to the defaults below. Secrets never live in the file:
 * the bot token, the operator id and API keys come from env.
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { DEFAULT_PROVIDER, type RelayConfig } from '../types/index.js';

const BUSY = '🔴 Operator busy.\nMessage sent ✅\n⏳ Reply within 48 hours.';

const ProviderSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('ollama'),
    baseUrl: z.string().url().optional(),
    model: z.string().optional(),
    maxTokens: z.number().int().positive().optional(),
    temperature: z.number().min(0).max(2).optional(),
    timeout: z.number().min(0).optional(),
  }),
  z.object({
    type: z.literal('gemini'),
    apiKey: z.string().default(''),
    baseUrl: z.string().url().optional(),
    model: z.string().optional(),
    maxTokens: z.number().int().positive().optional(),
    temperature: z.number().min(0).max(2).optional(),
    timeout: z.number().min(0).optional(),
  }),
]);

const FileSchema = z.object({
  server: z.object({
    port: z.number().int().positive().default(8080),
    host: z.string().default('0.0.0.0'),
  }).default({}),

  provider: ProviderSchema.default(DEFAULT_PROVIDER),

  relay: z.object({
    maxTextLength: z.number().int().positive().default(500),
    rateLimit: z.object({
      minIntervalMs: z.number().int().min(0).default(1200),
    }).default({}),
    ephemeral: z.object({
      typingMs: z.number().int().min(0).default(600),
      acknowledgementMs: z.number().int().min(0).default(3000),
      confirmationMs: z.number().int().min(0).default(3000),
    }).default({}),
    retention: z.object({
      maxAgeDays: z.number().min(0).default(30),
      maxRecords: z.number().int().min(0).default(50_000),
      pruneIntervalMinutes: z.number().positive().default(60),
    }).default({}),
  }).default({}),

  notices: z.object({
    typing: z.string().default('💬 typing…'),
    sent: z.string().default('Message sent ✅'),
    available: z.string().default('🟢 Operator available.'),
    away: z.string().default(BUSY),
    busy: z.string().default(BUSY),
    operatorAvailable: z.string().default('🟢 You are now available.'),
    operatorAway: z.string().default('🔴 You are now away.'),
    originNotFound: z.string().default('❌ User not found.'),
    deliveryFailed: z.string().default('❌ Failed to send.'),
    delivered: z.string().default('Message sent ✅'),
  }).default({}),

  greeting: z.object({
    vocabulary: z.array(z.string().min(1)).default([
      'hi', 'hello', 'hey', 'hlo', 'hola', 'namaste', 'salam', 'assalamualaikum',
    ]),
    fallback: z.string().default('Hi there! Send your message and the operator will get it.'),
    defaultName: z.string().default('Friend'),
  }).default({}),
});

const EnvSchema = z.object({
  TELEGRAM_TOKEN: z.string({ required_error: 'TELEGRAM_TOKEN is not set' }).min(1, 'TELEGRAM_TOKEN is empty'),
  OPERATOR_ID: z.string({ required_error: 'OPERATOR_ID is not set' })
    .regex(/^[1-9]\d*$/, 'OPERATOR_ID must be a numeric Telegram user id')
    .transform(Number),
  GEMINI_API_KEY: z.string().optional(),
  PORT: z.coerce.number().int().positive().optional(),
});

export type Env = Record<string, string | undefined>;

/**
 * Load config from `dataDir/config.yaml` (optional) and `env`.
 * Throws ConfigError with every problem listed.
 */
export function loadConfig(dataDir: string, env: Env = process.env): RelayConfig {
  const configPath = join(dataDir, 'config.yaml');

  let raw: unknown = {};
  if (existsSync(configPath)) {
    raw = YAML.parse(readFileSync(configPath, 'utf-8')) ?? {};
  } else {
    console.warn(`[relay] No config at ${configPath}, using defaults`);
  }

  const file = FileSchema.safeParse(raw);
  if (!file.success) {
    throw new ConfigError(`Invalid ${configPath}:\n${formatIssues(file.error)}`);
  }

  const secrets = EnvSchema.safeParse(env);
  if (!secrets.success) {
    throw new ConfigError(`Invalid environment:\n${formatIssues(secrets.error)}`);
  }

  const { server, relay, notices, greeting } = file.data;
  let provider = file.data.provider;

  if (provider.type === 'gemini') {
    const apiKey = provider.apiKey || secrets.data.GEMINI_API_KEY || '';
    if (!apiKey) throw new ConfigError('Gemini provider needs GEMINI_API_KEY');
    provider = { ...provider, apiKey };
  }

  return {
    server: { ...server, port: secrets.data.PORT ?? server.port },
    provider,
    relay,
    notices,
    greeting,
    telegram: { token: secrets.data.TELEGRAM_TOKEN },
    operator: { id: secrets.data.OPERATOR_ID },
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `  - ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('\n');
}
