/**
 * relaydesk — a Telegram relay between anonymous users and one operator.
 *
 * Entry point. Loads config, opens the database, starts the bot and
 * the liveness server. One process, one bot, one port.
 */

import 'dotenv/config';
import { serve } from '@hono/node-server';
import { Bot } from 'grammy';
import { resolve } from 'node:path';

import { openDatabase } from './db/index.js';
import { loadConfig } from './core/config-loader.js';
import { createPresenceStore } from './core/presence.js';
import { createCorrelationMap } from './core/correlation.js';
import { createRateLimiter } from './core/rate-limiter.js';
import { createEngagementTracker } from './core/engagement.js';
import { createResponder } from './core/responder.js';
import { createEphemeralNotifier } from './core/ephemeral.js';
import { createLanes } from './core/lanes.js';
import { createRelayRouter } from './core/router.js';
import { ConfigError } from './core/errors.js';
import { createLLMAdapter } from './llm/index.js';
import { createTelegramTransport } from './telegram/transport.js';
import { registerRelayHandlers } from './telegram/bot.js';
import { createAPI } from './server/api.js';

const DATA_DIR = process.env.RELAY_DATA_DIR ?? resolve(process.cwd(), 'data');
const DB_PATH = process.env.RELAY_DB_PATH ?? resolve(process.cwd(), 'relay.db');

async function main() {
  console.log('');
  console.log('  ┌─────────────────────────┐');
  console.log('  │    r e l a y d e s k    │');
  console.log('  │   one operator relay    │');
  console.log('  └─────────────────────────┘');
  console.log('');

  // 1. Load config
  console.log(`  data:  ${DATA_DIR}`);
  const config = loadConfig(DATA_DIR);

  // 2. Open database and state stores
  console.log(`  db:    ${DB_PATH}`);
  const database = openDatabase(DB_PATH);
  const presence = createPresenceStore(database);
  const correlations = createCorrelationMap(database, config.relay.retention);
  const rateLimiter = createRateLimiter(database, config.relay.rateLimit.minIntervalMs);
  const engagement = createEngagementTracker(database);

  const pruned = correlations.prune();
  if (pruned > 0) console.log(`  db:    pruned ${pruned} stale relay record(s)`);

  // 3. Create LLM adapter
  const llm = createLLMAdapter(config.provider);
  console.log(`  llm:   ${llm.name}`);

  const healthy = await llm.health();
  if (!healthy) {
    console.warn('  ⚠  LLM provider is not reachable. Greetings will use the fallback.');
  } else {
    console.log('  llm:   ✓ connected');
  }

  // 4. Wire the relay
  const bot = new Bot(config.telegram.token);
  const transport = createTelegramTransport(bot.api);
  const notifier = createEphemeralNotifier(transport);
  const lanes = createLanes();

  const router = createRelayRouter({
    operatorId: config.operator.id,
    presence,
    correlations,
    rateLimiter,
    engagement,
    responder: createResponder({
      greeting: config.greeting,
      llm,
      maxTextLength: config.relay.maxTextLength,
    }),
    transport,
    notifier,
    notices: config.notices,
    ephemeral: config.relay.ephemeral,
  });

  registerRelayHandlers({ bot, router, lanes });

  const pruneTimer = setInterval(() => {
    const removed = correlations.prune();
    if (removed > 0) console.log(`[relay] Pruned ${removed} stale relay record(s)`);
  }, config.relay.retention.pruneIntervalMinutes * 60_000);
  pruneTimer.unref();

  // 5. Liveness server
  const { port, host } = config.server;
  const server = serve({
    fetch: createAPI({ llm, presence, correlations }).fetch,
    port,
    hostname: host,
  }, () => {
    console.log(`  ✓ liveness on http://${host}:${port}`);
  });

  // 6. Shutdown: stop polling, finish queued work, then close
  let stopping = false;
  const shutdown = async (signal: string) => {
    if (stopping) return;
    stopping = true;
    console.log(`[relay] ${signal} received, shutting down`);

    clearInterval(pruneTimer);
    await bot.stop();
    await lanes.idle();
    await notifier.drain();
    server.close();
    database.close();
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        console.error('[relay] Shutdown failed:', error);
        process.exitCode = 1;
      });
    });
  }

  // 7. Start polling (resolves once the bot stops)
  await bot.start({
    onStart: (me) => {
      console.log('');
      console.log(`  ✓ polling as @${me.username}`);
      console.log(`  ✓ operator: ${config.operator.id}`);
      console.log(`  ✓ presence: ${presence.isAvailable() ? 'available' : 'away'}`);
      console.log(`  ✓ relay records: ${correlations.size()}`);
      console.log('');
    },
  });
}

main().catch((error) => {
  if (error instanceof ConfigError) {
    console.error(`Failed to start relaydesk: ${error.message}`);
  } else {
    console.error('Failed to start relaydesk:', error);
  }
  process.exit(1);
});
