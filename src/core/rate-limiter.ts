/**
 * Rate limiter — one timestamp per conversation.
 *
 * A message arriving sooner than `minIntervalMs` after the last
 * accepted one is rejected and leaves no trace: no relay, no reply,
 * and the stored timestamp does not move.
 */

import * as db from '../db/index.js';
import type { RelayDatabase } from '../db/index.js';
import type { ConversationId } from '../types/index.js';

export interface RateLimiter {
  allow(conversationId: ConversationId, now?: number): boolean;
}

export function createRateLimiter(database: RelayDatabase, minIntervalMs: number): RateLimiter {
  return {
    allow(conversationId, now = Date.now()) {
      const { lastMessageAt } = db.ensureConversation(database, conversationId);
      if (lastMessageAt !== null && now - lastMessageAt < minIntervalMs) return false;
      return db.touchConversation(database, conversationId, now);
    },
  };
}
