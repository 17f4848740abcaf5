/**
 * Engagement tracker — has this user been told the operator is busy?
 *
 * The first message while the operator is away earns the full busy
 * notice; after that a quick acknowledgement is enough.
 */

import * as db from '../db/index.js';
import type { RelayDatabase } from '../db/index.js';
import type { ConversationId } from '../types/index.js';

export interface EngagementTracker {
  /** True exactly once per conversation. */
  markAndCheckFirstContact(conversationId: ConversationId): boolean;
}

export function createEngagementTracker(database: RelayDatabase): EngagementTracker {
  return {
    markAndCheckFirstContact(conversationId) {
      db.ensureConversation(database, conversationId);
      return db.markFirstContactShown(database, conversationId);
    },
  };
}
