/**
 * Correlation map — which conversation did a relayed copy come from?
 *
 * Every user message copied into the operator's chat gets a new
 * message id there. Operator replies reference that id, so the map
 * from relayed id to origin conversation is what makes replies
 * addressable.
 *
 * Records are kept for a bounded time and count (see prune()).
 * A reply to a pruned record resolves like a reply to anything else
 * unknown: CorrelationNotFoundError.
 */

import * as db from '../db/index.js';
import type { RelayDatabase } from '../db/index.js';
import type { ConversationId, MessageId, RelayPolicy } from '../types/index.js';
import { CorrelationNotFoundError, DuplicateRelayError } from './errors.js';

const DAY_MS = 86_400_000;

export interface CorrelationMap {
  /** Throws DuplicateRelayError if the relayed id is already recorded. */
  record(relayedMessageId: MessageId, originConversationId: ConversationId, now?: number): void;
  /** Throws CorrelationNotFoundError if the relayed id is unknown. */
  resolve(relayedMessageId: MessageId): ConversationId;
  /** Apply the retention policy. Returns how many records were removed. */
  prune(now?: number): number;
  size(): number;
}

export function createCorrelationMap(
  database: RelayDatabase,
  retention: RelayPolicy['retention']
): CorrelationMap {
  return {
    record(relayedMessageId, originConversationId, now = Date.now()) {
      const inserted = db.insertRelayRecord(database, {
        relayedMessageId,
        originConversationId,
        createdAt: now,
      });
      if (!inserted) throw new DuplicateRelayError(relayedMessageId);
    },

    resolve(relayedMessageId) {
      const record = db.getRelayRecord(database, relayedMessageId);
      if (!record) throw new CorrelationNotFoundError(relayedMessageId);
      return record.originConversationId;
    },

    prune(now = Date.now()) {
      let removed = 0;

      if (retention.maxAgeDays > 0) {
        removed += db.deleteRelayRecordsBefore(database, now - retention.maxAgeDays * DAY_MS);
      }
      if (retention.maxRecords > 0) {
        removed += db.deleteRelayRecordsBeyond(database, retention.maxRecords);
      }

      return removed;
    },

    size() {
      return db.countRelayRecords(database);
    },
  };
}
