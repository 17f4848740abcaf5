/**
 * Presence store — is the operator answering right now?
 *
 * Besides the steady state it carries a one-shot transition notice.
 * The operator arms it with /available or /away; the next user message
 * that reaches the presence check consumes it, whichever conversation
 * that message belongs to. Everyone after that sees the steady state.
 */

import * as db from '../db/index.js';
import type { RelayDatabase } from '../db/index.js';
import type { PresenceState, Transition } from '../types/index.js';

export interface PresenceStore {
  setAvailable(): void;
  setAway(): void;
  /** Return the pending transition and clear it. At most one caller sees each one. */
  consumeTransition(): Transition;
  isAvailable(): boolean;
  snapshot(): PresenceState;
}

export function createPresenceStore(database: RelayDatabase): PresenceStore {
  return {
    // Repeating a transition re-arms the notice even though `available` stays put.
    setAvailable() {
      db.setPresence(database, { available: true, pendingTransition: 'became_available' });
    },

    setAway() {
      db.setPresence(database, { available: false, pendingTransition: 'became_away' });
    },

    consumeTransition() {
      return db.takePendingTransition(database);
    },

    isAvailable() {
      return db.getPresence(database).available;
    },

    snapshot() {
      return db.getPresence(database);
    },
  };
}
