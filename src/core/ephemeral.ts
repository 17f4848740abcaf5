/**
 * Ephemeral notices — send a message, wait, delete it.
 *
 * Used for "typing…" and "sent" acknowledgements. `show()` can be
 * awaited when the caller wants the pause, and resolves once the delay
 * is over; the delete runs in the background. `detach()` runs the whole
 * notice in the background. Background work is tracked so shutdown
 * (and tests) can wait for it with `drain()`.
 *
 * Nothing here ever rejects: a failed send ends the task, a failed
 * delete is logged and forgotten.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import type { ConversationId } from '../types/index.js';
import type { RelayTransport } from './transport.js';
import { describeError } from './errors.js';

export interface EphemeralNotifier {
  show(destination: ConversationId, text: string, delayMs: number): Promise<void>;
  detach(destination: ConversationId, text: string, delayMs: number): void;
  drain(): Promise<void>;
  /** Number of background notices and deletes still running */
  pending(): number;
}

export function createEphemeralNotifier(transport: RelayTransport): EphemeralNotifier {
  const inFlight = new Set<Promise<void>>();

  function track(task: Promise<void>): void {
    const tracked: Promise<void> = task.finally(() => {
      inFlight.delete(tracked);
    });
    inFlight.add(tracked);
  }

  async function remove(destination: ConversationId, messageId: number): Promise<void> {
    try {
      await transport.delete(destination, messageId);
    } catch (error) {
      console.warn(`[relay] Could not delete ephemeral ${messageId} in ${destination}: ${describeError(error)}`);
    }
  }

  async function show(destination: ConversationId, text: string, delayMs: number): Promise<void> {
    let messageId: number;
    try {
      messageId = await transport.sendText(destination, text);
    } catch (error) {
      console.error(`[relay] Ephemeral notice to ${destination} failed: ${describeError(error)}`);
      return;
    }

    if (delayMs > 0) await sleep(delayMs);

    // The caller waits for the delay only; the delete round trip is tracked for drain()
    track(remove(destination, messageId));
  }

  return {
    show,

    detach(destination, text, delayMs) {
      track(show(destination, text, delayMs));
    },

    async drain() {
      while (inFlight.size > 0) {
        await Promise.all([...inFlight]);
      }
    },

    pending() {
      return inFlight.size;
    },
  };
}
