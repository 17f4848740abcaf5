/**
 * Wires grammy updates into the relay router.
 *
 * Each message is queued on its conversation's lane, so one slow
 * conversation (an LLM welcome, a typing pause) never holds up the
 * others, while messages within a conversation stay in order.
 */

import type { Bot } from 'grammy';
import type { RelayRouter } from '../core/router.js';
import type { Lanes } from '../core/lanes.js';
import { describeError } from '../core/errors.js';
import { toInboundEvent } from './events.js';

export function registerRelayHandlers(params: {
  bot: Bot;
  router: RelayRouter;
  lanes: Lanes;
}): void {
  const { bot, router, lanes } = params;

  bot.on('message', (ctx) => {
    // Stamped before queueing so the rate limiter sees arrival, not dequeue, time
    const event = toInboundEvent(ctx.message, Date.now());
    if (!event) return;

    // Lanes log task failures themselves; the returned promise never rejects.
    void lanes.run(event.conversationId, async () => {
      const outcome = await router.dispatch(event);
      if (outcome !== 'rate_limited' && outcome !== 'ignored') {
        console.log(`[relay] ${event.conversationId}/${event.messageId}: ${outcome}`);
      }
    });
  });

  bot.catch((err) => {
    console.error(`[relay] Update ${err.ctx.update.update_id} failed: ${describeError(err.error)}`);
  });
}
