/**
 * The relay router — the heart of the relay.
 *
 * Every inbound message lands in dispatch(), which sorts it into one
 * of three paths:
 *
 *   command        → /start (anyone), /available and /away (operator only)
 *   from operator  → a reply to a relayed copy, routed back to its user
 *   anything else  → a user message, relayed to the operator
 *
 * User message flow:
 *   1. Rate limiter (by arrival time) → if rejected, stop without a trace
 *   2. Greeting → generated welcome, nothing is relayed
 *   3. Forward to the operator (best-effort) and record the correlation
 *   4. Ephemeral "typing…" notice, awaited
 *   5. Pending presence transition → one-shot transition notice
 *   6. Operator available → ephemeral "sent"
 *   7. Operator away → busy notice on first contact, "sent" afterwards
 *
 * Store calls are synchronous and never span an await, so no shared
 * state is held while the transport or the LLM is working.
 */

import type {
  CommandOutcome,
  ConversationId,
  DispatchOutcome,
  InboundEvent,
  MessageContent,
  Notices,
  OperatorOutcome,
  RelayCommand,
  RelayPolicy,
  UserOutcome,
} from '../types/index.js';
import type { PresenceStore } from './presence.js';
import type { CorrelationMap } from './correlation.js';
import type { RateLimiter } from './rate-limiter.js';
import type { EngagementTracker } from './engagement.js';
import type { EphemeralNotifier } from './ephemeral.js';
import type { RelayTransport } from './transport.js';
import { detectLanguage, type Language, type Responder } from './responder.js';
import {
  CorrelationNotFoundError,
  DuplicateRelayError,
  TransportDeliveryError,
  TransportForwardError,
  describeError,
} from './errors.js';

export interface RouterConfig {
  /** The operator's user id, which is also their private chat id */
  operatorId: number;
  presence: PresenceStore;
  correlations: CorrelationMap;
  rateLimiter: RateLimiter;
  engagement: EngagementTracker;
  responder: Responder;
  transport: RelayTransport;
  notifier: EphemeralNotifier;
  notices: Notices;
  ephemeral: RelayPolicy['ephemeral'];
  /** Epoch ms clock, swappable for tests */
  clock?: () => number;
}

const COMMANDS: readonly RelayCommand[] = ['start', 'available', 'away'];

function isRelayCommand(value: string): value is RelayCommand {
  return COMMANDS.some(command => command === value);
}

export function createRelayRouter(config: RouterConfig) {
  const {
    operatorId,
    presence,
    correlations,
    rateLimiter,
    engagement,
    responder,
    transport,
    notifier,
    notices,
    ephemeral,
    clock = Date.now,
  } = config;

  /** Durable reply. Failures are logged, never thrown. */
  async function reply(destination: ConversationId, text: string): Promise<void> {
    try {
      await transport.sendText(destination, text);
    } catch (error) {
      console.error(`[relay] Reply to ${destination} failed: ${describeError(error)}`);
    }
  }

  async function greet(destination: ConversationId, name: string | undefined, language: Language): Promise<void> {
    const welcome = await responder.welcome(name, language);
    await reply(destination, welcome.content);
  }

  /** Copy the message into the operator's chat and remember where it came from. */
  async function relay(event: InboundEvent, now: number): Promise<void> {
    let relayedId: number;
    try {
      relayedId = await transport.forward(operatorId, {
        chatId: event.conversationId,
        messageId: event.messageId,
      });
    } catch (error) {
      throw new TransportForwardError(
        `Forwarding message ${event.messageId} from ${event.conversationId} failed: ${describeError(error)}`,
        { cause: error },
      );
    }

    correlations.record(relayedId, event.conversationId, now);
  }

  async function deliver(destination: ConversationId, content: MessageContent): Promise<void> {
    try {
      if (content.kind === 'text') {
        await transport.sendText(destination, content.text);
      } else {
        await transport.sendMedia(destination, { kind: 'photo', fileId: content.fileId }, content.caption);
      }
    } catch (error) {
      throw new TransportDeliveryError(
        `Delivery to ${destination} failed: ${describeError(error)}`,
        { cause: error },
      );
    }
  }

  async function handleUserMessage(event: InboundEvent): Promise<UserOutcome> {
    const conversationId = event.conversationId;
    if (event.senderId === operatorId) return 'ignored';

    // 1. Flood gate — rejected messages produce no output at all.
    // Measured from arrival: a message may wait in its lane behind slow work.
    const now = event.receivedAt ?? clock();
    if (!rateLimiter.allow(conversationId, now)) return 'rate_limited';

    // 2. Greetings get a welcome and are not relayed
    const { content } = event;
    if (content.kind === 'text' && responder.isGreeting(content.text)) {
      await greet(conversationId, event.senderName, detectLanguage(responder.clip(content.text)));
      return 'greeted';
    }

    // 3. Relay — best-effort, the user gets a reply either way
    try {
      await relay(event, now);
    } catch (error) {
      if (error instanceof TransportForwardError || error instanceof DuplicateRelayError) {
        console.error(`[relay] ${error.message}`);
      } else {
        throw error;
      }
    }

    // 4. Typing feedback
    try {
      await transport.showTypingIndicator(conversationId);
    } catch (error) {
      console.warn(`[relay] Typing indicator for ${conversationId} failed: ${describeError(error)}`);
    }
    await notifier.show(conversationId, notices.typing, ephemeral.typingMs);

    // 5. One-shot transition notice
    const transition = presence.consumeTransition();
    if (transition === 'became_available') {
      await reply(conversationId, notices.available);
      return 'transition_available';
    }
    if (transition === 'became_away') {
      await reply(conversationId, notices.away);
      return 'transition_away';
    }

    // 6. Operator is around — a quick acknowledgement is enough
    if (presence.isAvailable()) {
      notifier.detach(conversationId, notices.sent, ephemeral.acknowledgementMs);
      return 'acknowledged';
    }

    // 7. Operator is away — full busy notice once per user
    if (engagement.markAndCheckFirstContact(conversationId)) {
      await reply(conversationId, notices.busy);
      return 'busy_notice';
    }

    notifier.detach(conversationId, notices.sent, ephemeral.acknowledgementMs);
    return 'acknowledged';
  }

  async function handleOperatorReply(event: InboundEvent): Promise<OperatorOutcome> {
    if (event.senderId !== operatorId) return 'ignored';
    if (event.replyToMessageId === undefined) return 'ignored';

    let origin: ConversationId;
    try {
      origin = correlations.resolve(event.replyToMessageId);
    } catch (error) {
      if (!(error instanceof CorrelationNotFoundError)) throw error;
      console.warn(`[relay] ${error.message}`);
      await reply(event.conversationId, notices.originNotFound);
      return 'origin_not_found';
    }

    try {
      await deliver(origin, event.content);
    } catch (error) {
      console.error(`[relay] ${describeError(error)}`);
      await reply(event.conversationId, notices.deliveryFailed);
      return 'delivery_failed';
    }

    notifier.detach(event.conversationId, notices.delivered, ephemeral.confirmationMs);
    return 'delivered';
  }

  async function handleCommand(event: InboundEvent): Promise<CommandOutcome> {
    const command = event.command ?? '';
    if (!isRelayCommand(command)) return 'ignored';

    switch (command) {
      case 'start':
        await greet(event.conversationId, event.senderName, 'english');
        return 'greeted';

      case 'available':
        // Non-operators are ignored silently
        if (event.senderId !== operatorId) return 'denied';
        presence.setAvailable();
        console.log('[relay] Operator is now available');
        await reply(event.conversationId, notices.operatorAvailable);
        return 'now_available';

      case 'away':
        if (event.senderId !== operatorId) return 'denied';
        presence.setAway();
        console.log('[relay] Operator is now away');
        await reply(event.conversationId, notices.operatorAway);
        return 'now_away';
    }
  }

  return {
    handleUserMessage,
    handleOperatorReply,
    handleCommand,

    /** Sort an inbound message onto its path and run it. */
    async dispatch(event: InboundEvent): Promise<DispatchOutcome> {
      if (event.command !== undefined) return handleCommand(event);
      if (event.senderId === operatorId) return handleOperatorReply(event);
      return handleUserMessage(event);
    },
  };
}

export type RelayRouter = ReturnType<typeof createRelayRouter>;
