/**
 * Core relay types.
 *
 * A conversation is one end user's private chat with the bot.
 * Messages flow in two directions:
 *   - inbound:  user → bot → copy in the operator's chat (a "relay")
 *   - outbound: operator replies to a relayed copy → bot → user
 *
 * The operator's chat is a single stream shared by every user, so each
 * relayed copy is correlated back to the conversation it came from.
 */

/** Telegram chat id of a user-side conversation */
export type ConversationId = number;

/** Message id inside a given chat */
export type MessageId = number;

/** Identity of whoever sent an inbound message */
export type SenderId = number;

/** Pending one-shot presence notice */
export type Transition = 'none' | 'became_available' | 'became_away';

export interface PresenceState {
  /** Operator is answering right now (default: away) */
  available: boolean;
  /** Consumed by the next user message that reaches the presence check */
  pendingTransition: Transition;
}

export interface Conversation {
  id: ConversationId;
  /** Epoch ms of the last message that passed the rate limiter */
  lastMessageAt: number | null;
  /** Has this user already been shown the busy notice? */
  firstContactShown: boolean;
  createdAt: string;
  updatedAt: string;
}

export interface RelayRecord {
  /** Id of the copy inside the operator's chat */
  relayedMessageId: MessageId;
  originConversationId: ConversationId;
  /** Epoch ms */
  createdAt: number;
}

/** A photo as the transport knows it (Telegram file id) */
export interface MediaRef {
  kind: 'photo';
  fileId: string;
}

export type MessageContent =
  | { kind: 'text'; text: string }
  | { kind: 'photo'; fileId: string; caption?: string };

/** Commands the router understands. Anything else is ignored. */
export type RelayCommand = 'start' | 'available' | 'away';

/**
 * One inbound message, already stripped of transport specifics.
 */
export interface InboundEvent {
  /** Chat the message arrived in */
  conversationId: ConversationId;
  senderId: SenderId;
  /** First name of the sender, if the transport knows it */
  senderName?: string;
  messageId: MessageId;
  content: MessageContent;
  /** Set when the message is a reply to another message in the same chat */
  replyToMessageId?: MessageId;
  /** Set when the message is a bot command (`/start`, `/available`, ...) */
  command?: string;
  /** Epoch ms when the message reached the process, before any queueing */
  receivedAt?: number;
}

/** What happened to a user message */
export type UserOutcome =
  | 'ignored'
  | 'rate_limited'
  | 'greeted'
  | 'transition_available'
  | 'transition_away'
  | 'acknowledged'
  | 'busy_notice';

/** What happened to an operator message */
export type OperatorOutcome =
  | 'ignored'
  | 'origin_not_found'
  | 'delivered'
  | 'delivery_failed';

/** What happened to a command */
export type CommandOutcome =
  | 'greeted'
  | 'denied'
  | 'now_available'
  | 'now_away'
  | 'ignored';

export type DispatchOutcome = UserOutcome | OperatorOutcome | CommandOutcome;
