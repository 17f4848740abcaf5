/**
 * What the relay needs from a chat transport.
 *
 * Destinations are chat ids. Every call may reject; callers decide
 * whether a failure is swallowed, logged or reported to the operator.
 */

import type { ConversationId, MediaRef, MessageId } from '../types/index.js';

export interface MessageSource {
  chatId: ConversationId;
  messageId: MessageId;
}

export interface RelayTransport {
  /** Copy a message into `destination`; resolves to the copy's id there. */
  forward(destination: ConversationId, source: MessageSource): Promise<MessageId>;
  sendText(destination: ConversationId, text: string): Promise<MessageId>;
  sendMedia(destination: ConversationId, media: MediaRef, caption?: string): Promise<MessageId>;
  delete(destination: ConversationId, messageId: MessageId): Promise<void>;
  /** Best-effort "typing…" status; failures can be ignored. */
  showTypingIndicator(destination: ConversationId): Promise<void>;
}
