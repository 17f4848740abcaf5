/**
 * Telegram message → InboundEvent.
 *
 * Only the fields the router looks at are read, so anything shaped
 * like a Telegram message (grammy's `ctx.message`, a test literal)
 * can be mapped.
 */

import type { InboundEvent, MessageContent } from '../types/index.js';

export interface TelegramMessageLike {
  message_id: number;
  chat: { id: number };
  from?: { id: number; first_name: string };
  text?: string;
  caption?: string;
  photo?: ReadonlyArray<{ file_id: string }>;
  reply_to_message?: { message_id: number };
}

/**
 * `/start@relay_bot extra` → `start`. Undefined when the text is not a command.
 */
export function parseCommand(text: string): string | undefined {
  if (!text.startsWith('/')) return undefined;

  const [commandToken] = text.trim().split(/\s+/);
  const name = (commandToken ?? '').slice(1).split('@')[0]?.toLowerCase();
  return name || undefined;
}

function extractContent(msg: TelegramMessageLike): MessageContent | null {
  if (msg.text !== undefined) {
    return { kind: 'text', text: msg.text };
  }

  // Telegram lists photo sizes smallest first
  const largest = msg.photo?.[msg.photo.length - 1];
  if (largest) {
    return msg.caption !== undefined
      ? { kind: 'photo', fileId: largest.file_id, caption: msg.caption }
      : { kind: 'photo', fileId: largest.file_id };
  }

  return null;
}

/**
 * Returns null for messages the relay does not handle (stickers, service messages, ...).
 * `receivedAt` stamps the arrival time used by the rate limiter.
 */
export function toInboundEvent(msg: TelegramMessageLike, receivedAt?: number): InboundEvent | null {
  if (!msg.from) return null;

  const content = extractContent(msg);
  if (!content) return null;

  const event: InboundEvent = {
    conversationId: msg.chat.id,
    senderId: msg.from.id,
    senderName: msg.from.first_name,
    messageId: msg.message_id,
    content,
  };

  if (receivedAt !== undefined) event.receivedAt = receivedAt;
  if (msg.reply_to_message) event.replyToMessageId = msg.reply_to_message.message_id;

  if (content.kind === 'text') {
    const command = parseCommand(content.text);
    if (command) event.command = command;
  }

  return event;
}
