/**
 * RelayTransport over the Telegram Bot API (grammy).
 */

import type { Api } from 'grammy';
import type { RelayTransport } from '../core/transport.js';

export function createTelegramTransport(api: Api): RelayTransport {
  return {
    async forward(destination, source) {
      const copy = await api.forwardMessage(destination, source.chatId, source.messageId);
      return copy.message_id;
    },

    async sendText(destination, text) {
      const sent = await api.sendMessage(destination, text);
      return sent.message_id;
    },

    async sendMedia(destination, media, caption) {
      const sent = await api.sendPhoto(destination, media.fileId, caption ? { caption } : {});
      return sent.message_id;
    },

    async delete(destination, messageId) {
      await api.deleteMessage(destination, messageId);
    },

    async showTypingIndicator(destination) {
      await api.sendChatAction(destination, 'typing');
    },
  };
}
