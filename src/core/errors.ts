/**
 * Relay error taxonomy.
 *
 * Only two of these ever reach a human, and only the operator:
 * an unresolvable reply and a failed delivery. Everything on the
 * user-facing path is logged and swallowed, or masked by a fallback.
 */

import type { MessageId } from '../types/index.js';

export class RelayError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Operator replied to a message that is not a known relayed copy. */
export class CorrelationNotFoundError extends RelayError {
  constructor(readonly relayedMessageId: MessageId) {
    super(`No relay record for message ${relayedMessageId}`);
  }
}

/** The transport handed out the same relayed id twice. */
export class DuplicateRelayError extends RelayError {
  constructor(readonly relayedMessageId: MessageId) {
    super(`Relay record for message ${relayedMessageId} already exists`);
  }
}

/** Copying a user message into the operator's chat failed. */
export class TransportForwardError extends RelayError {}

/** Sending the operator's reply to a user failed. */
export class TransportDeliveryError extends RelayError {}

/** The greeting generator failed or returned nothing. */
export class TextGenerationError extends RelayError {}

/** Configuration is missing or malformed. Startup only. */
export class ConfigError extends RelayError {}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
