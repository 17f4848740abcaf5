/**
 * In-process stand-ins shared by the tests: a recording transport,
 * a scripted LLM and a fully wired router over an in-memory database.
 */
import { openDatabase, type RelayDatabase } from '../src/db/index.js';
import { createPresenceStore } from '../src/core/presence.js';
import { createCorrelationMap } from '../src/core/correlation.js';
import { createRateLimiter } from '../src/core/rate-limiter.js';
import { createEngagementTracker } from '../src/core/engagement.js';
import { createResponder } from '../src/core/responder.js';
import { createEphemeralNotifier } from '../src/core/ephemeral.js';
import { createRelayRouter } from '../src/core/router.js';
import type { RelayTransport } from '../src/core/transport.js';
import type { LLMAdapter, LLMMessage } from '../src/llm/provider.js';
import type { InboundEvent, Notices } from '../src/types/index.js';

export const OPERATOR = 9000;

export const NOTICES: Notices = {
  typing: 'typing…',
  sent: 'sent',
  available: 'operator available',
  away: 'operator away, reply within 48 hours',
  busy: 'operator busy',
  operatorAvailable: 'you are available',
  operatorAway: 'you are away',
  originNotFound: 'user not found',
  deliveryFailed: 'failed to send',
  delivered: 'delivered',
};

export const GREETING_FALLBACK = 'Hi! Leave a message.';

export type TransportCall =
  | { op: 'forward'; destination: number; fromChat: number; fromMessage: number; messageId: number }
  | { op: 'sendText'; destination: number; text: string; messageId: number }
  | { op: 'sendMedia'; destination: number; fileId: string; caption?: string; messageId: number }
  | { op: 'delete'; destination: number; messageId: number }
  | { op: 'typing'; destination: number };

export type TransportOp = TransportCall['op'];

export interface FakeTransport {
  transport: RelayTransport;
  calls: TransportCall[];
  /** Return true to make a call reject */
  fail: (op: TransportOp, destination: number) => boolean;
}

export function createFakeTransport(firstId = 1000): FakeTransport {
  let nextId = firstId;
  const fake: FakeTransport = {
    calls: [],
    fail: () => false,
    transport: {
      async forward(destination, source) {
        if (fake.fail('forward', destination)) throw new Error('forward refused');
        const messageId = nextId++;
        fake.calls.push({
          op: 'forward',
          destination,
          fromChat: source.chatId,
          fromMessage: source.messageId,
          messageId,
        });
        return messageId;
      },

      async sendText(destination, text) {
        if (fake.fail('sendText', destination)) throw new Error('send refused');
        const messageId = nextId++;
        fake.calls.push({ op: 'sendText', destination, text, messageId });
        return messageId;
      },

      async sendMedia(destination, media, caption) {
        if (fake.fail('sendMedia', destination)) throw new Error('media refused');
        const messageId = nextId++;
        fake.calls.push(caption === undefined
          ? { op: 'sendMedia', destination, fileId: media.fileId, messageId }
          : { op: 'sendMedia', destination, fileId: media.fileId, caption, messageId });
        return messageId;
      },

      async delete(destination, messageId) {
        if (fake.fail('delete', destination)) throw new Error('delete refused');
        fake.calls.push({ op: 'delete', destination, messageId });
      },

      async showTypingIndicator(destination) {
        if (fake.fail('typing', destination)) throw new Error('typing refused');
        fake.calls.push({ op: 'typing', destination });
      },
    },
  };
  return fake;
}

export interface FakeLLM extends LLMAdapter {
  prompts: LLMMessage[][];
}

/** An LLM that answers with `reply`, or rejects when given an Error. */
export function createFakeLLM(reply: string | Error = 'Welcome!', healthy = true): FakeLLM {
  const prompts: LLMMessage[][] = [];
  return {
    name: 'fake/llm',
    prompts,
    async chat(messages) {
      prompts.push(messages);
      if (reply instanceof Error) throw reply;
      return { content: reply };
    },
    async health() {
      return healthy;
    },
  };
}

export function createTestHarness(options: {
  llm?: FakeLLM;
  minIntervalMs?: number;
  retention?: { maxAgeDays: number; maxRecords: number; pruneIntervalMinutes: number };
} = {}) {
  const db: RelayDatabase = openDatabase(':memory:');
  const fake = createFakeTransport();
  const llm = options.llm ?? createFakeLLM();
  const clock = { now: 1_700_000_000_000 };

  const presence = createPresenceStore(db);
  const correlations = createCorrelationMap(
    db,
    options.retention ?? { maxAgeDays: 30, maxRecords: 1000, pruneIntervalMinutes: 60 },
  );
  const notifier = createEphemeralNotifier(fake.transport);

  const router = createRelayRouter({
    operatorId: OPERATOR,
    presence,
    correlations,
    rateLimiter: createRateLimiter(db, options.minIntervalMs ?? 1200),
    engagement: createEngagementTracker(db),
    responder: createResponder({
      greeting: {
        vocabulary: ['hi', 'hello', 'hey', 'namaste'],
        fallback: GREETING_FALLBACK,
        defaultName: 'Friend',
      },
      llm,
      maxTextLength: 500,
    }),
    transport: fake.transport,
    notifier,
    notices: NOTICES,
    ephemeral: { typingMs: 0, acknowledgementMs: 0, confirmationMs: 0 },
    clock: () => clock.now,
  });

  return {
    db,
    fake,
    llm,
    clock,
    presence,
    correlations,
    notifier,
    router,
    /** Move the clock past the rate limiter */
    advance(ms = 5_000) {
      clock.now += ms;
    },
  };
}

let nextMessageId = 1;

export function userText(conversationId: number, text: string, extra: Partial<InboundEvent> = {}): InboundEvent {
  return {
    conversationId,
    senderId: conversationId,
    senderName: 'Ana',
    messageId: nextMessageId++,
    content: { kind: 'text', text },
    ...extra,
  };
}

export function operatorText(text: string, extra: Partial<InboundEvent> = {}): InboundEvent {
  return userText(OPERATOR, text, { senderName: 'Op', ...extra });
}

export function command(conversationId: number, name: string, senderId = conversationId): InboundEvent {
  return userText(conversationId, `/${name}`, { senderId, command: name });
}

/** Texts sent to `destination`, in order */
export function textsTo(calls: TransportCall[], destination: number): string[] {
  const texts: string[] = [];
  for (const call of calls) {
    if (call.op === 'sendText' && call.destination === destination) texts.push(call.text);
  }
  return texts;
}

export type ForwardCall = Extract<TransportCall, { op: 'forward' }>;

/** Forward calls, in order */
export function forwards(calls: TransportCall[]): ForwardCall[] {
  return calls.filter((call): call is ForwardCall => call.op === 'forward');
}
