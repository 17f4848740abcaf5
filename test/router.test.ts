import test from 'node:test';
import assert from 'node:assert/strict';

import type { DispatchOutcome } from '../src/types/index.js';
import { createLanes } from '../src/core/lanes.js';
import {
  GREETING_FALLBACK,
  NOTICES,
  OPERATOR,
  command,
  createFakeLLM,
  createTestHarness,
  forwards,
  operatorText,
  textsTo,
  userText,
} from './helpers.js';

const USER = 42;

// ── User path ──────────────────────────────────────────────

test('first message while away gets the busy notice, later ones a quick acknowledgement', async () => {
  const h = createTestHarness();

  const first = userText(USER, 'I need help with my order');
  assert.equal(await h.router.dispatch(first), 'busy_notice');
  assert.deepEqual(h.fake.calls, [
    { op: 'forward', destination: OPERATOR, fromChat: USER, fromMessage: first.messageId, messageId: 1000 },
    { op: 'typing', destination: USER },
    { op: 'sendText', destination: USER, text: NOTICES.typing, messageId: 1001 },
    { op: 'delete', destination: USER, messageId: 1001 },
    { op: 'sendText', destination: USER, text: NOTICES.busy, messageId: 1002 },
  ]);

  h.advance();
  assert.equal(await h.router.dispatch(userText(USER, 'order number is 17')), 'acknowledged');
  await h.notifier.drain();

  assert.deepEqual(textsTo(h.fake.calls, USER), [NOTICES.typing, NOTICES.busy, NOTICES.typing, NOTICES.sent]);
  assert.deepEqual(h.fake.calls.slice(-2), [
    { op: 'sendText', destination: USER, text: NOTICES.sent, messageId: 1005 },
    { op: 'delete', destination: USER, messageId: 1005 },
  ]);
  assert.equal(h.correlations.size(), 2);
});

test('every relayed copy resolves to its origin', async () => {
  const h = createTestHarness();

  await h.router.dispatch(userText(1, 'question one'));
  await h.router.dispatch(userText(2, 'question two'));

  for (const call of forwards(h.fake.calls)) {
    assert.equal(h.correlations.resolve(call.messageId), call.fromChat);
  }
});

test('a flood is dropped without any output', async () => {
  const h = createTestHarness();

  assert.equal(await h.router.dispatch(userText(USER, 'first')), 'busy_notice');
  const before = h.fake.calls.length;

  h.advance(500);
  assert.equal(await h.router.dispatch(userText(USER, 'second')), 'rate_limited');

  assert.equal(h.fake.calls.length, before);
  assert.equal(h.correlations.size(), 1);
});

test('a queued message is rate limited by its arrival time, not when its lane reaches it', async () => {
  const h = createTestHarness();
  const lanes = createLanes();
  const arrived = h.clock.now;

  const first = userText(USER, 'first', { receivedAt: arrived });
  const second = userText(USER, 'second', { receivedAt: arrived + 500 });
  const outcomes: DispatchOutcome[] = [];

  await Promise.all([
    lanes.run(USER, async () => {
      outcomes.push(await h.router.dispatch(first));
      // Handling the first message outlasts the interval
      h.advance(5_000);
    }),
    lanes.run(USER, async () => {
      outcomes.push(await h.router.dispatch(second));
    }),
  ]);

  assert.deepEqual(outcomes, ['busy_notice', 'rate_limited']);
  assert.equal(forwards(h.fake.calls).length, 1);
});

test('a greeting gets a generated welcome and is not relayed', async () => {
  const h = createTestHarness({ llm: createFakeLLM('Welcome, Ana!') });

  assert.equal(await h.router.dispatch(userText(USER, 'Hello!')), 'greeted');

  assert.deepEqual(h.fake.calls, [
    { op: 'sendText', destination: USER, text: 'Welcome, Ana!', messageId: 1000 },
  ]);
  assert.equal(h.correlations.size(), 0);
  assert.match(h.llm.prompts[0]?.[0]?.content ?? '', /Include the user's name: Ana/);
});

test('a greeting still counts against the rate limit', async () => {
  const h = createTestHarness();

  assert.equal(await h.router.dispatch(userText(USER, 'hi')), 'greeted');
  assert.equal(await h.router.dispatch(userText(USER, 'hello world')), 'rate_limited');
});

test('a greeting falls back to the configured line when the LLM is down', async (t) => {
  t.mock.method(console, 'warn', () => {});
  const h = createTestHarness({ llm: createFakeLLM(new Error('connection refused')) });

  assert.equal(await h.router.dispatch(userText(USER, 'hey')), 'greeted');
  assert.deepEqual(textsTo(h.fake.calls, USER), [GREETING_FALLBACK]);
});

test('more than a greeting word is relayed', async () => {
  const h = createTestHarness();

  assert.equal(await h.router.dispatch(userText(USER, 'hello world')), 'busy_notice');
  assert.equal(forwards(h.fake.calls).length, 1);
});

test('photos are relayed like text', async () => {
  const h = createTestHarness();
  const photo = userText(USER, '', { content: { kind: 'photo', fileId: 'file-1', caption: 'receipt' } });

  assert.equal(await h.router.dispatch(photo), 'busy_notice');
  assert.equal(h.correlations.resolve(1000), USER);
});

test('a failed forward still answers the user', async (t) => {
  t.mock.method(console, 'error', () => {});
  const h = createTestHarness();
  h.fake.fail = op => op === 'forward';

  assert.equal(await h.router.dispatch(userText(USER, 'anyone there?')), 'busy_notice');
  assert.equal(h.correlations.size(), 0);
  assert.deepEqual(textsTo(h.fake.calls, USER), [NOTICES.typing, NOTICES.busy]);
});

test('a failed typing indicator does not interrupt the flow', async (t) => {
  t.mock.method(console, 'warn', () => {});
  const h = createTestHarness();
  h.fake.fail = op => op === 'typing';

  assert.equal(await h.router.dispatch(userText(USER, 'anyone there?')), 'busy_notice');
  assert.equal(h.correlations.size(), 1);
});

test('the operator never takes the user path', async () => {
  const h = createTestHarness();

  assert.equal(await h.router.handleUserMessage(operatorText('note to self')), 'ignored');
  assert.deepEqual(h.fake.calls, []);
});

// ── Presence transitions ───────────────────────────────────

test('after /away exactly one of three concurrent users sees the transition notice', async (t) => {
  t.mock.method(console, 'log', () => {});
  const h = createTestHarness();

  assert.equal(await h.router.dispatch(command(OPERATOR, 'away')), 'now_away');
  assert.deepEqual(textsTo(h.fake.calls, OPERATOR), [NOTICES.operatorAway]);

  const outcomes: DispatchOutcome[] = await Promise.all(
    [101, 102, 103].map(id => h.router.dispatch(userText(id, 'hello world'))),
  );

  assert.deepEqual([...outcomes].sort(), ['busy_notice', 'busy_notice', 'transition_away']);
  assert.equal(h.correlations.size(), 3);

  const relayed = forwards(h.fake.calls);
  assert.deepEqual(relayed.map(call => call.fromChat).sort(), [101, 102, 103]);
  for (const call of relayed) {
    assert.equal(h.correlations.resolve(call.messageId), call.fromChat);
  }
});

test('after /available the next user hears about it and everyone else is acknowledged', async (t) => {
  t.mock.method(console, 'log', () => {});
  const h = createTestHarness();

  assert.equal(await h.router.dispatch(command(OPERATOR, 'available')), 'now_available');
  assert.deepEqual(textsTo(h.fake.calls, OPERATOR), [NOTICES.operatorAvailable]);

  assert.equal(await h.router.dispatch(userText(1, 'question')), 'transition_available');
  assert.equal(await h.router.dispatch(userText(2, 'question')), 'acknowledged');
  await h.notifier.drain();

  assert.deepEqual(textsTo(h.fake.calls, 1), [NOTICES.typing, NOTICES.available]);
  assert.deepEqual(textsTo(h.fake.calls, 2), [NOTICES.typing, NOTICES.sent]);
});

test('the transition consumer still gets the busy notice on their next message', async (t) => {
  t.mock.method(console, 'log', () => {});
  const h = createTestHarness();

  await h.router.dispatch(command(OPERATOR, 'away'));
  assert.equal(await h.router.dispatch(userText(USER, 'question')), 'transition_away');

  h.advance();
  assert.equal(await h.router.dispatch(userText(USER, 'follow-up')), 'busy_notice');
});

// ── Commands ───────────────────────────────────────────────

test('presence commands from anyone but the operator are silently denied', async () => {
  const h = createTestHarness();

  assert.equal(await h.router.dispatch(command(USER, 'available')), 'denied');
  assert.equal(await h.router.dispatch(command(USER, 'away')), 'denied');

  assert.deepEqual(h.presence.snapshot(), { available: false, pendingTransition: 'none' });
  assert.deepEqual(h.fake.calls, []);
});

test('/start greets in English and skips the rate limiter', async () => {
  const h = createTestHarness();

  assert.equal(await h.router.dispatch(command(USER, 'start')), 'greeted');
  assert.equal(await h.router.dispatch(command(USER, 'start')), 'greeted');

  assert.deepEqual(textsTo(h.fake.calls, USER), ['Welcome!', 'Welcome!']);
  assert.match(h.llm.prompts[0]?.[0]?.content ?? '', /Language: english/);
});

test('unknown commands are ignored', async () => {
  const h = createTestHarness();

  assert.equal(await h.router.dispatch(command(USER, 'help')), 'ignored');
  assert.deepEqual(h.fake.calls, []);
});

// ── Operator path ──────────────────────────────────────────

test('an operator reply reaches the user who asked and is confirmed', async () => {
  const h = createTestHarness();
  await h.router.dispatch(userText(USER, 'where is my parcel?'));
  const [relayed] = forwards(h.fake.calls);
  assert.ok(relayed);

  const answer = operatorText('It ships tomorrow.', { replyToMessageId: relayed.messageId });
  assert.equal(await h.router.dispatch(answer), 'delivered');
  await h.notifier.drain();

  assert.deepEqual(h.fake.calls.slice(-3), [
    { op: 'sendText', destination: USER, text: 'It ships tomorrow.', messageId: 1003 },
    { op: 'sendText', destination: OPERATOR, text: NOTICES.delivered, messageId: 1004 },
    { op: 'delete', destination: OPERATOR, messageId: 1004 },
  ]);
});

test('an operator photo reply keeps its caption', async () => {
  const h = createTestHarness();
  await h.router.dispatch(userText(USER, 'what does it look like?'));
  const [relayed] = forwards(h.fake.calls);
  assert.ok(relayed);

  const answer = operatorText('', {
    content: { kind: 'photo', fileId: 'photo-7', caption: 'like this' },
    replyToMessageId: relayed.messageId,
  });
  assert.equal(await h.router.dispatch(answer), 'delivered');
  await h.notifier.drain();

  assert.deepEqual(h.fake.calls.slice(-3), [
    { op: 'sendMedia', destination: USER, fileId: 'photo-7', caption: 'like this', messageId: 1003 },
    { op: 'sendText', destination: OPERATOR, text: NOTICES.delivered, messageId: 1004 },
    { op: 'delete', destination: OPERATOR, messageId: 1004 },
  ]);
});

test('a reply to an unknown message tells the operator the user was not found', async (t) => {
  t.mock.method(console, 'warn', () => {});
  const h = createTestHarness();

  assert.equal(await h.router.dispatch(operatorText('hello?', { replyToMessageId: 777 })), 'origin_not_found');
  assert.deepEqual(h.fake.calls, [
    { op: 'sendText', destination: OPERATOR, text: NOTICES.originNotFound, messageId: 1000 },
  ]);
});

test('a reply to a pruned record is treated as unknown', async (t) => {
  t.mock.method(console, 'warn', () => {});
  const h = createTestHarness({ retention: { maxAgeDays: 0, maxRecords: 1, pruneIntervalMinutes: 60 } });

  await h.router.dispatch(userText(1, 'old question'));
  h.advance();
  await h.router.dispatch(userText(2, 'new question'));
  const [oldest] = forwards(h.fake.calls);
  assert.ok(oldest);

  assert.equal(h.correlations.prune(h.clock.now), 1);
  assert.equal(
    await h.router.dispatch(operatorText('answer', { replyToMessageId: oldest.messageId })),
    'origin_not_found',
  );
});

test('a failed delivery is reported to the operator', async (t) => {
  t.mock.method(console, 'error', () => {});
  const h = createTestHarness();
  await h.router.dispatch(userText(USER, 'question'));
  const [relayed] = forwards(h.fake.calls);
  assert.ok(relayed);

  h.fake.fail = (op, destination) => op === 'sendText' && destination === USER;
  const answer = operatorText('answer', { replyToMessageId: relayed.messageId });

  assert.equal(await h.router.dispatch(answer), 'delivery_failed');
  assert.deepEqual(textsTo(h.fake.calls, OPERATOR), [NOTICES.deliveryFailed]);
});

test('operator messages that are not replies are ignored', async () => {
  const h = createTestHarness();

  assert.equal(await h.router.dispatch(operatorText('just thinking out loud')), 'ignored');
  assert.deepEqual(h.fake.calls, []);
});
