import Database from 'better-sqlite3';
import { SCHEMA } from './schema.js';
import type {
  Conversation,
  ConversationId,
  MessageId,
  PresenceState,
  RelayRecord,
  Transition,
} from '../types/index.js';

export type RelayDatabase = Database.Database;

interface ConversationRow {
  id: number;
  last_message_at: number | null;
  first_contact_shown: number;
  created_at: string;
  updated_at: string;
}

interface RelayRecordRow {
  relayed_message_id: number;
  origin_conversation_id: number;
  created_at: number;
}

interface PresenceRow {
  available: number;
  pending_transition: string;
}

/**
 * Open (or create) the relay database. Pass ':memory:' for a throwaway one.
 */
export function openDatabase(path: string = 'relay.db'): RelayDatabase {
  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.exec(SCHEMA);
  return db;
}

// ── Conversations ──────────────────────────────────────────

export function getConversation(db: RelayDatabase, id: ConversationId): Conversation | null {
  const row = db.prepare<[number], ConversationRow>(
    'SELECT * FROM conversations WHERE id = ?'
  ).get(id);

  return row ? rowToConversation(row) : null;
}

/** Returns the conversation, creating it on first contact. */
export function ensureConversation(db: RelayDatabase, id: ConversationId): Conversation {
  db.prepare<[number]>(
    'INSERT OR IGNORE INTO conversations (id) VALUES (?)'
  ).run(id);

  const conversation = getConversation(db, id);
  if (!conversation) throw new Error(`Conversation ${id} vanished after insert`);
  return conversation;
}

/**
 * Advance last_message_at. The WHERE clause keeps the column monotonic
 * even if the caller's clock goes backwards.
 */
export function touchConversation(db: RelayDatabase, id: ConversationId, at: number): boolean {
  const result = db.prepare<[number, number, number]>(`
    UPDATE conversations
    SET last_message_at = ?, updated_at = datetime('now')
    WHERE id = ? AND (last_message_at IS NULL OR last_message_at <= ?)
  `).run(at, id, at);

  return result.changes === 1;
}

/** Flip first_contact_shown; true only for the call that flipped it. */
export function markFirstContactShown(db: RelayDatabase, id: ConversationId): boolean {
  const result = db.prepare<[number]>(`
    UPDATE conversations
    SET first_contact_shown = 1, updated_at = datetime('now')
    WHERE id = ? AND first_contact_shown = 0
  `).run(id);

  return result.changes === 1;
}

// ── Relay records ──────────────────────────────────────────

/** Insert a record; false when the relayed id is already taken. */
export function insertRelayRecord(db: RelayDatabase, record: RelayRecord): boolean {
  const result = db.prepare<[number, number, number]>(`
    INSERT OR IGNORE INTO relay_records (relayed_message_id, origin_conversation_id, created_at)
    VALUES (?, ?, ?)
  `).run(record.relayedMessageId, record.originConversationId, record.createdAt);

  return result.changes === 1;
}

export function getRelayRecord(db: RelayDatabase, relayedMessageId: MessageId): RelayRecord | null {
  const row = db.prepare<[number], RelayRecordRow>(
    'SELECT * FROM relay_records WHERE relayed_message_id = ?'
  ).get(relayedMessageId);

  return row ? rowToRelayRecord(row) : null;
}

export function countRelayRecords(db: RelayDatabase): number {
  const row = db.prepare<[], { total: number }>(
    'SELECT COUNT(*) AS total FROM relay_records'
  ).get();
  return row?.total ?? 0;
}

export function deleteRelayRecordsBefore(db: RelayDatabase, cutoff: number): number {
  return db.prepare<[number]>(
    'DELETE FROM relay_records WHERE created_at < ?'
  ).run(cutoff).changes;
}

/** Keep the newest `keep` records, delete the rest. */
export function deleteRelayRecordsBeyond(db: RelayDatabase, keep: number): number {
  return db.prepare<[number]>(`
    DELETE FROM relay_records
    WHERE relayed_message_id NOT IN (
      SELECT relayed_message_id FROM relay_records
      ORDER BY created_at DESC, relayed_message_id DESC
      LIMIT ?
    )
  `).run(keep).changes;
}

// ── Presence ───────────────────────────────────────────────

export function getPresence(db: RelayDatabase): PresenceState {
  const row = db.prepare<[], PresenceRow>(
    'SELECT available, pending_transition FROM presence WHERE id = 1'
  ).get();

  if (!row) return { available: false, pendingTransition: 'none' };
  return rowToPresence(row);
}

export function setPresence(db: RelayDatabase, state: PresenceState): void {
  db.prepare<[number, string]>(`
    UPDATE presence
    SET available = ?, pending_transition = ?, updated_at = datetime('now')
    WHERE id = 1
  `).run(state.available ? 1 : 0, state.pendingTransition);
}

/** Read and clear the pending transition in one transaction. */
export function takePendingTransition(db: RelayDatabase): Transition {
  const take = db.transaction((): Transition => {
    const { pendingTransition } = getPresence(db);
    if (pendingTransition !== 'none') {
      db.prepare(
        "UPDATE presence SET pending_transition = 'none', updated_at = datetime('now') WHERE id = 1"
      ).run();
    }
    return pendingTransition;
  });

  return take.immediate();
}

// ── Row Mappers ────────────────────────────────────────────

function rowToConversation(row: ConversationRow): Conversation {
  return {
    id: row.id,
    lastMessageAt: row.last_message_at,
    firstContactShown: !!row.first_contact_shown,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function rowToRelayRecord(row: RelayRecordRow): RelayRecord {
  return {
    relayedMessageId: row.relayed_message_id,
    originConversationId: row.origin_conversation_id,
    createdAt: row.created_at,
  };
}

function rowToPresence(row: PresenceRow): PresenceState {
  return {
    available: !!row.available,
    pendingTransition: toTransition(row.pending_transition),
  };
}

function toTransition(value: string): Transition {
  switch (value) {
    case 'became_available':
    case 'became_away':
      return value;
    default:
      return 'none';
  }
}
