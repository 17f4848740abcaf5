/**
 * SQLite schema for the relay.
 *
 * Three tables: conversations (per-user state), relay_records
 * (correlation map) and presence (a single row).
 * WAL mode so the health endpoint can read while handlers write.
 */

export const SCHEMA = `
  PRAGMA journal_mode = WAL;

  CREATE TABLE IF NOT EXISTS conversations (
    id                  INTEGER PRIMARY KEY,           -- Telegram chat id
    last_message_at     INTEGER,                       -- epoch ms, NULL until first accepted message
    first_contact_shown INTEGER NOT NULL DEFAULT 0,
    created_at          TEXT NOT NULL DEFAULT (datetime('now')),
    updated_at          TEXT NOT NULL DEFAULT (datetime('now'))
  );

  CREATE TABLE IF NOT EXISTS relay_records (
    relayed_message_id     INTEGER PRIMARY KEY,        -- id in the operator's chat
    origin_conversation_id INTEGER NOT NULL,
    created_at             INTEGER NOT NULL            -- epoch ms
  );

  -- Retention pruning walks records by age
  CREATE INDEX IF NOT EXISTS idx_relay_records_created
    ON relay_records(created_at DESC);

  CREATE TABLE IF NOT EXISTS presence (
    id                 INTEGER PRIMARY KEY CHECK (id = 1),
    available          INTEGER NOT NULL DEFAULT 0,
    pending_transition TEXT NOT NULL DEFAULT 'none'
      CHECK (pending_transition IN ('none', 'became_available', 'became_away')),
    updated_at         TEXT NOT NULL DEFAULT (datetime('now'))
  );

  INSERT OR IGNORE INTO presence (id) VALUES (1);
`;
