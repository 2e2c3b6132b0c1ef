/**
 * SQLite schema for the ledger.
 *
 * Contributions and quantity changes live in separate tables but draw ids
 * from ledger_sequence, so an id identifies one event across both.
 * AUTOINCREMENT keeps ids from being reused after deletes.
 */

import type { Connection } from "@stockpile/storage";

export const LEDGER_SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS ledger_sequence (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  kind TEXT NOT NULL CHECK (kind IN ('contribution', 'quantity_change'))
);

CREATE TABLE IF NOT EXISTS contributions (
  id INTEGER PRIMARY KEY,
  guild_id TEXT NOT NULL,
  actor_id TEXT NOT NULL,
  category TEXT NOT NULL,
  item_name TEXT NOT NULL,
  quantity INTEGER NOT NULL CHECK (quantity >= 0),
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_contributions_item
  ON contributions (guild_id, category, item_name, created_at, id);

CREATE TABLE IF NOT EXISTS quantity_changes (
  id INTEGER PRIMARY KEY,
  guild_id TEXT NOT NULL,
  item_name TEXT NOT NULL,
  category TEXT NOT NULL,
  old_quantity INTEGER NOT NULL CHECK (old_quantity >= 0),
  new_quantity INTEGER NOT NULL CHECK (new_quantity >= 0),
  reason TEXT NOT NULL,
  notes TEXT,
  changed_at TEXT NOT NULL,
  changed_by_id TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_quantity_changes_item
  ON quantity_changes (guild_id, category, item_name, changed_at, id);

CREATE TABLE IF NOT EXISTS ledger_archives (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  guild_id TEXT NOT NULL,
  archive_name TEXT NOT NULL,
  description TEXT NOT NULL,
  notes TEXT,
  archived_data TEXT NOT NULL,
  data_hash TEXT NOT NULL,
  total_contributions INTEGER NOT NULL,
  total_quantity_changes INTEGER NOT NULL,
  created_at TEXT NOT NULL,
  created_by_id TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_ledger_archives_guild
  ON ledger_archives (guild_id, created_at);
`;

/**
 * Create the ledger tables if missing. Pass as StorageHandle `initialize`.
 */
export function applyLedgerSchema(db: Connection): void {
  db.exec(LEDGER_SCHEMA_SQL);
}
