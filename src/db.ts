import Database from "better-sqlite3";
import fs from "fs";
import path from "path";

export type Db = Database.Database;

/**
 * Opens (creating if needed) the alert database. ":memory:" gives a
 * throwaway database for tests.
 */
export function openDatabase(dbPath: string): Db {
  if (dbPath !== ":memory:") {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true });
  }

  const db = new Database(dbPath);
  db.pragma("journal_mode = WAL");

  db.exec(`
CREATE TABLE IF NOT EXISTS alert_history (
  id           INTEGER PRIMARY KEY AUTOINCREMENT,
  alert_type   TEXT NOT NULL,    -- 'tracked', 'anomaly' or 'health'
  alert_key    TEXT NOT NULL,
  aircraft_hex TEXT,
  severity     TEXT NOT NULL,
  triggered_at INTEGER NOT NULL,
  payload      TEXT NOT NULL,    -- JSON as sent to the sinks
  delivered    INTEGER DEFAULT 0
);

CREATE INDEX IF NOT EXISTS idx_alert_history_triggered ON alert_history (triggered_at);
CREATE INDEX IF NOT EXISTS idx_alert_history_hex ON alert_history (aircraft_hex);

CREATE TABLE IF NOT EXISTS cooldowns (
  key         TEXT PRIMARY KEY,
  last_fired  INTEGER NOT NULL,
  cooldown_ms INTEGER NOT NULL
);
`);

  return db;
}
