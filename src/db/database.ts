import Database from "better-sqlite3";
import { mkdirSync } from "fs";
import { dirname } from "path";

const SCHEMA = `
CREATE TABLE IF NOT EXISTS risk_events (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  company TEXT NOT NULL,
  category TEXT NOT NULL DEFAULT 'supply_chain',
  severity TEXT NOT NULL CHECK (severity IN ('RED', 'YELLOW', 'GREEN')),
  headline TEXT NOT NULL,
  fingerprint TEXT NOT NULL,
  source_url TEXT NOT NULL DEFAULT '',
  market_impact REAL,
  weather_correlation TEXT,
  rationale TEXT NOT NULL,
  impact_estimate TEXT NOT NULL,
  mitigations TEXT NOT NULL,
  confidence REAL NOT NULL CHECK (confidence BETWEEN 0 AND 100),
  created_at TEXT NOT NULL,
  notified INTEGER NOT NULL DEFAULT 0
);
CREATE INDEX IF NOT EXISTS idx_risk_events_fingerprint ON risk_events (fingerprint, created_at);
CREATE INDEX IF NOT EXISTS idx_risk_events_company ON risk_events (company, created_at);

-- one live claim per fingerprint; a claim older than the dedup window may be taken over
CREATE TABLE IF NOT EXISTS risk_fingerprints (
  fingerprint TEXT PRIMARY KEY,
  event_id INTEGER,
  claimed_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS alert_history (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  risk_event_id INTEGER NOT NULL REFERENCES risk_events (id),
  channel TEXT NOT NULL,
  status TEXT NOT NULL CHECK (status IN ('sent', 'failed')),
  sent_at TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS graph_edges (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  source_node TEXT NOT NULL,
  target_node TEXT NOT NULL,
  relation TEXT NOT NULL,
  company TEXT NOT NULL,
  confidence REAL NOT NULL DEFAULT 1.0,
  created_at TEXT NOT NULL,
  UNIQUE (source_node, target_node, relation, company)
);
CREATE INDEX IF NOT EXISTS idx_graph_edges_company ON graph_edges (company);
`;

/** Open (creating if needed) the SQLite file and ensure the schema. */
export function openDatabase(path: string): Database.Database {
  if (path !== ":memory:") mkdirSync(dirname(path), { recursive: true });
  const db = new Database(path);
  if (path !== ":memory:") db.pragma("journal_mode = WAL");
  db.pragma("foreign_keys = ON");
  db.exec(SCHEMA);
  return db;
}
