import type Database from 'better-sqlite3';

const CREATE_BASELINES = `
CREATE TABLE IF NOT EXISTS baselines (
  table_name TEXT PRIMARY KEY,
  fingerprints TEXT NOT NULL DEFAULT '[]',
  row_count INTEGER NOT NULL DEFAULT 0,
  run_id TEXT,
  updated_at TEXT NOT NULL DEFAULT (datetime('now'))
)`;

const CREATE_CHANGE_LOGS = `
CREATE TABLE IF NOT EXISTS change_logs (
  table_name TEXT NOT NULL,
  run_id TEXT NOT NULL,
  records TEXT NOT NULL,
  record_count INTEGER NOT NULL,
  created_at TEXT NOT NULL DEFAULT (datetime('now')),
  PRIMARY KEY (table_name, run_id)
)`;

const CREATE_RUN_SUMMARIES = `
CREATE TABLE IF NOT EXISTS run_summaries (
  run_id TEXT PRIMARY KEY,
  run_seq INTEGER NOT NULL,
  status TEXT NOT NULL,
  started_at TEXT NOT NULL,
  finished_at TEXT,
  summary TEXT NOT NULL
)`;

const CREATE_INDEXES = [
  `CREATE INDEX IF NOT EXISTS idx_change_logs_run ON change_logs(run_id)`,
  `CREATE INDEX IF NOT EXISTS idx_run_summaries_seq ON run_summaries(run_seq)`,
];

export function createTables(db: Database.Database): void {
  db.exec(CREATE_BASELINES);
  db.exec(CREATE_CHANGE_LOGS);
  db.exec(CREATE_RUN_SUMMARIES);
  for (const idx of CREATE_INDEXES) {
    db.exec(idx);
  }
}
