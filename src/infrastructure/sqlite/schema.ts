export const PRAGMA_SQL = `
PRAGMA journal_mode = WAL;
PRAGMA busy_timeout = 5000;
PRAGMA synchronous = NORMAL;
`;

export const SCHEMA_VERSION = '1';

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS schema_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

-- 單列表：id 固定為 1
CREATE TABLE IF NOT EXISTS checkpoint (
  id INTEGER PRIMARY KEY CHECK(id = 1),
  created_at TEXT NOT NULL,
  document_id TEXT,
  updated_at INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS sync_runs (
  run_id INTEGER PRIMARY KEY,
  mode TEXT NOT NULL CHECK(mode IN ('incremental','backfill','document')),
  status TEXT NOT NULL CHECK(status IN ('completed','cancelled','aborted','locked')),
  started_at TEXT NOT NULL,
  finished_at TEXT NOT NULL,
  counts_json TEXT NOT NULL,
  errors_json TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_sync_runs_started ON sync_runs(started_at);
`;
