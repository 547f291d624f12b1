import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";

const ensureDir = (filePath: string) => {
  const dir = path.dirname(filePath);
  if (!fs.existsSync(dir)) {
    fs.mkdirSync(dir, { recursive: true });
  }
};

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS predictions (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    request_id TEXT UNIQUE,
    image_ref TEXT NOT NULL,
    disease_name TEXT NOT NULL,
    confidence REAL NOT NULL,
    final_confidence REAL,
    severity_level TEXT NOT NULL,
    description TEXT NOT NULL,
    treatment_suggestion TEXT NOT NULL,
    warnings_json TEXT NOT NULL DEFAULT '[]',
    model_version TEXT NOT NULL,
    processing_time_ms INTEGER NOT NULL,
    created_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS processing_requests (
    request_id TEXT PRIMARY KEY,
    image_ref TEXT NOT NULL,
    symptom_ids_json TEXT NOT NULL DEFAULT '[]',
    status TEXT NOT NULL CHECK (status IN ('Processing', 'Success', 'Failed')),
    prediction_id INTEGER REFERENCES predictions(id),
    error_message TEXT,
    requested_at TEXT NOT NULL,
    updated_at TEXT NOT NULL
  );

  CREATE TABLE IF NOT EXISTS prediction_logs (
    id INTEGER PRIMARY KEY AUTOINCREMENT,
    request_id TEXT NOT NULL,
    image_ref TEXT NOT NULL,
    status TEXT NOT NULL,
    message TEXT,
    created_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_prediction_logs_request ON prediction_logs(request_id, id);
  CREATE INDEX IF NOT EXISTS idx_prediction_logs_image ON prediction_logs(image_ref, id);
`;

/** Opens (or creates) the store and applies the schema. Pass ":memory:" for a throwaway database. */
export const openDatabase = (sqlitePath: string): Database.Database => {
  const inMemory = sqlitePath === ":memory:";
  const target = inMemory ? sqlitePath : path.resolve(process.cwd(), sqlitePath);
  if (!inMemory) {
    ensureDir(target);
  }

  const db = new Database(target);
  if (!inMemory) {
    db.pragma("journal_mode = WAL");
  }
  db.pragma("busy_timeout = 5000");
  db.pragma("synchronous = NORMAL");
  db.pragma("foreign_keys = ON");

  db.exec(SCHEMA);
  return db;
};
