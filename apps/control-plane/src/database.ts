import Database from "better-sqlite3";
import { copyFileSync, existsSync, mkdirSync, rmSync } from "node:fs";
import os from "node:os";
import path from "node:path";

const SCHEMA_VERSION = 1;
const EXPECTED_TABLES = ["benchmark_runs", "evaluation_results", "performance_cache"];
let instance: Database.Database | undefined;

export function resolveDataDir(): string {
  return process.env.COSTWISE_DATA_DIR ?? path.join(os.homedir(), ".costwise");
}

export function resolveDbPath(): string {
  return process.env.COSTWISE_CONTROL_DB_PATH ?? path.join(resolveDataDir(), "control-plane.db");
}

export function getControlPlaneDatabase(): Database.Database {
  if (instance) return instance;
  const dbPath = resolveDbPath();
  if (dbPath !== ":memory:") mkdirSync(path.dirname(dbPath), { recursive: true });
  instance = openControlPlaneDatabase(dbPath);
  return instance;
}

/**
 * Opens a handle with the schema applied. Stores default to the shared handle from
 * `getControlPlaneDatabase`; tests pass their own `:memory:` handle.
 */
export function openControlPlaneDatabase(dbPath: string): Database.Database {
  const db = new Database(dbPath);
  if (dbPath !== ":memory:") {
    db.pragma("journal_mode = WAL");
    db.pragma("wal_autocheckpoint = 1000");
  }
  db.pragma("foreign_keys = ON");
  ensureSchema(db);
  return db;
}

/** Online copy through SQLite's backup API, so pages still in the WAL are included. */
export async function backupControlPlaneDatabase(db: Database.Database, targetPath: string): Promise<void> {
  mkdirSync(path.dirname(targetPath), { recursive: true });
  await db.backup(targetPath);
}

/**
 * Replaces the database file with a verified backup. Stale `-wal` and `-shm` files are
 * removed so SQLite does not replay them over the restored pages.
 */
export function restoreControlPlaneDatabase(backupPath: string, dbPath: string = resolveDbPath()): void {
  if (instance?.open) {
    throw new Error("Close the control-plane database before restoring.");
  }
  if (!existsSync(backupPath)) {
    throw new Error(`Backup file not found: ${backupPath}`);
  }
  const source = new Database(backupPath, { readonly: true, fileMustExist: true });
  try {
    verifySchemaHealth(source);
  } finally {
    source.close();
  }

  mkdirSync(path.dirname(dbPath), { recursive: true });
  for (const suffix of ["-wal", "-shm"]) {
    rmSync(`${dbPath}${suffix}`, { force: true });
  }
  copyFileSync(backupPath, dbPath);
}

function ensureSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      applied_at TEXT NOT NULL
    );
  `);

  const current = db.prepare("SELECT MAX(version) as version FROM schema_migrations").get() as { version: number | null };
  if ((current.version ?? 0) >= SCHEMA_VERSION) {
    verifySchemaHealth(db);
    return;
  }

  db.exec(`
    CREATE TABLE IF NOT EXISTS benchmark_runs (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      started_at TEXT NOT NULL,
      completed_at TEXT,
      status TEXT NOT NULL DEFAULT 'running',
      total_prompts INTEGER NOT NULL
    );

    CREATE TABLE IF NOT EXISTS evaluation_results (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      run_id INTEGER NOT NULL REFERENCES benchmark_runs(id),
      model_name TEXT NOT NULL,
      provider TEXT NOT NULL,
      prompt_id TEXT NOT NULL,
      prompt_text TEXT NOT NULL,
      prompt_category TEXT NOT NULL,
      turn_number INTEGER NOT NULL DEFAULT 1,
      response_text TEXT,
      quality_score REAL,
      judge_reasoning TEXT,
      input_tokens INTEGER NOT NULL,
      output_tokens INTEGER NOT NULL,
      total_cost REAL NOT NULL,
      time_to_first_token REAL,
      total_latency REAL NOT NULL,
      tokens_per_second REAL NOT NULL DEFAULT 0,
      metadata_json TEXT NOT NULL DEFAULT '{}',
      timestamp TEXT NOT NULL,
      error_message TEXT
    );

    CREATE TABLE IF NOT EXISTS performance_cache (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      model_name TEXT NOT NULL,
      category TEXT NOT NULL,
      avg_quality_score REAL NOT NULL,
      avg_cost REAL NOT NULL,
      avg_latency REAL NOT NULL,
      avg_tokens_per_second REAL NOT NULL,
      total_samples INTEGER NOT NULL,
      quality_per_dollar REAL NOT NULL,
      last_updated TEXT NOT NULL,
      UNIQUE (model_name, category)
    );

    CREATE INDEX IF NOT EXISTS idx_results_model_category ON evaluation_results(model_name, prompt_category);
    CREATE INDEX IF NOT EXISTS idx_results_run ON evaluation_results(run_id, id);
    CREATE INDEX IF NOT EXISTS idx_results_timestamp ON evaluation_results(timestamp DESC);
    CREATE INDEX IF NOT EXISTS idx_cache_cost ON performance_cache(avg_cost, model_name);
  `);

  verifySchemaHealth(db);

  db.prepare("INSERT OR IGNORE INTO schema_migrations (version, applied_at) VALUES (?, ?)").run(
    SCHEMA_VERSION,
    new Date().toISOString()
  );
}

function verifySchemaHealth(db: Database.Database): void {
  const health = db.pragma("integrity_check", { simple: true });
  if (typeof health === "string" && health.toLowerCase() !== "ok") {
    throw new Error(`SQLite integrity_check failed: ${health}`);
  }
  const rows = db
    .prepare("SELECT name FROM sqlite_master WHERE type = 'table'")
    .all() as Array<{ name: string }>;
  const names = new Set(rows.map((row) => row.name));
  for (const table of EXPECTED_TABLES) {
    if (!names.has(table)) {
      throw new Error(`Schema health check failed. Missing table: ${table}`);
    }
  }
}
