import fs from 'fs';
import path from 'path';
import Database from 'better-sqlite3';
import logger from './logger';

export type SqliteDatabase = Database.Database;

export const TERMINAL_STATUS_SQL = "('IMPORTED', 'SEEDING_COMPLETE', 'FAILED', 'CANCELLED')";

export function openDatabase(databasePath: string): SqliteDatabase {
  if (databasePath !== ':memory:') {
    const dir = path.dirname(databasePath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(databasePath);
  if (databasePath !== ':memory:') {
    db.pragma('journal_mode = WAL');
  }
  db.pragma('foreign_keys = ON');
  initializeDatabase(db);
  return db;
}

export function initializeDatabase(db: SqliteDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS pipeline_items (
      id TEXT PRIMARY KEY,
      identity TEXT,
      title TEXT NOT NULL,
      author TEXT NOT NULL,
      narrator TEXT,
      series TEXT,
      series_position TEXT,
      year INTEGER,
      status TEXT NOT NULL DEFAULT 'QUEUED',
      priority INTEGER NOT NULL DEFAULT 0,

      download_url TEXT,
      source_type TEXT,
      candidate_title TEXT,
      indexer TEXT,
      format TEXT,
      bitrate INTEGER,
      size INTEGER,
      seeders INTEGER,
      confidence REAL,
      manual_selection INTEGER NOT NULL DEFAULT 0,
      rejected_references TEXT NOT NULL DEFAULT '[]',

      client_name TEXT,
      client_handle TEXT,
      progress REAL NOT NULL DEFAULT 0,
      download_speed INTEGER NOT NULL DEFAULT 0,
      eta_seconds INTEGER,
      ratio REAL,
      seeding_seconds INTEGER,

      search_retries INTEGER NOT NULL DEFAULT 0,
      download_retries INTEGER NOT NULL DEFAULT 0,
      conversion_retries INTEGER NOT NULL DEFAULT 0,
      import_retries INTEGER NOT NULL DEFAULT 0,
      next_retry_at TEXT,
      pending_control TEXT,

      queued_at TEXT NOT NULL,
      search_started_at TEXT,
      found_at TEXT,
      download_started_at TEXT,
      download_completed_at TEXT,
      conversion_started_at TEXT,
      converted_at TEXT,
      import_started_at TEXT,
      imported_at TEXT,
      seeding_started_at TEXT,
      completed_at TEXT,

      download_path TEXT,
      converted_path TEXT,
      final_path TEXT,
      imported_size INTEGER,
      imported_format TEXT,
      imported_bitrate INTEGER,
      imported_channels INTEGER,
      checksum TEXT,

      last_error TEXT,
      version INTEGER NOT NULL DEFAULT 0,
      updated_at TEXT NOT NULL
    )
  `);

  db.exec(`
    CREATE UNIQUE INDEX IF NOT EXISTS idx_pipeline_items_active_identity
    ON pipeline_items(identity)
    WHERE identity IS NOT NULL AND status NOT IN ${TERMINAL_STATUS_SQL}
  `);
  db.exec('CREATE INDEX IF NOT EXISTS idx_pipeline_items_status ON pipeline_items(status, priority DESC, queued_at ASC)');

  db.exec(`
    CREATE TABLE IF NOT EXISTS pipeline_events (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      item_id TEXT NOT NULL,
      identity TEXT,
      event_type TEXT NOT NULL,
      old_state TEXT,
      new_state TEXT NOT NULL,
      progress REAL NOT NULL DEFAULT 0,
      message TEXT,
      created_at TEXT NOT NULL
    )
  `);
  db.exec('CREATE INDEX IF NOT EXISTS idx_pipeline_events_item ON pipeline_events(item_id, id)');

  logger.debug('[Database] Schema ready');
}
