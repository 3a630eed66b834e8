/**
 * SQLite connection and schema for the result store
 *
 * Uses better-sqlite3 for synchronous operations
 */

import Database, { Database as DatabaseType } from 'better-sqlite3';
import path from 'path';
import fs from 'fs';
import { createLogger } from '@card-triage/shared';

const logger = createLogger('Database');

export type { DatabaseType };

/**
 * Open (or create) the database at `dbPath` and ensure the schema exists.
 * Pass ':memory:' for a throwaway database.
 */
export function openDatabase(dbPath: string): DatabaseType {
  if (dbPath !== ':memory:') {
    const dir = path.dirname(path.resolve(dbPath));
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db: DatabaseType = new Database(dbPath);

  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  initializeSchema(db);
  logger.info(`Opened ${dbPath}`);
  return db;
}

/**
 * Creates all tables if they don't exist
 */
export function initializeSchema(db: DatabaseType): void {
  // ============================================
  // ANALYSIS SESSIONS TABLE
  // ============================================
  db.exec(`
    CREATE TABLE IF NOT EXISTS analysis_sessions (
      id TEXT PRIMARY KEY,
      reference TEXT UNIQUE NOT NULL,
      board_id TEXT NOT NULL,
      list_id TEXT,
      reanalyse INTEGER NOT NULL DEFAULT 0,
      created_at TEXT NOT NULL
    )
  `);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_sessions_board_id ON analysis_sessions(board_id)`);

  // ============================================
  // TICKETS TABLE (latest card snapshot)
  // ============================================
  db.exec(`
    CREATE TABLE IF NOT EXISTS tickets (
      card_id TEXT PRIMARY KEY,
      board_id TEXT NOT NULL,
      board_name TEXT,
      list_id TEXT,
      card_data TEXT NOT NULL,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);

  // ============================================
  // TICKET ANALYSIS HISTORY TABLE (append-only)
  // ============================================
  db.exec(`
    CREATE TABLE IF NOT EXISTS ticket_analysis_history (
      id TEXT PRIMARY KEY,
      card_id TEXT NOT NULL,
      session_id TEXT NOT NULL,
      board_id TEXT NOT NULL,
      card_title TEXT NOT NULL,
      is_critical INTEGER NOT NULL,
      criticality_level TEXT NOT NULL CHECK (criticality_level IN ('HIGH', 'MEDIUM', 'LOW')),
      justification TEXT NOT NULL,
      success INTEGER NOT NULL,
      failure_reason TEXT,
      analyzed_at TEXT NOT NULL,
      created_at TEXT NOT NULL,
      UNIQUE (card_id, session_id),
      FOREIGN KEY (session_id) REFERENCES analysis_sessions(id)
    )
  `);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_history_card_id ON ticket_analysis_history(card_id)`);
  db.exec(`CREATE INDEX IF NOT EXISTS idx_history_board_id ON ticket_analysis_history(board_id)`);

  // ============================================
  // BOARD CONFIGS TABLE
  // ============================================
  db.exec(`
    CREATE TABLE IF NOT EXISTS board_configs (
      board_id TEXT PRIMARY KEY,
      board_name TEXT,
      source_list_id TEXT,
      source_list_name TEXT,
      target_list_id TEXT,
      target_list_name TEXT,
      move_high_cards INTEGER NOT NULL DEFAULT 0,
      add_labels INTEGER NOT NULL DEFAULT 1,
      add_comments INTEGER NOT NULL DEFAULT 1,
      created_at TEXT NOT NULL,
      updated_at TEXT NOT NULL
    )
  `);
}
