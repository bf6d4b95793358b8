import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import type { LoggerPort } from '../../../application/ports/LoggerPort.js';

export type SqliteConnection = Database.Database;

export function openDatabase(path: string, logger?: LoggerPort): SqliteConnection {
  if (path !== ':memory:') {
    const dir = dirname(path);
    if (!existsSync(dir)) {
      mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(path);
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');
  createTables(db);
  logger?.info('database_initialized', { path });
  return db;
}

function createTables(db: SqliteConnection): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS transactions (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id TEXT NOT NULL,
      date TEXT NOT NULL,
      type TEXT NOT NULL CHECK(type IN ('income', 'expense', 'transfer')),
      category TEXT NOT NULL,
      description TEXT NOT NULL DEFAULT '',
      amount REAL NOT NULL,
      account TEXT NOT NULL,
      transfer_group TEXT,
      dedupe_hash TEXT NOT NULL,
      created_at INTEGER NOT NULL
    )
  `);

  db.exec(`
    CREATE TABLE IF NOT EXISTS savings_goals (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id TEXT NOT NULL,
      name TEXT NOT NULL,
      target_amount REAL NOT NULL,
      current_amount REAL NOT NULL DEFAULT 0,
      description TEXT,
      target_date TEXT,
      created_at INTEGER NOT NULL
    )
  `);

  // One active conversation per session.
  db.exec(`
    CREATE TABLE IF NOT EXISTS conversation_states (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      user_id TEXT NOT NULL,
      session_id TEXT NOT NULL UNIQUE,
      intent TEXT NOT NULL,
      state TEXT NOT NULL,
      partial_data TEXT NOT NULL DEFAULT '{}',
      expires_at INTEGER NOT NULL,
      updated_at INTEGER NOT NULL
    )
  `);

  db.exec(`
    CREATE INDEX IF NOT EXISTS idx_transactions_user_account ON transactions(user_id, account);
    CREATE INDEX IF NOT EXISTS idx_transactions_dedupe ON transactions(user_id, dedupe_hash, created_at);
    CREATE INDEX IF NOT EXISTS idx_transactions_transfer_group ON transactions(transfer_group);
    CREATE INDEX IF NOT EXISTS idx_savings_goals_user ON savings_goals(user_id);
    CREATE INDEX IF NOT EXISTS idx_conversation_states_expiry ON conversation_states(expires_at);
  `);
}
