import { mkdirSync } from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('db');

/**
 * 감사 로그 DB 열기 (없으면 생성). ':memory:'는 테스트용.
 */
export function openDatabase(dbPath: string): Database.Database {
  if (dbPath !== ':memory:') {
    mkdirSync(path.dirname(path.resolve(dbPath)), { recursive: true });
  }
  const db = new Database(dbPath);
  db.pragma('journal_mode = WAL');
  db.pragma('synchronous = NORMAL');
  initSchema(db);
  log.info({ path: dbPath }, 'Database initialized');
  return db;
}

function initSchema(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS audit_log (
      id         INTEGER PRIMARY KEY AUTOINCREMENT,
      timestamp  INTEGER NOT NULL DEFAULT (strftime('%s','now') * 1000),
      level      TEXT NOT NULL,
      module     TEXT NOT NULL,
      action     TEXT NOT NULL,
      detail     TEXT,
      mode       TEXT
    );

    CREATE TABLE IF NOT EXISTS fills (
      order_id     TEXT PRIMARY KEY,
      timestamp    INTEGER NOT NULL,
      code         TEXT NOT NULL,
      side         TEXT NOT NULL,
      stage_number INTEGER NOT NULL,
      price        REAL NOT NULL,
      qty          REAL NOT NULL,
      realized_pnl REAL,
      reason       TEXT,
      mode         TEXT NOT NULL
    );

    CREATE INDEX IF NOT EXISTS idx_audit_ts ON audit_log(timestamp);
    CREATE INDEX IF NOT EXISTS idx_fills_code ON fills(code, timestamp);
  `);
}
