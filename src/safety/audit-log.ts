import type Database from 'better-sqlite3';
import type { TradingMode } from '../config.js';

export type AuditLevel = 'INFO' | 'WARN' | 'ERROR' | 'CRITICAL';

export interface AuditRow {
  id: number;
  timestamp: number;
  level: string;
  module: string;
  action: string;
  detail: string | null;
  mode: string | null;
}

export interface FillRecord {
  orderId: string;
  timestamp: number;
  code: string;
  side: 'BUY' | 'SELL';
  stageNumber: number;
  price: number;
  quantity: number;
  realizedPnl: number | null;
  reason: string | null;
}

export interface FillRow {
  order_id: string;
  timestamp: number;
  code: string;
  side: string;
  stage_number: number;
  price: number;
  qty: number;
  realized_pnl: number | null;
  reason: string | null;
  mode: string;
}

/**
 * SQLite audit log: 사이클 커밋, 주문 거부, 백업 복구, 모드 전환 기록
 * 원장 자체의 진실은 LedgerStore. 여기는 사후 추적용.
 */
export class AuditLog {
  private readonly db: Database.Database;
  private readonly mode: TradingMode;
  private readonly now: () => number;

  constructor(db: Database.Database, mode: TradingMode, now: () => number = Date.now) {
    this.db = db;
    this.mode = mode;
    this.now = now;
  }

  log(level: AuditLevel, module: string, action: string, detail?: string): void {
    this.db.prepare(`
      INSERT INTO audit_log (timestamp, level, module, action, detail, mode)
      VALUES (?, ?, ?, ?, ?, ?)
    `).run(this.now(), level, module, action, detail ?? null, this.mode);
  }

  info(module: string, action: string, detail?: string): void {
    this.log('INFO', module, action, detail);
  }

  warn(module: string, action: string, detail?: string): void {
    this.log('WARN', module, action, detail);
  }

  error(module: string, action: string, detail?: string): void {
    this.log('ERROR', module, action, detail);
  }

  critical(module: string, action: string, detail?: string): void {
    this.log('CRITICAL', module, action, detail);
  }

  /** 같은 주문 id는 한 번만 기록 */
  recordFill(fill: FillRecord): void {
    this.db.prepare(`
      INSERT OR IGNORE INTO fills
        (order_id, timestamp, code, side, stage_number, price, qty, realized_pnl, reason, mode)
      VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, ?)
    `).run(
      fill.orderId,
      fill.timestamp,
      fill.code,
      fill.side,
      fill.stageNumber,
      fill.price,
      fill.quantity,
      fill.realizedPnl,
      fill.reason,
      this.mode,
    );
  }

  getRecent(limit: number = 50): AuditRow[] {
    return this.db
      .prepare<[number], AuditRow>('SELECT * FROM audit_log ORDER BY id DESC LIMIT ?')
      .all(limit);
  }

  getFills(code?: string): FillRow[] {
    if (code === undefined) {
      return this.db.prepare<[], FillRow>('SELECT * FROM fills ORDER BY timestamp, order_id').all();
    }
    return this.db
      .prepare<[string], FillRow>('SELECT * FROM fills WHERE code = ? ORDER BY timestamp, order_id')
      .all(code);
  }
}
