import { exposure, openQuantity, openStages, unrealizedPnl } from '../ledger/position-ledger.js';
import type { InstrumentLedger, SellRecord } from '../types/index.js';

export interface InstrumentSummary {
  readonly code: string;
  readonly name: string;
  readonly openStages: number[];
  readonly openQuantity: number;
  /** 잔량 가중 평균 진입가 (보유 없으면 null) */
  readonly averageEntryPrice: number | null;
  readonly exposure: number;
  readonly realizedPnl: number;
  /** 현재가를 모르면 null */
  readonly unrealizedPnl: number | null;
}

export interface MonthlyPnl {
  readonly month: string;   // YYYY-MM (KST)
  readonly pnl: number;
  readonly sellCount: number;
}

export interface LedgerReport {
  readonly instruments: InstrumentSummary[];
  readonly totalRealized: number;
  readonly totalExposure: number;
  readonly sellCount: number;
  readonly winCount: number;
  readonly winRate: number;
  readonly stopLossCount: number;
  readonly monthly: MonthlyPnl[];
}

const KST_OFFSET_MS = 9 * 3600 * 1000;

function kstMonth(ts: number): string {
  return new Date(ts + KST_OFFSET_MS).toISOString().slice(0, 7);
}

/** 보관 기록 포함 전체 매도 기록 */
export function allSells(ledger: InstrumentLedger): SellRecord[] {
  return [...ledger.closedStages, ...ledger.stages]
    .flatMap((s) => s.sellHistory)
    .sort((a, b) => a.timestamp - b.timestamp);
}

export function buildLedgerReport(
  ledgers: Iterable<InstrumentLedger>,
  prices: ReadonlyMap<string, number> = new Map(),
): LedgerReport {
  const instruments: InstrumentSummary[] = [];
  const sells: SellRecord[] = [];

  for (const ledger of ledgers) {
    const qty = openQuantity(ledger);
    const cost = exposure(ledger);
    const price = prices.get(ledger.code);
    instruments.push({
      code: ledger.code,
      name: ledger.name,
      openStages: openStages(ledger).map((s) => s.stageNumber),
      openQuantity: qty,
      averageEntryPrice: qty > 0 ? cost / qty : null,
      exposure: cost,
      realizedPnl: ledger.realizedPnl,
      unrealizedPnl: price !== undefined ? unrealizedPnl(ledger, price) : null,
    });
    sells.push(...allSells(ledger));
  }

  const byMonth = new Map<string, { pnl: number; sellCount: number }>();
  for (const s of sells) {
    const key = kstMonth(s.timestamp);
    const m = byMonth.get(key) ?? { pnl: 0, sellCount: 0 };
    byMonth.set(key, { pnl: m.pnl + s.realizedPnl, sellCount: m.sellCount + 1 });
  }
  const monthly = [...byMonth.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([month, m]) => ({ month, ...m }));

  const winCount = sells.filter((s) => s.realizedPnl > 0).length;
  return {
    instruments,
    totalRealized: instruments.reduce((sum, i) => sum + i.realizedPnl, 0),
    totalExposure: instruments.reduce((sum, i) => sum + i.exposure, 0),
    sellCount: sells.length,
    winCount,
    winRate: sells.length > 0 ? winCount / sells.length : 0,
    stopLossCount: sells.filter((s) => s.reason === 'STOP_LOSS').length,
    monthly,
  };
}
