import { kstDayKey } from '../market/market-hours.js';
import type { CircuitBreakerSettings } from '../settings/schema.js';
import type { BudgetState, InstrumentLedger, MarketConditionSnapshot } from '../types/index.js';

const DAY_MS = 24 * 3600 * 1000;

export type BreakerKind = 'BROAD_DECLINE' | 'DAILY_STOP_LIMIT' | 'CONSECUTIVE_STOPS' | 'PORTFOLIO_LOSS';

export interface BreakerTrip {
  readonly breaker: BreakerKind;
  /** SUSPEND: 신규 진입만 중단, HALT: 사이클 전체 중단 (수동 해제) */
  readonly severity: 'SUSPEND' | 'HALT';
  readonly detail: string;
}

export interface BreakerInputs {
  readonly condition: MarketConditionSnapshot | null;
  readonly ledgers: Iterable<InstrumentLedger>;
  readonly budget: BudgetState;
  /** null: 시세 없는 보유 종목이 있어 평가손익 미확정 (포트폴리오 손실 판정 보류) */
  readonly unrealizedPnl: number | null;
  readonly now: number;
}

/** 전 종목 손절 체결 시각 (보관 기록 포함) */
export function stopLossTimestamps(ledgers: Iterable<InstrumentLedger>): number[] {
  const out: number[] = [];
  for (const ledger of ledgers) {
    for (const stage of [...ledger.stages, ...ledger.closedStages]) {
      for (const sell of stage.sellHistory) {
        if (sell.reason === 'STOP_LOSS') out.push(sell.timestamp);
      }
    }
  }
  return out.sort((a, b) => a - b);
}

/**
 * 포트폴리오 서킷 브레이커 판정: 발동된 항목 목록 (없으면 빈 배열)
 */
export function evaluateCircuitBreakers(inputs: BreakerInputs, settings: CircuitBreakerSettings): BreakerTrip[] {
  const trips: BreakerTrip[] = [];
  const { condition, now } = inputs;

  if (condition) {
    const change = condition.marketChangePct;
    if (change !== undefined && change <= -settings.broadDeclinePct) {
      trips.push({
        breaker: 'BROAD_DECLINE',
        severity: 'SUSPEND',
        detail: `market ${change.toFixed(2)}% <= -${settings.broadDeclinePct}%`,
      });
    } else if (settings.suspendOnStrongDowntrend && condition.trend === 'strong_downtrend') {
      trips.push({ breaker: 'BROAD_DECLINE', severity: 'SUSPEND', detail: 'strong_downtrend' });
    }
  }

  const stops = stopLossTimestamps(inputs.ledgers);
  const today = kstDayKey(now);
  const todayStops = stops.filter((ts) => kstDayKey(ts) === today).length;
  if (todayStops >= settings.dailyStopLimit) {
    trips.push({
      breaker: 'DAILY_STOP_LIMIT',
      severity: 'SUSPEND',
      detail: `${todayStops} stop-losses today (limit ${settings.dailyStopLimit})`,
    });
  }

  const windowStart = now - settings.consecutiveStopWindowDays * DAY_MS;
  const recentStops = stops.filter((ts) => ts >= windowStart).length;
  if (recentStops >= settings.consecutiveStopLimit) {
    trips.push({
      breaker: 'CONSECUTIVE_STOPS',
      severity: 'SUSPEND',
      detail: `${recentStops} stop-losses in ${settings.consecutiveStopWindowDays}d (limit ${settings.consecutiveStopLimit})`,
    });
  }

  const { initialBudget, realizedPnl } = inputs.budget;
  if (inputs.unrealizedPnl === null) return trips;
  const totalPnl = realizedPnl + inputs.unrealizedPnl;
  if (initialBudget > 0 && totalPnl / initialBudget <= -settings.maxPortfolioLoss) {
    trips.push({
      breaker: 'PORTFOLIO_LOSS',
      severity: 'HALT',
      detail: `total P&L ${Math.round(totalPnl)} <= -${(settings.maxPortfolioLoss * 100).toFixed(1)}% of ${initialBudget}`,
    });
  }

  return trips;
}
