import type { DropRequirementSettings } from '../settings/schema.js';
import type {
  InstrumentCondition,
  InstrumentLedger,
  MarketConditionSnapshot,
  MarketTrend,
} from '../types/index.js';

export interface DropCondition extends InstrumentCondition {
  readonly trend: MarketTrend;
}

export interface DropRequirement {
  readonly stageNumber: number;
  readonly base: number;
  readonly value: number;
  readonly adjustments: readonly string[];
}

/** 스냅샷에서 종목 조건 추출 (스냅샷 없으면 null → 기본 하락률) */
export function conditionFor(snapshot: MarketConditionSnapshot | null, code: string): DropCondition | null {
  if (!snapshot) return null;
  return { trend: snapshot.trend, ...snapshot.instruments[code] };
}

const round6 = (v: number): number => Math.round(v * 1e6) / 1e6;

/**
 * N차 추가 진입에 필요한 직전 차수 대비 하락률
 * base + (RSI/추세/변동성 보정), [base × clampMin, base × clampMax]로 제한
 */
export function dropRequirementFor(
  stageNumber: number,
  settings: DropRequirementSettings,
  condition: DropCondition | null,
): DropRequirement {
  const base = settings.baseDrops[String(stageNumber)] ?? settings.fallbackDrop;
  if (stageNumber <= 1) {
    return { stageNumber, base: 0, value: 0, adjustments: [] };
  }
  if (!settings.enabled || !condition) {
    return { stageNumber, base, value: base, adjustments: [] };
  }

  const adj = settings.adjustments;
  const adjustments: string[] = [];
  let value = base;

  if (condition.rsi !== undefined) {
    if (condition.rsi <= settings.rsiOversold) {
      value += adj.rsiOversoldBonus;
      adjustments.push(`rsi_oversold(${condition.rsi.toFixed(1)})`);
    } else if (condition.rsi >= settings.rsiOverbought) {
      value += adj.rsiOverboughtPenalty;
      adjustments.push(`rsi_overbought(${condition.rsi.toFixed(1)})`);
    }
  }

  if (condition.trend === 'downtrend' || condition.trend === 'strong_downtrend') {
    value += adj.downtrendBonus;
    adjustments.push(condition.trend);
  } else if (condition.trend === 'uptrend' || condition.trend === 'strong_uptrend') {
    value += adj.uptrendPenalty;
    adjustments.push(condition.trend);
  }

  if (condition.volatilityPct !== undefined && condition.volatilityPct > settings.highVolatilityPct) {
    value += adj.volatilityBonus;
    adjustments.push(`high_volatility(${condition.volatilityPct.toFixed(1)}%)`);
  }

  const clamped = Math.min(Math.max(value, base * settings.clampMin), base * settings.clampMax);
  return { stageNumber, base, value: round6(clamped), adjustments };
}

/**
 * 원장의 dropRequirements를 현재 조건으로 다시 계산.
 * 같은 입력이면 같은 원장 객체를 그대로 돌려준다.
 */
export function withDropRequirements(
  ledger: InstrumentLedger,
  settings: DropRequirementSettings,
  condition: DropCondition | null,
  maxStages: number,
): InstrumentLedger {
  const next: Record<string, number> = {};
  for (let n = 2; n <= maxStages; n++) {
    next[String(n)] = dropRequirementFor(n, settings, condition).value;
  }

  const prevKeys = Object.keys(ledger.dropRequirements);
  const unchanged =
    prevKeys.length === Object.keys(next).length &&
    prevKeys.every((k) => ledger.dropRequirements[k] === next[k]);
  return unchanged ? ledger : { ...ledger, dropRequirements: next };
}

/**
 * N차 진입가 조건: price ≤ (N−1)차 진입가 × (1 − drop(N))
 * 직전 차수가 없으면 false
 */
export function meetsDropRequirement(
  ledger: InstrumentLedger,
  stageNumber: number,
  price: number,
  drop: number,
): boolean {
  if (stageNumber <= 1) return true;
  const previous = ledger.stages.find((s) => s.stageNumber === stageNumber - 1 && s.isOpen);
  if (!previous) return false;
  return price <= previous.entryPrice * (1 - drop);
}
