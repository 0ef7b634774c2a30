import type { ExitParams } from '../settings/schema.js';
import type {
  ExitDecision,
  InstrumentLedger,
  MarketConditionSnapshot,
  StageEntry,
} from '../types/index.js';

export const HOLD: ExitDecision = { action: 'HOLD', stageNumber: null, quantity: 0, reason: 'HOLD' };

export interface StageVerdict {
  readonly stageNumber: number;
  readonly entryPrice: number;
  readonly returnRate: number;
  /** 이번 평가에 적용된 손절선 */
  readonly stopLossThreshold: number;
  readonly decision: ExitDecision;
}

// 규칙 우선순위 (낮을수록 우선)
const RANK = { FULL_SELL: 0, STOP_LOSS: 1, PARTIAL_SELL: 2, HOLD: 3 } as const;

const DAY_MS = 24 * 3600 * 1000;

export function stopLossThresholdFor(params: ExitParams, stageNumber: number): number {
  return params.stageStopLossThresholds[String(stageNumber)] ?? params.stopLossThreshold;
}

/**
 * 적응형 손절선
 * 차수별 기본값 + 변동성 완화 + 추세 보정 → 보유 기간 상한 → [base × clampMin, base × clampMax]
 * now가 없으면 보유 기간 규칙은 건너뛴다.
 */
export function adaptiveStopLossThreshold(
  params: ExitParams,
  stage: StageEntry,
  code: string,
  condition: MarketConditionSnapshot | null,
  now?: number,
): number {
  const base = stopLossThresholdFor(params, stage.stageNumber);
  const adaptive = params.adaptiveStopLoss;
  if (!adaptive.enabled) return base;

  let threshold = base;
  const volatility = condition?.instruments[code]?.volatilityPct;
  if (volatility !== undefined) {
    if (volatility > adaptive.volatility.highPct) threshold += adaptive.volatility.highEasing;
    else if (volatility > adaptive.volatility.mediumPct) threshold += adaptive.volatility.mediumEasing;
  }
  if (condition) {
    threshold += adaptive.trendEasing[condition.trend];
  }
  if (now !== undefined) {
    const heldDays = (now - stage.entryTimestamp) / DAY_MS;
    const rule = [...adaptive.holdingRules]
      .sort((a, b) => b.minDays - a.minDays)
      .find((r) => heldDays >= r.minDays);
    if (rule) threshold = Math.min(threshold, rule.maxThreshold);
  }
  return Math.min(Math.max(threshold, base * adaptive.clampMin), base * adaptive.clampMax);
}

/** 진입가 오름차순, 같으면 차수 번호순 */
function evaluationOrder(ledger: InstrumentLedger): StageEntry[] {
  return ledger.stages
    .filter((s) => s.isOpen)
    .sort((a, b) => a.entryPrice - b.entryPrice || a.stageNumber - b.stageNumber);
}

function partialQuantity(
  stage: StageEntry,
  params: ExitParams,
  condition: MarketConditionSnapshot | null,
  lotSize: number,
): number {
  let ratio = params.partialSellRatio;
  if (condition?.trend === 'strong_uptrend' && params.highProfitSellReduction) {
    ratio *= params.uptrendDampening;
  }
  const lots = Math.floor((stage.remainingQuantity * ratio) / lotSize) * lotSize;
  return Math.min(Math.max(lots, lotSize), stage.remainingQuantity);
}

function verdictFor(
  stage: StageEntry,
  code: string,
  price: number,
  fairValue: number | null,
  condition: MarketConditionSnapshot | null,
  params: ExitParams,
  lotSize: number,
  now: number | undefined,
): StageVerdict {
  const returnRate = (price - stage.entryPrice) / stage.entryPrice;
  const stopLossThreshold = adaptiveStopLossThreshold(params, stage, code, condition, now);
  const base = { stageNumber: stage.stageNumber, entryPrice: stage.entryPrice, returnRate, stopLossThreshold };

  // 1. 고평가: 적정가가 없으면 건너뜀
  if (fairValue !== null && fairValue > 0 && (fairValue - price) / fairValue <= -params.overvaluedThreshold) {
    return {
      ...base,
      decision: {
        action: 'FULL_SELL',
        stageNumber: stage.stageNumber,
        quantity: stage.remainingQuantity,
        reason: 'OVERVALUED_SELL',
      },
    };
  }

  // 2. 손절: 쿨다운·할인율과 무관
  if (returnRate <= -stopLossThreshold) {
    return {
      ...base,
      decision: {
        action: 'STOP_LOSS',
        stageNumber: stage.stageNumber,
        quantity: stage.remainingQuantity,
        reason: 'STOP_LOSS',
      },
    };
  }

  // 3. 목표 수익 도달 시 부분 매도
  if (returnRate >= params.profitTarget) {
    return {
      ...base,
      decision: {
        action: 'PARTIAL_SELL',
        stageNumber: stage.stageNumber,
        quantity: partialQuantity(stage, params, condition, lotSize),
        reason: 'PROFIT_TAKE',
      },
    };
  }

  return { ...base, decision: HOLD };
}

/**
 * 보유 차수별 판정 (평가 순서대로)
 */
export function evaluateStages(
  ledger: InstrumentLedger,
  price: number,
  fairValue: number | null,
  condition: MarketConditionSnapshot | null,
  params: ExitParams,
  lotSize: number = 1,
  now?: number,
): StageVerdict[] {
  return evaluationOrder(ledger).map((s) =>
    verdictFor(s, ledger.code, price, fairValue, condition, params, lotSize, now),
  );
}

/**
 * 종목 단위 청산 판단: 한 사이클에 한 건
 *
 * 규칙 우선순위: 고평가 전량 매도 > 손절 > 부분 익절 > 보유.
 * 같은 규칙에 걸린 차수가 여럿이면 진입가가 낮은 차수부터.
 * 서킷 브레이커 등 포트폴리오 단위 판단은 오케스트레이터 몫.
 */
export function decide(
  ledger: InstrumentLedger,
  price: number,
  fairValue: number | null,
  condition: MarketConditionSnapshot | null,
  params: ExitParams,
  lotSize: number = 1,
  now?: number,
): ExitDecision {
  let best: ExitDecision = HOLD;
  for (const verdict of evaluateStages(ledger, price, fairValue, condition, params, lotSize, now)) {
    if (RANK[verdict.decision.action] < RANK[best.action]) {
      best = verdict.decision;
    }
  }
  return best;
}
