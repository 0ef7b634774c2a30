import {
  CapacityExceededError,
  InsufficientQuantityError,
  UnknownStageError,
} from '../errors.js';
import type { FeeFunction } from '../execution/fees.js';
import { kstDayKey } from '../market/market-hours.js';
import type { ReentryPolicy } from '../settings/schema.js';
import {
  MAX_STAGES,
  type InstrumentLedger,
  type InstrumentRef,
  type SellReason,
  type StageEntry,
} from '../types/index.js';

/** 재사용된 슬롯의 이전 기록 보관 개수 */
export const CLOSED_STAGE_ARCHIVE_LIMIT = 100;

const HOUR_MS = 3600 * 1000;

export function createLedger(ref: InstrumentRef, now: number = 0): InstrumentLedger {
  return {
    code: ref.code,
    name: ref.name,
    sector: ref.sector,
    stages: [],
    closedStages: [],
    realizedPnl: 0,
    cooldowns: {},
    dropRequirements: {},
    updatedAt: now,
  };
}

export function findStage(ledger: InstrumentLedger, stageNumber: number): StageEntry | undefined {
  return ledger.stages.find((s) => s.stageNumber === stageNumber);
}

/** 보유 중인 차수 (차수 번호순) */
export function openStages(ledger: InstrumentLedger): StageEntry[] {
  return ledger.stages.filter((s) => s.isOpen);
}

export function isStageOpen(ledger: InstrumentLedger, stageNumber: number): boolean {
  return findStage(ledger, stageNumber)?.isOpen ?? false;
}

/**
 * 다음 진입 차수 = 비어 있는 가장 낮은 슬롯
 * 낮은 슬롯부터 채우므로 차수를 건너뛸 수 없다.
 */
export function nextStageNumber(ledger: InstrumentLedger, maxStages: number = MAX_STAGES): number | null {
  for (let n = 1; n <= maxStages; n++) {
    if (!isStageOpen(ledger, n)) return n;
  }
  return null;
}

export function openQuantity(ledger: InstrumentLedger): number {
  return openStages(ledger).reduce((sum, s) => sum + s.remainingQuantity, 0);
}

/** 매입 원가 기준 익스포저 */
export function exposure(ledger: InstrumentLedger): number {
  return openStages(ledger).reduce((sum, s) => sum + s.remainingQuantity * s.entryPrice, 0);
}

export function unrealizedPnl(ledger: InstrumentLedger, price: number): number {
  return openStages(ledger).reduce(
    (sum, s) => sum + (price - s.entryPrice) * s.remainingQuantity,
    0,
  );
}

/** 해당 날짜(KST)에 진입한 차수 수: 보관 기록 포함 */
export function buysOnDay(ledger: InstrumentLedger, now: number): number {
  const day = kstDayKey(now);
  const all = [...ledger.stages, ...ledger.closedStages];
  return all.filter((s) => kstDayKey(s.entryTimestamp) === day).length;
}

/**
 * 신규 차수 진입
 * 비어 있는 가장 낮은 슬롯에 기록. 닫힌 기록이 있던 슬롯이면 보관함으로 옮긴다.
 */
export function openStage(
  ledger: InstrumentLedger,
  price: number,
  quantity: number,
  timestamp: number,
  maxStages: number = MAX_STAGES,
): InstrumentLedger {
  if (!(price > 0)) throw new RangeError(`${ledger.code}: entry price must be positive, got ${price}`);
  if (!(quantity > 0)) throw new RangeError(`${ledger.code}: entry quantity must be positive, got ${quantity}`);

  const stageNumber = nextStageNumber(ledger, maxStages);
  if (stageNumber === null) {
    throw new CapacityExceededError(ledger.code, maxStages);
  }

  const previous = findStage(ledger, stageNumber);
  const entry: StageEntry = {
    stageNumber,
    entryPrice: price,
    entryQuantity: quantity,
    remainingQuantity: quantity,
    entryTimestamp: timestamp,
    sellHistory: [],
    isOpen: true,
  };

  const stages = [...ledger.stages.filter((s) => s.stageNumber !== stageNumber), entry]
    .sort((a, b) => a.stageNumber - b.stageNumber);
  const closedStages = previous
    ? [...ledger.closedStages, previous].slice(-CLOSED_STAGE_ARCHIVE_LIMIT)
    : ledger.closedStages;
  const { [String(stageNumber)]: _cleared, ...cooldowns } = ledger.cooldowns;

  return { ...ledger, stages, closedStages, cooldowns, updatedAt: timestamp };
}

export interface CloseResult {
  readonly ledger: InstrumentLedger;
  readonly realizedPnl: number;
}

/**
 * 차수 부분/전량 매도
 * 실현손익 = (매도가 − 진입가) × 수량 − (매도 비용 + 매도 수량분 매수 비용)
 * 잔량이 0이 되면 차수를 닫고 해당 슬롯의 재진입 쿨다운을 시작한다.
 */
export function closeStagePartial(
  ledger: InstrumentLedger,
  stageNumber: number,
  quantity: number,
  price: number,
  timestamp: number,
  reason: SellReason,
  fees: FeeFunction,
): CloseResult {
  const stage = findStage(ledger, stageNumber);
  if (!stage || !stage.isOpen) {
    throw new UnknownStageError(ledger.code, stageNumber);
  }
  if (!(quantity > 0) || quantity > stage.remainingQuantity) {
    throw new InsufficientQuantityError(ledger.code, stageNumber, quantity, stage.remainingQuantity);
  }

  const cost = fees(price, quantity, false) + fees(stage.entryPrice, quantity, true);
  const realizedPnl = (price - stage.entryPrice) * quantity - cost;
  const remainingQuantity = stage.remainingQuantity - quantity;
  const isOpen = remainingQuantity > 0;

  const updated: StageEntry = {
    ...stage,
    remainingQuantity,
    isOpen,
    sellHistory: [...stage.sellHistory, { timestamp, quantity, price, realizedPnl, reason }],
  };

  const cooldowns = isOpen
    ? ledger.cooldowns
    : { ...ledger.cooldowns, [String(stageNumber)]: { closedAt: timestamp, closePrice: price, reason } };

  return {
    ledger: {
      ...ledger,
      stages: ledger.stages.map((s) => (s.stageNumber === stageNumber ? updated : s)),
      realizedPnl: ledger.realizedPnl + realizedPnl,
      cooldowns,
      updatedAt: timestamp,
    },
    realizedPnl,
  };
}

/**
 * 슬롯 재진입 가능 여부
 * - 마지막 청산 후 쿨다운(손절이면 stopLossCooldownHours) 경과 전이면 false
 * - 청산가 대비 minPullback 이상 조정받지 않았으면 false
 */
export function isReentryAllowed(
  ledger: InstrumentLedger,
  stageNumber: number,
  now: number,
  price: number,
  policy: Pick<ReentryPolicy, 'cooldownHours' | 'stopLossCooldownHours' | 'minPullback'>,
): boolean {
  const cooldown = ledger.cooldowns[String(stageNumber)];
  if (!cooldown) return true;

  const hours = cooldown.reason === 'STOP_LOSS' ? policy.stopLossCooldownHours : policy.cooldownHours;
  if (now - cooldown.closedAt < hours * HOUR_MS) return false;

  const pullback = (cooldown.closePrice - price) / cooldown.closePrice;
  return pullback >= policy.minPullback;
}
