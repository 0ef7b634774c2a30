import type { SizingBand } from '../settings/schema.js';

/** 2차 이상 진입 조건: 둘 다 만족해야 배분 */
export interface SizingGate {
  readonly reentryAllowed: boolean;
  readonly previousStageOpen: boolean;
}

/**
 * 할인율 = (적정가 − 현재가) / 적정가
 * 양수면 저평가, 음수면 고평가
 */
export function discountRate(fairValue: number, price: number): number {
  if (!(fairValue > 0)) {
    throw new RangeError(`fair value must be positive, got ${fairValue}`);
  }
  return (fairValue - price) / fairValue;
}

/**
 * 차수별 배분 금액 (할인율 밴드 계단 함수)
 *
 * bands는 minDiscount 내림차순 (스키마에서 단조성 검증).
 * 할인율 ≥ minDiscount인 첫 밴드의 fraction × 가용 예산.
 * 할인율 ≤ 0이면 0. 2차 이상은 gate 미충족 시 0.
 */
export function sizeForStage(
  rate: number,
  availableBudget: number,
  stageNumber: number,
  bands: readonly SizingBand[],
  gate?: SizingGate,
): number {
  if (!(rate > 0) || !(availableBudget > 0)) return 0;
  if (stageNumber > 1 && !(gate?.reentryAllowed && gate.previousStageOpen)) return 0;

  const band = bands.find((b) => rate >= b.minDiscount);
  if (!band) return 0;

  return Math.min(Math.max(availableBudget * band.fraction, 0), availableBudget);
}

/** 금액 → 거래 단위로 절사한 수량 */
export function quantityForAmount(amount: number, price: number, lotSize: number): number {
  if (!(amount > 0) || !(price > 0) || !(lotSize > 0)) return 0;
  return Math.floor(amount / price / lotSize) * lotSize;
}
