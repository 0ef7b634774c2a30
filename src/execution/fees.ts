import type { FeeRates } from '../settings/schema.js';

/** (가격, 수량, 매수여부) → 수수료+세금 (KRW). 순수 함수여야 함 */
export type FeeFunction = (price: number, quantity: number, isBuy: boolean) => number;

/**
 * 국내 주식 수수료 모델
 * - 매수/매도 공통: 위탁 수수료
 * - 매도만: 거래세 + 농특세
 */
export function createKrxFeeFunction(rates: FeeRates): FeeFunction {
  return (price, quantity, isBuy) => {
    const amount = price * quantity;
    const commission = amount * rates.commissionRate;
    if (isBuy) return commission;
    return commission + amount * rates.taxRate + amount * rates.specialTaxRate;
  };
}

export const zeroFees: FeeFunction = () => 0;
