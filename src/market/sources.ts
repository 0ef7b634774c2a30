import type { FairValueSignal, MarketConditionSnapshot } from '../types/index.js';

/**
 * 코어가 호출하는 외부 협력자 계약
 * 응답이 없으면 UnavailableError: 값을 지어내지 않는다.
 */

export interface PriceBalanceSource {
  currentPrice(code: string): Promise<number>;
  ownedQuantity(code: string): Promise<number>;
  isMarketOpen(): Promise<boolean>;
}

export interface ValuationSource {
  /** 상류에서 캐시될 수 있음: 이번 사이클에는 그대로 신뢰 */
  fairValueSignal(code: string): Promise<FairValueSignal>;
}

export interface MarketConditionSource {
  snapshot(): Promise<MarketConditionSnapshot>;
}
