export type MarketTrend =
  | 'strong_uptrend'
  | 'uptrend'
  | 'neutral'
  | 'downtrend'
  | 'strong_downtrend';

export interface InstrumentCondition {
  readonly rsi?: number;
  readonly volatilityPct?: number;   // 일간 수익률 표준편차 (%)
}

/**
 * 사이클마다 외부에서 새로 받는 시장 상황 (저장하지 않음)
 */
export interface MarketConditionSnapshot {
  readonly asOf: number;
  readonly trend: MarketTrend;
  readonly marketChangePct?: number; // 지수 당일 등락률 (%)
  readonly instruments: Readonly<Record<string, InstrumentCondition>>;
}

export interface FairValueSignal {
  readonly fairValue: number;
  readonly confidence: number;       // 0..1
  readonly asOf?: number;
}
