/** 차수(스테이지) 최대 개수 */
export const MAX_STAGES = 5;

export type SellReason = 'OVERVALUED_SELL' | 'STOP_LOSS' | 'PROFIT_TAKE' | 'MANUAL';

export interface SellRecord {
  readonly timestamp: number;   // Unix ms
  readonly quantity: number;
  readonly price: number;
  readonly realizedPnl: number; // 수수료·세금 차감 후
  readonly reason: SellReason;
}

export interface StageEntry {
  readonly stageNumber: number;       // 1..MAX_STAGES
  readonly entryPrice: number;
  readonly entryQuantity: number;
  readonly remainingQuantity: number; // 부분 매도 후 잔량
  readonly entryTimestamp: number;    // Unix ms
  readonly sellHistory: readonly SellRecord[];
  readonly isOpen: boolean;
}

export interface StageCooldown {
  readonly closedAt: number;    // Unix ms
  readonly closePrice: number;
  readonly reason: SellReason;
}

export interface InstrumentRef {
  readonly code: string;
  readonly name: string;
  readonly sector: string;
}

export interface InstrumentLedger extends InstrumentRef {
  readonly stages: readonly StageEntry[];
  readonly closedStages: readonly StageEntry[];
  readonly realizedPnl: number;
  /** 슬롯 번호("1".."5") → 마지막 청산 정보 */
  readonly cooldowns: Readonly<Record<string, StageCooldown>>;
  /** 슬롯 번호 → 마지막으로 계산된 추가 진입 하락률 (참고용, 매 사이클 재계산) */
  readonly dropRequirements: Readonly<Record<string, number>>;
  readonly updatedAt: number;
}
