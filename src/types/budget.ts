export interface EquitySample {
  readonly timestamp: number;
  readonly equity: number;
}

export interface BudgetState {
  readonly initialBudget: number;
  readonly effectiveBudget: number;
  readonly realizedPnl: number;
  /** 성과 기간(trailing horizon) 안의 자산 샘플, 시간순 */
  readonly performanceWindow: readonly EquitySample[];
  readonly updatedAt: number;
}
