export { MAX_STAGES } from './ledger.js';
export type {
  SellReason,
  SellRecord,
  StageEntry,
  StageCooldown,
  InstrumentRef,
  InstrumentLedger,
} from './ledger.js';
export type {
  MarketTrend,
  InstrumentCondition,
  MarketConditionSnapshot,
  FairValueSignal,
} from './market.js';
export type {
  ExitAction,
  ExitDecision,
  EntryPlan,
  ExitPlan,
  CyclePlan,
} from './decision.js';
export type { EquitySample, BudgetState } from './budget.js';
export type { TradingState } from './mode.js';
