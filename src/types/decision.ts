import type { SellReason } from './ledger.js';

export type ExitAction = 'HOLD' | 'PARTIAL_SELL' | 'STOP_LOSS' | 'FULL_SELL';

export interface ExitDecision {
  readonly action: ExitAction;
  readonly stageNumber: number | null; // HOLD이면 null
  readonly quantity: number;
  readonly reason: SellReason | 'HOLD';
}

export interface EntryPlan {
  readonly code: string;
  readonly stageNumber: number;
  readonly price: number;
  readonly quantity: number;
  readonly amount: number;
  readonly discountRate: number;
}

export interface ExitPlan {
  readonly code: string;
  readonly price: number;
  readonly decision: ExitDecision;
}

export type CyclePlan =
  | { readonly kind: 'BUY'; readonly entry: EntryPlan }
  | { readonly kind: 'SELL'; readonly exit: ExitPlan }
  | { readonly kind: 'NONE'; readonly code: string; readonly note: string };
