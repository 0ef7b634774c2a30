import {
  LedgerInvariantError,
  OrderRejectedError,
  OrderTimeoutError,
  PersistenceError,
  UnavailableError,
} from '../errors.js';
import type { FeeFunction } from '../execution/fees.js';
import { withTimeout, type OrderConfirmation, type OrderExecutor } from '../execution/order-executor.js';
import { conditionFor, meetsDropRequirement, withDropRequirements } from '../ledger/drop-requirement.js';
import {
  buysOnDay,
  closeStagePartial,
  createLedger,
  exposure,
  isReentryAllowed,
  isStageOpen,
  nextStageNumber,
  openQuantity,
  openStage,
  unrealizedPnl,
} from '../ledger/position-ledger.js';
import { createChildLogger } from '../logger.js';
import type { MarketConditionSource, PriceBalanceSource, ValuationSource } from '../market/sources.js';
import type { NotificationSink } from '../notification/notifier.js';
import type { BudgetController } from '../risk/budget-controller.js';
import { evaluateCircuitBreakers, type BreakerTrip } from '../risk/circuit-breaker.js';
import { decide } from '../risk/exit-engine.js';
import { discountRate, quantityForAmount, sizeForStage } from '../risk/sizing-engine.js';
import type { TradingStateMachine } from '../risk/state-machine.js';
import type { FillRecord } from '../safety/audit-log.js';
import { exitParamsFor, type InstrumentSettings, type TradingSettings } from '../settings/schema.js';
import type {
  BudgetState,
  CyclePlan,
  EntryPlan,
  InstrumentLedger,
  MarketConditionSnapshot,
  TradingState,
} from '../types/index.js';

const log = createChildLogger('trading-cycle');

/** LedgerStore.save와 같은 계약 */
export interface LedgerRepository {
  save(ledgers: ReadonlyMap<string, InstrumentLedger>, budget?: BudgetState): string;
}

export interface AuditSink {
  info(module: string, action: string, detail?: string): void;
  warn(module: string, action: string, detail?: string): void;
  error(module: string, action: string, detail?: string): void;
  recordFill(fill: FillRecord): void;
}

export interface TradingCycleDeps {
  readonly store: LedgerRepository;
  readonly prices: PriceBalanceSource;
  readonly valuations: ValuationSource;
  readonly conditions: MarketConditionSource;
  readonly orders: OrderExecutor;
  readonly fees: FeeFunction;
  readonly budget: BudgetController;
  readonly mode: TradingStateMachine;
  readonly notifier: NotificationSink;
  readonly audit?: AuditSink;
  /** 사이클마다 호출 (변경 감지 로더) */
  readonly settings: () => TradingSettings;
  readonly signalTimeoutMs: number;
  readonly orderTimeoutMs: number;
  readonly now?: () => number;
}

export type SkipReason = 'IN_FLIGHT' | 'HALTED' | 'MARKET_CLOSED';

export interface CycleReport {
  readonly status: 'COMPLETED' | 'SKIPPED';
  readonly skipReason?: SkipReason;
  readonly startedAt: number;
  readonly mode: TradingState;
  readonly entriesSuspended: boolean;
  readonly trips: readonly BreakerTrip[];
  readonly plans: readonly CyclePlan[];
  readonly filled: number;
  readonly rejected: number;
  readonly timedOut: number;
  readonly isolated: readonly string[];
  readonly saved: boolean;
  readonly generation: string | null;
}

interface InstrumentSignal {
  readonly code: string;
  readonly price: number;
  readonly fairValue: number | null;
  readonly ownedQuantity: number | null;
}

type OrderOutcome =
  | { readonly kind: 'FILLED'; readonly plan: CyclePlan; readonly confirmation: OrderConfirmation }
  | { readonly kind: 'REJECTED'; readonly plan: CyclePlan; readonly reason: string }
  | { readonly kind: 'TIMEOUT'; readonly plan: CyclePlan };

/**
 * 트레이딩 사이클 오케스트레이터
 *
 * 한 번의 평가 패스:
 *   시장 상황 → 종목별 시세/적정가/보유수량 (병렬, 타임아웃) → 서킷 브레이커
 *   → 종목별 판단 (청산 우선, 종목당 최대 1건) → 주문 (병렬, 타임아웃)
 *   → 체결 확인분만 작업 사본에 반영 → 예산 갱신 → 저장 1회
 *
 * 저장 실패 시 작업 사본을 유지하고 다음 사이클에 다시 저장한다.
 */
export class TradingCycle {
  private readonly deps: TradingCycleDeps;
  private readonly now: () => number;
  private readonly ledgers: Map<string, InstrumentLedger>;
  private readonly lastMismatch = new Map<string, string>();
  private inFlight = false;
  private dirty = false;

  constructor(deps: TradingCycleDeps, ledgers: ReadonlyMap<string, InstrumentLedger>) {
    this.deps = deps;
    this.now = deps.now ?? Date.now;
    this.ledgers = new Map(ledgers);
  }

  get workingCopy(): ReadonlyMap<string, InstrumentLedger> {
    return this.ledgers;
  }

  /** 마지막 저장 이후 저장되지 않은 변경이 있는지 */
  get hasUnsavedChanges(): boolean {
    return this.dirty;
  }

  isRunning(): boolean {
    return this.inFlight;
  }

  async runOnce(): Promise<CycleReport> {
    const startedAt = this.now();
    if (this.inFlight) {
      log.warn('Previous cycle still running, skipping');
      return this.skipped('IN_FLIGHT', startedAt, false, null);
    }

    this.inFlight = true;
    try {
      return await this.run(startedAt);
    } finally {
      this.inFlight = false;
    }
  }

  private async run(now: number): Promise<CycleReport> {
    const { deps } = this;
    const settings = deps.settings();
    deps.budget.updateSettings(settings.budget);

    if (deps.mode.isHalted()) {
      const saved = this.persistPending();
      return this.skipped('HALTED', now, saved.saved, saved.generation);
    }
    if (!(await this.marketOpen())) {
      const saved = this.persistPending();
      return this.skipped('MARKET_CLOSED', now, saved.saved, saved.generation);
    }

    for (const inst of settings.instruments) {
      if (!this.ledgers.has(inst.code)) {
        this.ledgers.set(inst.code, createLedger(inst, now));
        this.dirty = true;
      }
    }

    // 1. 시장 상황 (없으면 이번 사이클 신규 진입 중단, 청산은 계속)
    const condition = await this.fetchCondition();

    // 2. 종목별 시그널
    const signals = await this.gatherSignals(settings.instruments);

    for (const inst of settings.instruments) {
      const ledger = this.ledger(inst.code);
      const updated = withDropRequirements(
        ledger,
        settings.dropRequirements,
        conditionFor(condition, inst.code),
        settings.maxStages,
      );
      if (updated !== ledger) {
        this.ledgers.set(inst.code, updated);
        this.dirty = true;
      }
      const signal = signals.get(inst.code);
      if (signal) this.reconcile(signal);
    }

    // 3. 예산·서킷 브레이커 (보유 종목 중 시세가 없는 종목이 있으면 평가손익 미확정)
    const unpriced = settings.instruments
      .filter((inst) => !signals.has(inst.code) && openQuantity(this.ledger(inst.code)) > 0)
      .map((inst) => inst.code);
    const unrealized = unpriced.length > 0
      ? null
      : [...signals.values()].reduce((sum, s) => sum + unrealizedPnl(this.ledger(s.code), s.price), 0);
    if (unrealized !== null) {
      const budgetState = deps.budget.state;
      deps.budget.recordEquity(now, budgetState.initialBudget + budgetState.realizedPnl + unrealized);
    } else {
      log.warn({ unpriced }, 'Open positions without a price, equity sample skipped');
    }
    deps.budget.refresh(now);

    const trips = evaluateCircuitBreakers(
      {
        condition,
        ledgers: this.ledgers.values(),
        budget: deps.budget.state,
        unrealizedPnl: unrealized,
        now,
      },
      settings.circuitBreakers,
    );
    this.applyModeChange(trips);

    const isolated = new Set<string>();
    const entriesSuspended = !deps.mode.allowsEntries() || condition === null;
    const plans = deps.mode.isHalted()
      ? []
      : this.plan(settings, signals, condition, entriesSuspended, now, isolated);

    // 4. 주문 (병렬) → 체결분 반영 (설정 순서대로)
    const outcomes = await Promise.all(
      plans.filter((p) => p.kind !== 'NONE').map((p) => this.execute(p)),
    );
    // 체결분을 모두 작업 사본에 반영한 뒤에 기록·알림
    const fills: FillRecord[] = [];
    let rejected = 0;
    let timedOut = 0;
    for (const outcome of outcomes) {
      if (outcome.kind === 'FILLED') {
        const fill = this.applyFill(outcome.plan, outcome.confirmation, settings, now, isolated);
        if (fill) fills.push(fill);
      } else if (outcome.kind === 'REJECTED') {
        rejected += 1;
      } else {
        timedOut += 1;
      }
    }
    const filled = fills.length;
    if (filled > 0) {
      deps.budget.refresh(now);
    }
    for (const fill of fills) {
      this.announceFill(fill);
    }

    // 5. 저장 1회
    this.dirty = true;
    const saved = this.persistPending();

    const report: CycleReport = {
      status: 'COMPLETED',
      startedAt: now,
      mode: deps.mode.current,
      entriesSuspended,
      trips,
      plans,
      filled,
      rejected,
      timedOut,
      isolated: [...isolated],
      saved: saved.saved,
      generation: saved.generation,
    };
    log.info(
      {
        mode: report.mode,
        orders: outcomes.length,
        filled,
        rejected,
        timedOut,
        isolated: report.isolated,
        saved: saved.saved,
        durationMs: this.now() - now,
      },
      'Cycle completed',
    );
    return report;
  }

  // ─── 시그널 수집 ─────────────────────────────────────────────────────────

  private async marketOpen(): Promise<boolean> {
    try {
      return await withTimeout(
        this.deps.prices.isMarketOpen(),
        this.deps.signalTimeoutMs,
        () => new UnavailableError('prices', 'isMarketOpen timed out'),
      );
    } catch (err) {
      log.warn({ err }, 'Market session check failed, treating market as closed');
      return false;
    }
  }

  private async fetchCondition(): Promise<MarketConditionSnapshot | null> {
    try {
      return await withTimeout(
        this.deps.conditions.snapshot(),
        this.deps.signalTimeoutMs,
        () => new UnavailableError('market-condition', 'snapshot timed out'),
      );
    } catch (err) {
      log.warn({ err }, 'Market condition unavailable, entries suspended this cycle');
      return null;
    }
  }

  private async gatherSignals(instruments: readonly InstrumentSettings[]): Promise<Map<string, InstrumentSignal>> {
    const { prices, valuations, signalTimeoutMs } = this.deps;
    const bounded = <T>(work: Promise<T>, what: string): Promise<T> =>
      withTimeout(work, signalTimeoutMs, () => new UnavailableError(what, `timed out after ${signalTimeoutMs}ms`));

    const results = await Promise.all(
      instruments.map(async (inst) => {
        const [price, fair, owned] = await Promise.allSettled([
          bounded(prices.currentPrice(inst.code), 'price'),
          bounded(valuations.fairValueSignal(inst.code), 'valuation'),
          bounded(prices.ownedQuantity(inst.code), 'balance'),
        ]);
        if (price.status === 'rejected') {
          log.warn({ code: inst.code, err: price.reason }, 'Price unavailable, no decision this cycle');
          return null;
        }
        if (fair.status === 'rejected') {
          log.warn({ code: inst.code, err: fair.reason }, 'Valuation unavailable, exits only');
        }
        const signal: InstrumentSignal = {
          code: inst.code,
          price: price.value,
          fairValue: fair.status === 'fulfilled' ? fair.value.fairValue : null,
          ownedQuantity: owned.status === 'fulfilled' ? owned.value : null,
        };
        return signal;
      }),
    );

    const signals = new Map<string, InstrumentSignal>();
    for (const s of results) {
      if (s) signals.set(s.code, s);
    }
    return signals;
  }

  /** 계좌 수량 ≠ 원장 잔량이면 경고 (같은 불일치는 한 번만 알림) */
  private reconcile(signal: InstrumentSignal): void {
    if (signal.ownedQuantity === null) return;
    const ledgerQuantity = openQuantity(this.ledger(signal.code));
    if (ledgerQuantity === signal.ownedQuantity) {
      this.lastMismatch.delete(signal.code);
      return;
    }
    const key = `${ledgerQuantity}/${signal.ownedQuantity}`;
    if (this.lastMismatch.get(signal.code) === key) return;
    this.lastMismatch.set(signal.code, key);
    log.warn({ code: signal.code, ledgerQuantity, brokerQuantity: signal.ownedQuantity }, 'Holdings mismatch');
    this.audit((a) => a.warn('trading-cycle', 'RECONCILIATION_MISMATCH', `${signal.code} ${key}`));
    this.deps.notifier.notify({
      type: 'RECONCILIATION_MISMATCH',
      code: signal.code,
      ledgerQuantity,
      brokerQuantity: signal.ownedQuantity,
    });
  }

  private applyModeChange(trips: readonly BreakerTrip[]): void {
    const change = this.deps.mode.applyBreakers(trips);
    if (!change) return;
    this.audit((a) => a.warn('state-machine', `${change.from}->${change.to}`, change.reason));
    this.deps.notifier.notify({ type: 'MODE_CHANGED', from: change.from, to: change.to, reason: change.reason });
  }

  // ─── 판단 ────────────────────────────────────────────────────────────────

  private plan(
    settings: TradingSettings,
    signals: ReadonlyMap<string, InstrumentSignal>,
    condition: MarketConditionSnapshot | null,
    entriesSuspended: boolean,
    now: number,
    isolated: Set<string>,
  ): CyclePlan[] {
    const budget = this.deps.budget;
    const totalExposure = [...this.ledgers.values()].reduce((sum, l) => sum + exposure(l), 0);
    let allowance = budget.allowedNewAllocation(totalExposure);
    const plans: CyclePlan[] = [];

    for (const inst of settings.instruments) {
      const signal = signals.get(inst.code);
      if (!signal) {
        plans.push({ kind: 'NONE', code: inst.code, note: 'no signal' });
        continue;
      }
      const ledger = this.ledger(inst.code);

      try {
        const exit = decide(
          ledger,
          signal.price,
          signal.fairValue,
          condition,
          exitParamsFor(settings, inst.code),
          settings.lotSize,
          now,
        );
        if (exit.action !== 'HOLD') {
          plans.push({ kind: 'SELL', exit: { code: inst.code, price: signal.price, decision: exit } });
          continue;
        }
        if (entriesSuspended) {
          plans.push({ kind: 'NONE', code: inst.code, note: 'entries suspended' });
          continue;
        }
        if (signal.fairValue === null) {
          plans.push({ kind: 'NONE', code: inst.code, note: 'no valuation' });
          continue;
        }

        const share = Math.max(0, budget.state.effectiveBudget * inst.weight - exposure(ledger));
        const entry = this.planEntry(settings, ledger, signal.price, signal.fairValue, Math.min(share, allowance), now);
        if (typeof entry === 'string') {
          plans.push({ kind: 'NONE', code: inst.code, note: entry });
          continue;
        }
        allowance -= entry.amount;
        plans.push({ kind: 'BUY', entry });
      } catch (err) {
        isolated.add(inst.code);
        log.error({ err, code: inst.code }, 'Decision failed, instrument skipped this cycle');
        this.deps.notifier.notify({ type: 'INVARIANT_VIOLATION', code: inst.code, message: String(err) });
        plans.push({ kind: 'NONE', code: inst.code, note: 'isolated' });
      }
    }
    return plans;
  }

  /** 진입 계획 또는 진입하지 않는 사유 */
  private planEntry(
    settings: TradingSettings,
    ledger: InstrumentLedger,
    price: number,
    fairValue: number,
    available: number,
    now: number,
  ): EntryPlan | string {
    const stageNumber = nextStageNumber(ledger, settings.maxStages);
    if (stageNumber === null) return 'all stages open';
    if (buysOnDay(ledger, now) >= settings.reentry.maxDailyBuysPerInstrument) return 'daily buy limit';

    const reentryAllowed = isReentryAllowed(ledger, stageNumber, now, price, settings.reentry);
    if (stageNumber === 1 && !reentryAllowed) return 'stage 1 cooldown';

    if (stageNumber > 1) {
      const drop = ledger.dropRequirements[String(stageNumber)] ?? settings.dropRequirements.fallbackDrop;
      if (!meetsDropRequirement(ledger, stageNumber, price, drop)) return `drop requirement ${drop}`;
    }

    const rate = discountRate(fairValue, price);
    const amount = sizeForStage(rate, available, stageNumber, settings.sizing.bands, {
      reentryAllowed,
      previousStageOpen: stageNumber === 1 || isStageOpen(ledger, stageNumber - 1),
    });
    const quantity = quantityForAmount(amount, price, settings.lotSize);
    if (quantity <= 0) return amount > 0 ? 'below one lot' : 'no allocation';

    return {
      code: ledger.code,
      stageNumber,
      price,
      quantity,
      amount: quantity * price,
      discountRate: rate,
    };
  }

  // ─── 주문·반영 ───────────────────────────────────────────────────────────

  private async execute(plan: CyclePlan): Promise<OrderOutcome> {
    const { orders, orderTimeoutMs } = this.deps;
    let code: string;
    let work: Promise<OrderConfirmation>;
    if (plan.kind === 'BUY') {
      code = plan.entry.code;
      work = orders.placeBuy(code, plan.entry.price, plan.entry.quantity);
    } else if (plan.kind === 'SELL') {
      code = plan.exit.code;
      work = orders.placeSell(code, plan.exit.price, plan.exit.decision.quantity);
    } else {
      return { kind: 'REJECTED', plan, reason: 'nothing to place' };
    }

    try {
      const confirmation = await withTimeout(
        work,
        orderTimeoutMs,
        () => new OrderTimeoutError(`${plan.kind} ${code}`, orderTimeoutMs),
      );
      return { kind: 'FILLED', plan, confirmation };
    } catch (err) {
      if (err instanceof OrderTimeoutError) {
        log.warn({ code, timeoutMs: orderTimeoutMs }, 'Order timed out, no ledger change');
        this.audit((a) => a.warn('orders', 'TIMEOUT', `${plan.kind} ${code}`));
        this.deps.notifier.notify({ type: 'ORDER_TIMEOUT', code, timeoutMs: orderTimeoutMs });
        return { kind: 'TIMEOUT', plan };
      }
      const reason = err instanceof OrderRejectedError ? err.reason : String(err);
      if (!(err instanceof OrderRejectedError)) {
        log.error({ err, code }, 'Order placement failed');
      } else {
        log.warn({ code, reason }, 'Order rejected, no ledger change');
      }
      this.audit((a) => a.warn('orders', 'REJECTED', `${plan.kind} ${code}: ${reason}`));
      this.deps.notifier.notify({ type: 'ORDER_REJECTED', code, reason });
      return { kind: 'REJECTED', plan, reason };
    }
  }

  /**
   * 체결 확인분을 작업 사본에 반영하고 체결 기록을 돌려준다.
   * 불변식 위반이면 해당 종목만 격리하고 null.
   */
  private applyFill(
    plan: CyclePlan,
    confirmation: OrderConfirmation,
    settings: TradingSettings,
    now: number,
    isolated: Set<string>,
  ): FillRecord | null {
    if (plan.kind === 'NONE') return null;
    const code = plan.kind === 'BUY' ? plan.entry.code : plan.exit.code;
    if (confirmation.quantity <= 0) return null;
    const ledger = this.ledger(code);

    try {
      if (plan.kind === 'BUY') {
        const updated = openStage(ledger, confirmation.price, confirmation.quantity, now, settings.maxStages);
        this.ledgers.set(code, updated);
        return {
          orderId: confirmation.orderId,
          timestamp: now,
          code,
          side: 'BUY',
          stageNumber: plan.entry.stageNumber,
          price: confirmation.price,
          quantity: confirmation.quantity,
          realizedPnl: null,
          reason: null,
        };
      }

      const { decision } = plan.exit;
      const stageNumber = decision.stageNumber;
      if (stageNumber === null || decision.reason === 'HOLD') return null;
      const result = closeStagePartial(
        ledger,
        stageNumber,
        confirmation.quantity,
        confirmation.price,
        now,
        decision.reason,
        this.deps.fees,
      );
      this.ledgers.set(code, result.ledger);
      this.deps.budget.recordRealized(result.realizedPnl, now);
      return {
        orderId: confirmation.orderId,
        timestamp: now,
        code,
        side: 'SELL',
        stageNumber,
        price: confirmation.price,
        quantity: confirmation.quantity,
        realizedPnl: result.realizedPnl,
        reason: decision.reason,
      };
    } catch (err) {
      if (!(err instanceof LedgerInvariantError) && !(err instanceof RangeError)) throw err;
      isolated.add(code);
      log.error({ err, code, orderId: confirmation.orderId }, 'Ledger invariant violated, instrument isolated');
      const message = err.message;
      this.audit((a) => a.error('ledger', 'INVARIANT_VIOLATION', `${code}: ${message}`));
      this.deps.notifier.notify({ type: 'INVARIANT_VIOLATION', code, message });
      return null;
    }
  }

  private announceFill(fill: FillRecord): void {
    const { code, side, stageNumber, price, quantity } = fill;
    log.info({ code, side, stageNumber, price, quantity, pnl: fill.realizedPnl }, 'Fill applied');
    this.audit((a) => a.recordFill(fill));
    this.deps.notifier.notify({
      type: 'FILL',
      side,
      code,
      stageNumber,
      price,
      quantity,
      ...(fill.realizedPnl !== null ? { realizedPnl: fill.realizedPnl } : {}),
      ...(fill.reason !== null ? { reason: fill.reason } : {}),
    });
  }

  /** 감사 로그 기록 실패는 로그만 남기고 사이클은 계속한다 */
  private audit(write: (sink: AuditSink) => void): void {
    const sink = this.deps.audit;
    if (!sink) return;
    try {
      write(sink);
    } catch (err) {
      log.error({ err }, 'Audit log write failed');
    }
  }

  // ─── 저장 ────────────────────────────────────────────────────────────────

  private persistPending(): { saved: boolean; generation: string | null } {
    if (!this.dirty) return { saved: false, generation: null };
    try {
      const generation = this.deps.store.save(this.ledgers, this.deps.budget.state);
      this.dirty = false;
      this.audit((a) => a.info('ledger-store', 'CYCLE_COMMITTED', generation));
      return { saved: true, generation };
    } catch (err) {
      if (!(err instanceof PersistenceError)) throw err;
      log.error({ err }, 'Cycle commit failed, working copy kept for next cycle');
      const message = err.message;
      this.audit((a) => a.error('ledger-store', 'COMMIT_FAILED', message));
      this.deps.notifier.notify({ type: 'PERSISTENCE_FAILED', message: err.message });
      return { saved: false, generation: null };
    }
  }

  private ledger(code: string): InstrumentLedger {
    const ledger = this.ledgers.get(code);
    if (!ledger) throw new Error(`No working ledger for ${code}`);
    return ledger;
  }

  private skipped(reason: SkipReason, startedAt: number, saved: boolean, generation: string | null): CycleReport {
    log.debug({ reason }, 'Cycle skipped');
    return {
      status: 'SKIPPED',
      skipReason: reason,
      startedAt,
      mode: this.deps.mode.current,
      entriesSuspended: !this.deps.mode.allowsEntries(),
      trips: [],
      plans: [],
      filled: 0,
      rejected: 0,
      timedOut: 0,
      isolated: [],
      saved,
      generation,
    };
  }
}
