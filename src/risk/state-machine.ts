import { createChildLogger } from '../logger.js';
import type { TradingState } from '../types/index.js';
import type { BreakerTrip } from './circuit-breaker.js';

const log = createChildLogger('state-machine');

type StateTransition = [TradingState, TradingState];

/** 허용된 상태 전이 */
const VALID_TRANSITIONS: StateTransition[] = [
  ['ACTIVE', 'ENTRIES_SUSPENDED'],
  ['ENTRIES_SUSPENDED', 'ACTIVE'],
  // 어디서든 HALTED로
  ['ACTIVE', 'HALTED'],
  ['ENTRIES_SUSPENDED', 'HALTED'],
];

export interface StateChange {
  readonly from: TradingState;
  readonly to: TradingState;
  readonly at: number;
  readonly reason: string;
}

/**
 * 트레이딩 모드 상태 머신
 * 브레이커 판정 결과로 ACTIVE ↔ ENTRIES_SUSPENDED 자동 전환.
 * HALTED는 자동으로 풀리지 않는다.
 */
export class TradingStateMachine {
  private state: TradingState = 'ACTIVE';
  private stateEnteredAt: number;
  private history: StateChange[] = [];
  private readonly now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
    this.stateEnteredAt = now();
  }

  get current(): TradingState {
    return this.state;
  }

  get stateAge(): number {
    return this.now() - this.stateEnteredAt;
  }

  transition(to: TradingState, reason: string): void {
    if (this.state === to) return; // noop

    // HALTED 해제는 reset()으로만
    if (this.state === 'HALTED') {
      throw new Error('HALTED can only be cleared with reset()');
    }
    if (!this.canTransition(to)) {
      const msg = `Invalid state transition: ${this.state} → ${to}`;
      log.error({ from: this.state, to }, msg);
      throw new Error(msg);
    }
    this.record(to, reason);
  }

  canTransition(to: TradingState): boolean {
    return VALID_TRANSITIONS.some(([from, target]) => from === this.state && target === to);
  }

  /**
   * 브레이커 판정 반영
   * @returns 상태가 바뀌었으면 변경 내역, 아니면 null
   */
  applyBreakers(trips: readonly BreakerTrip[]): StateChange | null {
    if (this.state === 'HALTED') return null;

    const halt = trips.find((t) => t.severity === 'HALT');
    const target: TradingState = halt ? 'HALTED' : trips.length > 0 ? 'ENTRIES_SUSPENDED' : 'ACTIVE';
    if (target === this.state) return null;

    const reason = trips.length > 0 ? trips.map((t) => `${t.breaker}: ${t.detail}`).join('; ') : 'breakers cleared';
    this.transition(target, reason);
    return this.history[this.history.length - 1] ?? null;
  }

  allowsEntries(): boolean {
    return this.state === 'ACTIVE';
  }

  isHalted(): boolean {
    return this.state === 'HALTED';
  }

  getHistory(): readonly StateChange[] {
    return this.history;
  }

  /** 수동 해제 */
  reset(reason: string = 'manual reset'): void {
    if (this.state === 'ACTIVE') return;
    this.record('ACTIVE', reason);
  }

  private record(to: TradingState, reason: string): void {
    const at = this.now();
    log.info({ from: this.state, to, reason }, 'State transition');
    this.history.push({ from: this.state, to, at, reason });
    this.state = to;
    this.stateEnteredAt = at;

    // 히스토리 100개 제한
    if (this.history.length > 100) {
      this.history = this.history.slice(-50);
    }
  }
}
