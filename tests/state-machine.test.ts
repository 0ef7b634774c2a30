import { describe, it, expect } from 'vitest';
import type { BreakerTrip } from '../src/risk/circuit-breaker.js';
import { TradingStateMachine } from '../src/risk/state-machine.js';

const decline: BreakerTrip = { breaker: 'BROAD_DECLINE', severity: 'SUSPEND', detail: 'market -3.50% <= -3%' };
const loss: BreakerTrip = { breaker: 'PORTFOLIO_LOSS', severity: 'HALT', detail: 'total P&L -3500000' };

describe('TradingStateMachine', () => {
  it('should start in ACTIVE', () => {
    const sm = new TradingStateMachine();
    expect(sm.current).toBe('ACTIVE');
    expect(sm.allowsEntries()).toBe(true);
    expect(sm.isHalted()).toBe(false);
  });

  it('should allow valid transitions', () => {
    const sm = new TradingStateMachine();
    sm.transition('ENTRIES_SUSPENDED', 'test');
    expect(sm.allowsEntries()).toBe(false);
    sm.transition('ACTIVE', 'test');
    expect(sm.allowsEntries()).toBe(true);
  });

  it('should allow HALTED from any state', () => {
    const sm = new TradingStateMachine();
    sm.transition('ENTRIES_SUSPENDED', 'test');
    sm.transition('HALTED', 'manual halt');
    expect(sm.isHalted()).toBe(true);
    expect(sm.allowsEntries()).toBe(false);
  });

  it('should only leave HALTED through reset', () => {
    const sm = new TradingStateMachine();
    sm.transition('HALTED', 'manual halt');
    expect(() => sm.transition('ACTIVE', 'test')).toThrow('HALTED can only be cleared with reset()');
    expect(() => sm.transition('ENTRIES_SUSPENDED', 'test')).toThrow('HALTED can only be cleared with reset()');
    expect(sm.canTransition('ACTIVE')).toBe(false);
    expect(sm.canTransition('ENTRIES_SUSPENDED')).toBe(false);

    sm.reset('operator');
    expect(sm.current).toBe('ACTIVE');
  });

  it('should report which transitions are allowed', () => {
    const sm = new TradingStateMachine();
    expect(sm.canTransition('HALTED')).toBe(true);
    sm.transition('ENTRIES_SUSPENDED', 'test');
    expect(sm.canTransition('ACTIVE')).toBe(true);
  });

  it('should record history', () => {
    let clock = 1000;
    const sm = new TradingStateMachine(() => clock);
    sm.transition('ENTRIES_SUSPENDED', 'breaker');
    clock = 2000;
    sm.transition('HALTED', 'loss');

    expect(sm.getHistory()).toEqual([
      { from: 'ACTIVE', to: 'ENTRIES_SUSPENDED', at: 1000, reason: 'breaker' },
      { from: 'ENTRIES_SUSPENDED', to: 'HALTED', at: 2000, reason: 'loss' },
    ]);
    clock = 2500;
    expect(sm.stateAge).toBe(500);
  });

  it('should noop on same-state transition', () => {
    const sm = new TradingStateMachine();
    sm.transition('ACTIVE', 'noop');
    sm.reset();
    expect(sm.getHistory()).toHaveLength(0);
  });

  describe('applyBreakers', () => {
    it('suspends entries while a breaker is tripped and resumes when cleared', () => {
      const sm = new TradingStateMachine(() => 42);
      expect(sm.applyBreakers([decline])).toEqual({
        from: 'ACTIVE',
        to: 'ENTRIES_SUSPENDED',
        at: 42,
        reason: 'BROAD_DECLINE: market -3.50% <= -3%',
      });
      expect(sm.applyBreakers([decline])).toBeNull();
      expect(sm.applyBreakers([])?.reason).toBe('breakers cleared');
      expect(sm.current).toBe('ACTIVE');
    });

    it('halts on a HALT trip and stays halted', () => {
      const sm = new TradingStateMachine();
      expect(sm.applyBreakers([decline, loss])?.to).toBe('HALTED');
      expect(sm.applyBreakers([])).toBeNull();
      expect(sm.isHalted()).toBe(true);
    });
  });
});
