import { parseSettings } from '../src/settings/loader.js';
import type { TradingSettings } from '../src/settings/schema.js';
import type { InstrumentRef } from '../src/types/index.js';

export const HOUR = 3600 * 1000;
export const DAY = 24 * HOUR;

/** 2026-03-02 (월) 10:00 KST */
export const T0 = Date.UTC(2026, 2, 2, 1, 0);

export function ref(code: string): InstrumentRef {
  return { code, name: `Test ${code}`, sector: 'test' };
}

export const SIZING_BANDS = [
  { minDiscount: 0.5, fraction: 0.4 },
  { minDiscount: 0.3, fraction: 0.25 },
  { minDiscount: 0.1, fraction: 0.15 },
  { minDiscount: 0, fraction: 0.05 },
];

export const BUDGET_BANDS = [
  { minPerformance: 0.15, multiplier: 1.4 },
  { minPerformance: 0.1, multiplier: 1.2 },
  { minPerformance: 0.05, multiplier: 1.1 },
  { minPerformance: -0.05, multiplier: 1.0 },
  { minPerformance: -0.1, multiplier: 0.95 },
  { minPerformance: -0.15, multiplier: 0.9 },
  { minPerformance: -0.2, multiplier: 0.85 },
];

export function rawSettings(): Record<string, unknown> {
  return {
    initialBudget: 10_000_000,
    sizing: { bands: SIZING_BANDS },
    budget: { bands: BUDGET_BANDS },
    instruments: [
      { code: 'AAA', name: 'Test AAA', sector: 'test', weight: 0.4 },
      { code: 'BBB', name: 'Test BBB', sector: 'test', weight: 0.3 },
    ],
  };
}

export function testSettings(overrides: Record<string, unknown> = {}): TradingSettings {
  return parseSettings({ ...rawSettings(), ...overrides }, 'test');
}
