import { describe, it, expect } from 'vitest';
import {
  conditionFor,
  dropRequirementFor,
  meetsDropRequirement,
  withDropRequirements,
  type DropCondition,
} from '../src/ledger/drop-requirement.js';
import { createLedger, openStage } from '../src/ledger/position-ledger.js';
import { dropRequirementSchema } from '../src/settings/schema.js';
import { T0, ref } from './fixtures.js';

const settings = dropRequirementSchema.parse({});
const neutral: DropCondition = { trend: 'neutral' };

describe('dropRequirementFor', () => {
  it('needs no drop for the first stage', () => {
    expect(dropRequirementFor(1, settings, neutral)).toEqual({ stageNumber: 1, base: 0, value: 0, adjustments: [] });
  });

  it('uses the base drop without a condition', () => {
    expect(dropRequirementFor(2, settings, null).value).toBe(0.045);
    expect(dropRequirementFor(5, settings, null).value).toBe(0.085);
  });

  it('lowers the requirement when oversold in a downtrend', () => {
    const result = dropRequirementFor(2, settings, { trend: 'downtrend', rsi: 20 });
    expect(result.value).toBe(0.02);
    expect(result.adjustments).toEqual(['rsi_oversold(20.0)', 'downtrend']);
  });

  it('raises the requirement when overbought in an uptrend', () => {
    expect(dropRequirementFor(2, settings, { trend: 'uptrend', rsi: 80 }).value).toBe(0.065);
  });

  it('adjusts only above the volatility threshold', () => {
    expect(dropRequirementFor(2, settings, { trend: 'neutral', volatilityPct: 6 }).value).toBe(0.04);
    expect(dropRequirementFor(2, settings, { trend: 'neutral', volatilityPct: 5 }).value).toBe(0.045);
  });

  it('clamps to the configured band around the base', () => {
    const low = dropRequirementSchema.parse({ adjustments: { downtrendBonus: -0.05 } });
    expect(dropRequirementFor(2, low, { trend: 'downtrend' }).value).toBe(0.0135);
    const high = dropRequirementSchema.parse({ adjustments: { uptrendPenalty: 0.1 } });
    expect(dropRequirementFor(2, high, { trend: 'uptrend' }).value).toBe(0.09);
  });

  it('falls back when a stage has no base drop', () => {
    const sparse = dropRequirementSchema.parse({ baseDrops: {} });
    expect(dropRequirementFor(3, sparse, null).value).toBe(0.06);
  });

  it('ignores the condition when disabled', () => {
    const off = dropRequirementSchema.parse({ enabled: false });
    expect(dropRequirementFor(2, off, { trend: 'strong_downtrend', rsi: 10 }).value).toBe(0.045);
  });
});

describe('conditionFor', () => {
  it('merges the market trend with the instrument entry', () => {
    const snap = { asOf: T0, trend: 'uptrend' as const, instruments: { AAA: { rsi: 40 } } };
    expect(conditionFor(snap, 'AAA')).toEqual({ trend: 'uptrend', rsi: 40 });
    expect(conditionFor(snap, 'ZZZ')).toEqual({ trend: 'uptrend' });
    expect(conditionFor(null, 'AAA')).toBeNull();
  });
});

describe('withDropRequirements', () => {
  it('records drops for stages 2..maxStages and returns the same ledger when unchanged', () => {
    const ledger = createLedger(ref('AAA'), T0);
    const next = withDropRequirements(ledger, settings, null, 5);
    expect(next.dropRequirements).toEqual({ '2': 0.045, '3': 0.055, '4': 0.07, '5': 0.085 });
    expect(withDropRequirements(next, settings, null, 5)).toBe(next);
  });
});

describe('meetsDropRequirement', () => {
  const ledger = openStage(createLedger(ref('AAA'), T0), 10000, 10, T0);

  it('compares against the previous stage entry price', () => {
    expect(meetsDropRequirement(ledger, 2, 9500, 0.045)).toBe(true);
    expect(meetsDropRequirement(ledger, 2, 9600, 0.045)).toBe(false);
  });

  it('requires the previous stage to be open', () => {
    expect(meetsDropRequirement(ledger, 3, 5000, 0.045)).toBe(false);
    expect(meetsDropRequirement(ledger, 1, 20000, 0.045)).toBe(true);
  });
});
