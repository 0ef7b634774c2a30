import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { loadSettingsFile, parseSettings, SettingsLoader, SettingsValidationError } from '../src/settings/loader.js';
import { exitParamsFor } from '../src/settings/schema.js';
import { rawSettings } from './fixtures.js';

const SHIPPED = fileURLToPath(new URL('../config/trading.json', import.meta.url));

function issuesOf(raw: unknown): string[] {
  try {
    parseSettings(raw);
  } catch (err) {
    if (err instanceof SettingsValidationError) return err.issues;
    throw err;
  }
  return [];
}

describe('parseSettings', () => {
  it('accepts the shipped settings file', () => {
    const settings = loadSettingsFile(SHIPPED);
    expect(settings.instruments.map((i) => i.code)).toEqual(['449450', '042660', '034020']);
    expect(settings.maxStages).toBe(5);
  });

  it('merges per-instrument exit overrides over the shared values', () => {
    const settings = loadSettingsFile(SHIPPED);
    const exit = exitParamsFor(settings, '042660');
    expect(exit.stopLossThreshold).toBe(0.17);
    expect(exit.stageStopLossThresholds['1']).toBe(0.15);
    expect(exitParamsFor(settings, '449450').stopLossThreshold).toBe(0.2);
  });

  it('enables the adaptive stop-loss in the shipped file only', () => {
    const shipped = exitParamsFor(loadSettingsFile(SHIPPED), '042660').adaptiveStopLoss;
    expect(shipped.enabled).toBe(true);
    expect(shipped.holdingRules.map((r) => r.minDays)).toEqual([90, 180, 365]);
    expect(parseSettings(rawSettings()).exit.adaptiveStopLoss.enabled).toBe(false);
  });

  it('fills defaults for omitted sections', () => {
    const settings = parseSettings(rawSettings());
    expect(settings.exit.profitTarget).toBe(0.08);
    expect(settings.exit.adaptiveStopLoss.trendEasing.uptrend).toBe(-0.01);
    expect(settings.reentry.cooldownHours).toBe(6);
    expect(settings.dropRequirements.baseDrops).toEqual({ '2': 0.045, '3': 0.055, '4': 0.07, '5': 0.085 });
    expect(settings.instruments[0]?.sector).toBe('test');
  });

  it('rejects sizing bands that allocate more for a smaller discount', () => {
    const raw = {
      ...rawSettings(),
      sizing: { bands: [{ minDiscount: 0.5, fraction: 0.1 }, { minDiscount: 0.3, fraction: 0.25 }] },
    };
    expect(issuesOf(raw)).toEqual(['sizing.bands.1.fraction: band fractions must be non-increasing as discount decreases']);
  });

  it('rejects unsorted band thresholds', () => {
    const raw = {
      ...rawSettings(),
      sizing: { bands: [{ minDiscount: 0.1, fraction: 0.4 }, { minDiscount: 0.3, fraction: 0.25 }] },
    };
    expect(issuesOf(raw)).toEqual(['sizing.bands.1.minDiscount: bands must be sorted by minDiscount, strictly descending']);
  });

  it('rejects budget multipliers that grow as performance falls', () => {
    const raw = {
      ...rawSettings(),
      budget: { bands: [{ minPerformance: 0.1, multiplier: 1.0 }, { minPerformance: 0, multiplier: 1.2 }] },
    };
    expect(issuesOf(raw)).toEqual([
      'budget.bands.1.multiplier: budget multipliers must be non-increasing as performance decreases',
    ]);
  });

  it('rejects overweight or duplicate instruments', () => {
    const raw = {
      ...rawSettings(),
      instruments: [
        { code: 'AAA', name: 'A', weight: 0.6 },
        { code: 'AAA', name: 'A again', weight: 0.6 },
      ],
    };
    expect(issuesOf(raw)).toEqual([
      'instruments.1.code: duplicate instrument code AAA',
      'instruments: instrument weights sum to 1.2000 (> 1)',
    ]);
  });
});

describe('SettingsLoader', () => {
  let dir: string;
  let file: string;

  const write = (raw: unknown, mtimeSec: number): void => {
    fs.writeFileSync(file, typeof raw === 'string' ? raw : JSON.stringify(raw));
    fs.utimesSync(file, mtimeSec, mtimeSec);
  };

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'settings-'));
    file = path.join(dir, 'trading.json');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('reloads only when the file changes', () => {
    write(rawSettings(), 1_000_000);
    const loader = new SettingsLoader(file);
    const first = loader.get();
    expect(loader.get()).toBe(first);

    write({ ...rawSettings(), lotSize: 10 }, 1_000_100);
    expect(loader.get().lotSize).toBe(10);
  });

  it('keeps the previous settings when an edit is invalid', () => {
    write(rawSettings(), 1_000_000);
    const loader = new SettingsLoader(file);
    const first = loader.get();

    write('{ not json', 1_000_100);
    expect(loader.get()).toBe(first);

    write({ ...rawSettings(), lotSize: 0 }, 1_000_200);
    expect(loader.get()).toBe(first);
  });

  it('fails on an invalid file at first load', () => {
    write({ ...rawSettings(), initialBudget: -1 }, 1_000_000);
    expect(() => new SettingsLoader(file).get()).toThrow(SettingsValidationError);
  });
});
