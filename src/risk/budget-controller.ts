import { createChildLogger } from '../logger.js';
import { kstDayKey } from '../market/market-hours.js';
import type { BudgetSettings } from '../settings/schema.js';
import type { BudgetState, EquitySample } from '../types/index.js';

const log = createChildLogger('budget');

const DAY_MS = 24 * 3600 * 1000;

/**
 * 성과 기반 예산 재조정
 * performance ≥ minPerformance인 첫 밴드의 배수, 없으면 floorMultiplier.
 * 결과 배수는 [floor, ceiling]으로 제한.
 */
export function rescale(initialBudget: number, trailingPerformance: number, settings: BudgetSettings): number {
  const band = settings.bands.find((b) => trailingPerformance >= b.minPerformance);
  const multiplier = band?.multiplier ?? settings.floorMultiplier;
  const clamped = Math.min(Math.max(multiplier, settings.floorMultiplier), settings.ceilingMultiplier);
  return initialBudget * clamped;
}

/**
 * 신규 배분 허용액 = effective × min(maxExposure, 1 − minCash) − 현재 익스포저 (≥ 0)
 */
export function enforceExposureCap(effectiveBudget: number, exposure: number, settings: BudgetSettings): number {
  const capFraction = Math.min(settings.maxExposureFraction, 1 - settings.minCashFraction);
  return Math.max(0, effectiveBudget * capFraction - exposure);
}

/**
 * 예산 상태의 유일한 변경 주체
 * 자산 샘플은 KST 일자별 마지막 값만 남기고 성과 기간 밖은 버린다.
 */
export class BudgetController {
  private settings: BudgetSettings;
  private current: BudgetState;

  constructor(settings: BudgetSettings, state: BudgetState) {
    this.settings = settings;
    this.current = state;
  }

  /** 저장된 상태가 없으면 초기 예산으로 시작 */
  static restore(
    saved: BudgetState | null,
    initialBudget: number,
    settings: BudgetSettings,
    now: number,
  ): BudgetController {
    if (!saved) {
      return new BudgetController(settings, {
        initialBudget,
        effectiveBudget: initialBudget,
        realizedPnl: 0,
        performanceWindow: [],
        updatedAt: now,
      });
    }
    if (saved.initialBudget !== initialBudget) {
      log.info({ saved: saved.initialBudget, configured: initialBudget }, 'Initial budget changed in settings');
      return new BudgetController(settings, { ...saved, initialBudget, updatedAt: now });
    }
    return new BudgetController(settings, saved);
  }

  get state(): BudgetState {
    return this.current;
  }

  updateSettings(settings: BudgetSettings): void {
    this.settings = settings;
  }

  recordRealized(pnl: number, now: number): void {
    this.current = { ...this.current, realizedPnl: this.current.realizedPnl + pnl, updatedAt: now };
  }

  recordEquity(now: number, equity: number): void {
    const horizonStart = now - this.settings.performanceHorizonDays * DAY_MS;
    const day = kstDayKey(now);
    const kept = this.current.performanceWindow.filter(
      (s) => s.timestamp >= horizonStart && kstDayKey(s.timestamp) !== day,
    );
    const sample: EquitySample = { timestamp: now, equity };
    this.current = { ...this.current, performanceWindow: [...kept, sample], updatedAt: now };
  }

  /** 기간 첫 샘플 대비 마지막 샘플 수익률 (샘플 2개 미만이면 0) */
  trailingPerformance(): number {
    const window = this.current.performanceWindow;
    const first = window[0];
    const last = window[window.length - 1];
    if (!first || !last || window.length < 2 || !(first.equity > 0)) return 0;
    return (last.equity - first.equity) / first.equity;
  }

  refresh(now: number): number {
    const performance = this.trailingPerformance();
    const effectiveBudget = rescale(this.current.initialBudget, performance, this.settings);
    if (effectiveBudget !== this.current.effectiveBudget) {
      log.info(
        { performance: Number(performance.toFixed(4)), from: this.current.effectiveBudget, to: effectiveBudget },
        'Effective budget rescaled',
      );
    }
    this.current = { ...this.current, effectiveBudget, updatedAt: now };
    return effectiveBudget;
  }

  allowedNewAllocation(exposure: number): number {
    return enforceExposureCap(this.current.effectiveBudget, exposure, this.settings);
  }
}
