import { z } from 'zod';
import { MAX_STAGES } from '../types/index.js';

const fraction = z.number().min(0).max(1);
const positive = z.number().positive();
const stageKey = z.string().regex(/^[1-5]$/, 'stage key must be "1".."5"');

// ─── 사이징 밴드 ────────────────────────────────────────────────────────────

export const sizingBandSchema = z.object({
  /** 이 할인율 이상이면 해당 밴드 */
  minDiscount: fraction,
  /** 가용 예산 대비 배분 비율 */
  fraction,
});

export const sizingSchema = z
  .object({
    bands: z.array(sizingBandSchema).min(1),
  })
  .superRefine((v, ctx) => {
    // 할인율 내림차순 + 배분 비율 단조 비증가
    for (let i = 1; i < v.bands.length; i++) {
      const prev = v.bands[i - 1];
      const cur = v.bands[i];
      if (!prev || !cur) continue;
      if (cur.minDiscount >= prev.minDiscount) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['bands', i, 'minDiscount'],
          message: 'bands must be sorted by minDiscount, strictly descending',
        });
      }
      if (cur.fraction > prev.fraction) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['bands', i, 'fraction'],
          message: 'band fractions must be non-increasing as discount decreases',
        });
      }
    }
  });

// ─── 청산 ──────────────────────────────────────────────────────────────────

/**
 * 적응형 손절선: 차수별 손절선에 변동성·추세 보정, 장기 보유 강화 후
 * [base × clampMin, base × clampMax]로 제한. 값은 손실 비율(양수), +는 완화.
 */
export const adaptiveStopLossSchema = z.object({
  enabled: z.boolean().default(false),
  volatility: z
    .object({
      highPct: positive.default(6),
      mediumPct: positive.default(3.5),
      highEasing: fraction.default(0.04),
      mediumEasing: fraction.default(0.02),
    })
    .default({}),
  trendEasing: z
    .object({
      strong_downtrend: z.number().default(0.03),
      downtrend: z.number().default(0.015),
      neutral: z.number().default(0),
      uptrend: z.number().default(-0.01),
      strong_uptrend: z.number().default(-0.02),
    })
    .default({}),
  /** 보유 일수가 minDays 이상이면 손절선을 maxThreshold 이하로 (가장 긴 규칙 우선) */
  holdingRules: z
    .array(z.object({ minDays: z.number().nonnegative(), maxThreshold: fraction }))
    .default([
      { minDays: 90, maxThreshold: 0.12 },
      { minDays: 180, maxThreshold: 0.08 },
      { minDays: 365, maxThreshold: 0.05 },
    ]),
  clampMin: positive.default(0.5),
  clampMax: positive.default(1.5),
});

export const exitParamsSchema = z.object({
  /** 할인율이 -이 값 이하(고평가)면 전량 매도 */
  overvaluedThreshold: fraction.default(0.1),
  stopLossThreshold: fraction.default(0.2),
  /** 차수별 손절선 (없으면 stopLossThreshold) */
  stageStopLossThresholds: z.record(stageKey, fraction).default({}),
  profitTarget: positive.default(0.08),
  partialSellRatio: fraction.default(0.25),
  /** 강한 상승장에서 매도 비율 승수 */
  uptrendDampening: fraction.default(0.6),
  highProfitSellReduction: z.boolean().default(true),
  adaptiveStopLoss: adaptiveStopLossSchema.default({}),
});

// ─── 재진입 ────────────────────────────────────────────────────────────────

export const reentrySchema = z.object({
  cooldownHours: z.number().min(0).default(6),
  stopLossCooldownHours: z.number().min(0).default(24),
  minPullback: fraction.default(0.02),
  maxDailyBuysPerInstrument: z.number().int().positive().default(2),
});

// ─── 동적 하락률 ────────────────────────────────────────────────────────────

export const dropRequirementSchema = z.object({
  enabled: z.boolean().default(true),
  /** 차수별 기본 하락률 (직전 차수 진입가 대비) */
  baseDrops: z.record(stageKey, fraction).default({ '2': 0.045, '3': 0.055, '4': 0.07, '5': 0.085 }),
  fallbackDrop: fraction.default(0.06),
  adjustments: z
    .object({
      rsiOversoldBonus: z.number().default(-0.01),
      rsiOverboughtPenalty: z.number().default(0.01),
      downtrendBonus: z.number().default(-0.015),
      uptrendPenalty: z.number().default(0.01),
      volatilityBonus: z.number().default(-0.005),
    })
    .default({}),
  rsiOversold: z.number().min(0).max(100).default(25),
  rsiOverbought: z.number().min(0).max(100).default(75),
  highVolatilityPct: positive.default(5),
  /** 최종값 = clamp(base + 보정, base × clampMin, base × clampMax) */
  clampMin: positive.default(0.3),
  clampMax: positive.default(2.0),
});

// ─── 예산 ──────────────────────────────────────────────────────────────────

export const budgetBandSchema = z.object({
  minPerformance: z.number(),
  multiplier: positive,
});

export const budgetSchema = z
  .object({
    performanceHorizonDays: positive.default(30),
    bands: z.array(budgetBandSchema).min(1),
    floorMultiplier: positive.default(0.7),
    ceilingMultiplier: positive.default(1.4),
    maxExposureFraction: fraction.default(0.9),
    minCashFraction: fraction.default(0.1),
  })
  .superRefine((v, ctx) => {
    if (v.floorMultiplier > v.ceilingMultiplier) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['floorMultiplier'],
        message: 'floorMultiplier must not exceed ceilingMultiplier',
      });
    }
    for (let i = 1; i < v.bands.length; i++) {
      const prev = v.bands[i - 1];
      const cur = v.bands[i];
      if (!prev || !cur) continue;
      if (cur.minPerformance >= prev.minPerformance) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['bands', i, 'minPerformance'],
          message: 'budget bands must be sorted by minPerformance, strictly descending',
        });
      }
      if (cur.multiplier > prev.multiplier) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['bands', i, 'multiplier'],
          message: 'budget multipliers must be non-increasing as performance decreases',
        });
      }
    }
  });

// ─── 서킷 브레이커 ──────────────────────────────────────────────────────────

export const circuitBreakerSchema = z.object({
  /** 지수 당일 하락률(%)이 이 값 이상이면 신규 진입 중단 */
  broadDeclinePct: positive.default(3),
  suspendOnStrongDowntrend: z.boolean().default(false),
  dailyStopLimit: z.number().int().positive().default(2),
  consecutiveStopLimit: z.number().int().positive().default(4),
  consecutiveStopWindowDays: positive.default(7),
  /** 초기 예산 대비 누적 손실 비율 */
  maxPortfolioLoss: fraction.default(0.3),
});

// ─── 수수료 ────────────────────────────────────────────────────────────────

export const feeSchema = z.object({
  commissionRate: fraction.default(0.00015),
  taxRate: fraction.default(0.0023),
  specialTaxRate: fraction.default(0.0015),
});

// ─── 종목 ──────────────────────────────────────────────────────────────────

export const instrumentSchema = z.object({
  code: z.string().regex(/^[A-Za-z0-9._-]+$/, 'instrument code must be filename-safe'),
  name: z.string().min(1),
  sector: z.string().default('unclassified'),
  /** 유효 예산 중 이 종목 몫 */
  weight: fraction,
  exit: exitParamsSchema.partial().default({}),
});

export const tradingSettingsSchema = z
  .object({
    maxStages: z.number().int().min(1).max(MAX_STAGES).default(MAX_STAGES),
    lotSize: z.number().int().positive().default(1),
    initialBudget: positive,
    sizing: sizingSchema,
    exit: exitParamsSchema.default({}),
    reentry: reentrySchema.default({}),
    dropRequirements: dropRequirementSchema.default({}),
    budget: budgetSchema,
    circuitBreakers: circuitBreakerSchema.default({}),
    fees: feeSchema.default({}),
    instruments: z.array(instrumentSchema).min(1),
  })
  .superRefine((v, ctx) => {
    const seen = new Set<string>();
    let weightSum = 0;
    v.instruments.forEach((inst, i) => {
      if (seen.has(inst.code)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['instruments', i, 'code'],
          message: `duplicate instrument code ${inst.code}`,
        });
      }
      seen.add(inst.code);
      weightSum += inst.weight;
    });
    if (weightSum > 1 + 1e-9) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['instruments'],
        message: `instrument weights sum to ${weightSum.toFixed(4)} (> 1)`,
      });
    }
  });

export type SizingBand = z.infer<typeof sizingBandSchema>;
export type ExitParams = z.infer<typeof exitParamsSchema>;
export type AdaptiveStopLoss = z.infer<typeof adaptiveStopLossSchema>;
export type ReentryPolicy = z.infer<typeof reentrySchema>;
export type DropRequirementSettings = z.infer<typeof dropRequirementSchema>;
export type BudgetBand = z.infer<typeof budgetBandSchema>;
export type BudgetSettings = z.infer<typeof budgetSchema>;
export type CircuitBreakerSettings = z.infer<typeof circuitBreakerSchema>;
export type FeeRates = z.infer<typeof feeSchema>;
export type InstrumentSettings = z.infer<typeof instrumentSchema>;
export type TradingSettings = z.infer<typeof tradingSettingsSchema>;

/**
 * 종목별 청산 파라미터 (공통값 + 종목 오버라이드)
 */
export function exitParamsFor(settings: TradingSettings, code: string): ExitParams {
  const inst = settings.instruments.find((i) => i.code === code);
  if (!inst) return settings.exit;
  return {
    ...settings.exit,
    ...inst.exit,
    stageStopLossThresholds: {
      ...settings.exit.stageStopLossThresholds,
      ...inst.exit.stageStopLossThresholds,
    },
  };
}
