import { readFile, stat } from 'node:fs/promises';
import { z } from 'zod';
import { UnavailableError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import type { FairValueSignal, MarketConditionSnapshot } from '../types/index.js';
import type { MarketConditionSource, ValuationSource } from './sources.js';

const log = createChildLogger('market-feed');

const timestampSchema = z.union([
  z.number().int().nonnegative(),
  z.string().datetime({ offset: true }).transform((s) => Date.parse(s)),
]);

const instrumentQuoteSchema = z.object({
  price: z.number().positive(),
  fairValue: z.number().positive().optional(),
  confidence: z.number().min(0).max(1).default(1),
  valuationAsOf: timestampSchema.optional(),
  rsi: z.number().min(0).max(100).optional(),
  volatilityPct: z.number().nonnegative().optional(),
});

export const marketFeedSchema = z.object({
  asOf: timestampSchema,
  market: z
    .object({
      trend: z.enum(['strong_uptrend', 'uptrend', 'neutral', 'downtrend', 'strong_downtrend']).default('neutral'),
      changePct: z.number().optional(),
    })
    .default({}),
  instruments: z.record(z.string(), instrumentQuoteSchema),
});

export type MarketFeedDocument = z.infer<typeof marketFeedSchema>;

export interface FileMarketFeedOptions {
  readonly path: string;
  readonly maxAgeMs: number;
  readonly now?: () => number;
}

/**
 * 외부 수집기가 기록한 JSON 스냅샷 기반 시세/적정가/시장 상황 소스
 * mtime이 바뀐 경우에만 다시 읽는다.
 */
export class FileMarketFeed implements ValuationSource, MarketConditionSource {
  private readonly path: string;
  private readonly maxAgeMs: number;
  private readonly now: () => number;
  private cached: MarketFeedDocument | null = null;
  private cachedMtimeMs = -1;

  constructor(options: FileMarketFeedOptions) {
    this.path = options.path;
    this.maxAgeMs = options.maxAgeMs;
    this.now = options.now ?? Date.now;
  }

  async snapshot(): Promise<MarketConditionSnapshot> {
    const doc = await this.document();
    const instruments: Record<string, { rsi?: number; volatilityPct?: number }> = {};
    for (const [code, q] of Object.entries(doc.instruments)) {
      instruments[code] = {
        ...(q.rsi !== undefined ? { rsi: q.rsi } : {}),
        ...(q.volatilityPct !== undefined ? { volatilityPct: q.volatilityPct } : {}),
      };
    }
    return {
      asOf: doc.asOf,
      trend: doc.market.trend,
      ...(doc.market.changePct !== undefined ? { marketChangePct: doc.market.changePct } : {}),
      instruments,
    };
  }

  async currentPrice(code: string): Promise<number> {
    const doc = await this.document();
    const quote = doc.instruments[code];
    if (!quote) throw new UnavailableError('market-feed', `no quote for ${code}`);
    return quote.price;
  }

  async fairValueSignal(code: string): Promise<FairValueSignal> {
    const doc = await this.document();
    const quote = doc.instruments[code];
    if (quote?.fairValue === undefined) {
      throw new UnavailableError('market-feed', `no fair value for ${code}`);
    }
    return {
      fairValue: quote.fairValue,
      confidence: quote.confidence,
      ...(quote.valuationAsOf !== undefined ? { asOf: quote.valuationAsOf } : {}),
    };
  }

  private async document(): Promise<MarketFeedDocument> {
    let mtimeMs: number;
    try {
      mtimeMs = (await stat(this.path)).mtimeMs;
    } catch (err) {
      throw new UnavailableError('market-feed', `cannot stat ${this.path}`, { cause: err });
    }

    if (!this.cached || mtimeMs !== this.cachedMtimeMs) {
      this.cached = await this.read();
      this.cachedMtimeMs = mtimeMs;
      log.debug({ path: this.path, asOf: this.cached.asOf }, 'Market feed loaded');
    }

    const age = this.now() - this.cached.asOf;
    if (age > this.maxAgeMs) {
      throw new UnavailableError('market-feed', `snapshot is stale (${Math.round(age / 60_000)} min old)`);
    }
    return this.cached;
  }

  private async read(): Promise<MarketFeedDocument> {
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(this.path, 'utf-8'));
    } catch (err) {
      throw new UnavailableError('market-feed', `unreadable snapshot ${this.path}`, { cause: err });
    }
    const parsed = marketFeedSchema.safeParse(raw);
    if (!parsed.success) {
      throw new UnavailableError(
        'market-feed',
        parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
      );
    }
    return parsed.data;
  }
}
