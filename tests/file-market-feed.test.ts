import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { UnavailableError } from '../src/errors.js';
import { FileMarketFeed } from '../src/market/file-market-feed.js';
import { T0 } from './fixtures.js';

const MINUTE = 60_000;

describe('FileMarketFeed', () => {
  let dir: string;
  let file: string;
  let clock: number;

  const write = (doc: unknown, mtimeSec: number): void => {
    fs.writeFileSync(file, JSON.stringify(doc));
    fs.utimesSync(file, mtimeSec, mtimeSec);
  };

  const feed = (): FileMarketFeed => new FileMarketFeed({ path: file, maxAgeMs: 10 * MINUTE, now: () => clock });

  const sample = (aaaPrice = 10000) => ({
    asOf: '2026-03-02T10:00:00+09:00',
    market: { trend: 'downtrend', changePct: -3.5 },
    instruments: {
      AAA: { price: aaaPrice, fairValue: 12000, rsi: 28 },
      BBB: { price: 5000 },
    },
  });

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'feed-'));
    file = path.join(dir, 'market.json');
    clock = T0 + MINUTE;
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('maps the snapshot document', async () => {
    write(sample(), 1_000_000);
    expect(await feed().snapshot()).toEqual({
      asOf: T0,
      trend: 'downtrend',
      marketChangePct: -3.5,
      instruments: { AAA: { rsi: 28 }, BBB: {} },
    });
  });

  it('serves prices and fair values', async () => {
    write(sample(), 1_000_000);
    const f = feed();
    expect(await f.currentPrice('AAA')).toBe(10000);
    expect(await f.fairValueSignal('AAA')).toEqual({ fairValue: 12000, confidence: 1 });
    await expect(f.fairValueSignal('BBB')).rejects.toThrow('market-feed unavailable: no fair value for BBB');
    await expect(f.currentPrice('CCC')).rejects.toThrow(UnavailableError);
  });

  it('refuses a stale snapshot', async () => {
    write(sample(), 1_000_000);
    clock = T0 + 11 * MINUTE;
    await expect(feed().snapshot()).rejects.toThrow('snapshot is stale (11 min old)');
  });

  it('reports a missing or invalid file as unavailable', async () => {
    await expect(feed().snapshot()).rejects.toThrow(UnavailableError);

    write({ ...sample(), instruments: { AAA: { price: -1 } } }, 1_000_000);
    await expect(feed().currentPrice('AAA')).rejects.toThrow(UnavailableError);
  });

  it('reloads when the file changes', async () => {
    write(sample(), 1_000_000);
    const f = feed();
    expect(await f.currentPrice('AAA')).toBe(10000);

    write(sample(10500), 1_000_100);
    expect(await f.currentPrice('AAA')).toBe(10500);
  });
});
