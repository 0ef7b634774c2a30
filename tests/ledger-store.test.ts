import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { CorruptStateError, PersistenceError } from '../src/errors.js';
import { zeroFees } from '../src/execution/fees.js';
import { LedgerStore, type RecoveryInfo } from '../src/ledger/ledger-store.js';
import { closeStagePartial, createLedger, openStage } from '../src/ledger/position-ledger.js';
import type { BudgetState, InstrumentLedger } from '../src/types/index.js';
import { HOUR, T0, ref } from './fixtures.js';

const MINUTE = 60_000;

/** 1·3·5 보유, 2 청산, 4 부분 매도 */
function mixedLedger(code = 'AAA'): InstrumentLedger {
  let ledger = createLedger(ref(code), T0);
  [10000, 9500, 9000, 8500, 8000].forEach((price, i) => {
    ledger = openStage(ledger, price, 10, T0 + i * HOUR);
  });
  ledger = closeStagePartial(ledger, 2, 10, 10000, T0 + 6 * HOUR, 'PROFIT_TAKE', zeroFees).ledger;
  ledger = closeStagePartial(ledger, 4, 3, 9000, T0 + 7 * HOUR, 'PROFIT_TAKE', zeroFees).ledger;
  return { ...ledger, dropRequirements: { '2': 0.045, '3': 0.055 } };
}

const budget: BudgetState = {
  initialBudget: 10_000_000,
  effectiveBudget: 11_000_000,
  realizedPnl: 6500,
  performanceWindow: [{ timestamp: T0, equity: 10_000_000 }],
  updatedAt: T0,
};

describe('LedgerStore', () => {
  let dir: string;
  let clock: number;
  let recoveries: RecoveryInfo[];

  const genId = (ts: number, seq = 0): string => `${ts}-${String(seq).padStart(3, '0')}`;
  const ledgerFile = (gen: string, code: string): string =>
    path.join(dir, 'generations', gen, 'ledgers', `${code}.json`);
  const generations = (): string[] => fs.readdirSync(path.join(dir, 'generations')).sort();

  function makeStore(overrides: { backupMaxCount?: number; backupMaxAgeHours?: number } = {}): LedgerStore {
    return new LedgerStore({
      dataDir: dir,
      backupMaxCount: overrides.backupMaxCount ?? 10,
      backupMaxAgeHours: overrides.backupMaxAgeHours ?? 24 * 30,
      now: () => clock,
      onRecovery: (info) => recoveries.push(info),
    });
  }

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'ledger-store-'));
    clock = T0;
    recoveries = [];
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('returns fresh ledgers when nothing was ever saved', () => {
      const store = makeStore();
      const ledgers = store.load([ref('AAA')]);
      expect(ledgers.get('AAA')).toEqual(createLedger(ref('AAA'), T0));
      expect(store.currentGeneration()).toBeNull();
      expect(store.loadBudget()).toBeNull();
    });

    it('creates a fresh ledger for an instrument without a document', () => {
      const store = makeStore();
      store.save(new Map([['AAA', mixedLedger()]]));
      clock = T0 + HOUR;
      expect(store.load([ref('CCC')]).get('CCC')).toEqual(createLedger(ref('CCC'), T0 + HOUR));
    });

    it('takes name and sector from the configured instrument', () => {
      const store = makeStore();
      store.save(new Map([['AAA', mixedLedger()]]));
      const loaded = store.load([{ code: 'AAA', name: 'Renamed', sector: 'semis' }]).get('AAA');
      expect(loaded?.name).toBe('Renamed');
      expect(loaded?.sector).toBe('semis');
      expect(loaded?.stages).toEqual(mixedLedger().stages);
    });
  });

  describe('save', () => {
    it('round-trips a ledger with open, closed and partially sold stages', () => {
      const ledger = mixedLedger();
      const store = makeStore();
      store.save(new Map([['AAA', ledger]]), budget);

      const reopened = makeStore();
      expect(reopened.load([ref('AAA')]).get('AAA')).toEqual(ledger);
      expect(reopened.loadBudget()).toEqual(budget);
    });

    it('writes byte-identical documents when saving the same state twice', () => {
      const ledgers = new Map([['AAA', mixedLedger()]]);
      const store = makeStore();
      const first = store.save(ledgers, budget);
      clock = T0 + MINUTE;
      const second = store.save(ledgers, budget);

      expect(first).toBe(genId(T0));
      expect(second).toBe(genId(T0 + MINUTE));
      expect(fs.readFileSync(ledgerFile(second, 'AAA'), 'utf-8')).toBe(fs.readFileSync(ledgerFile(first, 'AAA'), 'utf-8'));
      expect(store.load([ref('AAA')]).get('AAA')).toEqual(mixedLedger());
    });

    it('keeps generation ids increasing when the clock stalls or goes back', () => {
      const ledgers = new Map([['AAA', mixedLedger()]]);
      const store = makeStore();
      expect(store.save(ledgers)).toBe(genId(T0, 0));
      expect(store.save(ledgers)).toBe(genId(T0, 1));
      clock = T0 - HOUR;
      expect(store.save(ledgers)).toBe(genId(T0, 2));
      expect(store.listBackups()).toEqual([genId(T0, 0), genId(T0, 1)]);
    });

    it('carries forward documents not included in the save', () => {
      const store = makeStore();
      const bbb = mixedLedger('BBB');
      store.save(new Map([['AAA', mixedLedger()], ['BBB', bbb]]), budget);

      clock = T0 + MINUTE;
      const updated = openStage(createLedger(ref('AAA'), T0), 12000, 1, T0 + MINUTE);
      store.save(new Map([['AAA', updated]]));

      const loaded = store.load([ref('AAA'), ref('BBB')]);
      expect(loaded.get('AAA')).toEqual(updated);
      expect(loaded.get('BBB')).toEqual(bbb);
      expect(store.loadBudget()).toEqual(budget);
    });

    it('rejects a ledger that violates its invariants without writing anything', () => {
      const store = makeStore();
      const good = mixedLedger();
      const first = store.save(new Map([['AAA', good]]));

      const broken: InstrumentLedger = {
        ...good,
        stages: good.stages.map((s) => (s.stageNumber === 1 ? { ...s, remainingQuantity: 20 } : s)),
      };
      clock = T0 + MINUTE;
      expect(() => store.save(new Map([['AAA', broken]]))).toThrow(PersistenceError);
      expect(store.currentGeneration()).toBe(first);
      expect(generations()).toEqual([first]);
      expect(store.load([ref('AAA')]).get('AAA')).toEqual(good);
    });

    it('rejects a map keyed by a different code', () => {
      const store = makeStore();
      expect(() => store.save(new Map([['XXX', mixedLedger()]]))).toThrow(/keyed XXX carries code AAA/);
      expect(store.currentGeneration()).toBeNull();
    });
  });

  describe('crash safety', () => {
    it('leaves the previous state intact when the pointer swap fails', () => {
      const store = makeStore();
      const before = mixedLedger();
      const first = store.save(new Map([['AAA', before]]));

      const realRename = fs.renameSync.bind(fs);
      vi.spyOn(fs, 'renameSync').mockImplementation((from, to) => {
        if (String(to).endsWith('CURRENT')) throw new Error('simulated crash');
        realRename(from, to);
      });

      clock = T0 + MINUTE;
      const after = openStage(createLedger(ref('AAA'), T0), 12000, 1, T0 + MINUTE);
      expect(() => store.save(new Map([['AAA', after]]))).toThrow(PersistenceError);
      vi.restoreAllMocks();

      const reopened = makeStore();
      expect(reopened.currentGeneration()).toBe(first);
      expect(reopened.load([ref('AAA')]).get('AAA')).toEqual(before);
      expect(generations()).toEqual([first]);
      expect(fs.readdirSync(path.join(dir, 'staging'))).toEqual([]);
    });

    it('ignores generations and staging left by an interrupted save, then cleans them up', () => {
      const store = makeStore();
      const before = mixedLedger();
      const first = store.save(new Map([['AAA', before]]));

      const orphan = genId(T0 + 30_000);
      fs.cpSync(path.join(dir, 'generations', first), path.join(dir, 'generations', orphan), { recursive: true });
      fs.writeFileSync(ledgerFile(orphan, 'AAA'), '{"half-written');
      fs.mkdirSync(path.join(dir, 'staging', 'leftover', 'ledgers'), { recursive: true });

      const reopened = makeStore();
      expect(reopened.load([ref('AAA')]).get('AAA')).toEqual(before);
      expect(recoveries).toEqual([]);

      clock = T0 + MINUTE;
      const next = reopened.save(new Map([['AAA', before]]));
      expect(next).toBe(genId(T0 + MINUTE));
      expect(generations()).toEqual([first, next]);
      expect(fs.readdirSync(path.join(dir, 'staging'))).toEqual([]);
    });

    it('never restores an uncommitted generation as a backup', () => {
      const store = makeStore();
      const committed = openStage(createLedger(ref('AAA'), T0), 10000, 10, T0);
      const first = store.save(new Map([['AAA', committed]]));

      // rename 후 포인터 교체 전에 중단된 저장: 온전하지만 커밋되지 않은 세대
      const orphan = genId(T0 + 30_000);
      const uncommitted = openStage(committed, 9000, 99, T0 + 30_000);
      const orphanStore = makeStore();
      orphanStore.save(new Map([['AAA', uncommitted]]));
      fs.renameSync(path.join(dir, 'generations', genId(T0, 1)), path.join(dir, 'generations', orphan));
      fs.writeFileSync(path.join(dir, 'CURRENT'), `${first}\n`);

      clock = T0 + MINUTE;
      const third = makeStore().save(new Map([['AAA', committed]]));
      expect(generations()).toEqual([first, third]);

      fs.writeFileSync(ledgerFile(third, 'AAA'), '{"kind": "instr');
      const recovered = makeStore().load([ref('AAA')]).get('AAA');
      expect(recovered?.stages.map((s) => [s.stageNumber, s.entryPrice, s.remainingQuantity])).toEqual([[1, 10000, 10]]);
      expect(recoveries.map((r) => r.backupId)).toEqual([first]);
    });
  });

  describe('recovery', () => {
    function twoGenerations(): { first: string; second: string; v1: InstrumentLedger } {
      const store = makeStore();
      const v1 = mixedLedger();
      const first = store.save(new Map([['AAA', v1]]));
      clock = T0 + MINUTE;
      const v2 = closeStagePartial(v1, 5, 10, 8800, T0 + MINUTE, 'PROFIT_TAKE', zeroFees).ledger;
      const second = store.save(new Map([['AAA', v2]]));
      return { first, second, v1 };
    }

    it('falls back to the newest valid backup for unparseable JSON', () => {
      const { first, second, v1 } = twoGenerations();
      fs.writeFileSync(ledgerFile(second, 'AAA'), '{"kind": "instr');

      expect(makeStore().load([ref('AAA')]).get('AAA')).toEqual(v1);
      expect(recoveries).toHaveLength(1);
      expect(recoveries[0]?.code).toBe('AAA');
      expect(recoveries[0]?.backupId).toBe(first);
      expect(recoveries[0]?.problem).toMatch(/^invalid JSON/);
    });

    it('detects a tampered payload through its checksum', () => {
      const { first, second, v1 } = twoGenerations();
      const file = ledgerFile(second, 'AAA');
      // 5000 + 1500 + 8000
      const text = fs.readFileSync(file, 'utf-8');
      expect(text).toContain('"realizedPnl": 14500,');
      fs.writeFileSync(file, text.replace('"realizedPnl": 14500,', '"realizedPnl": 99999,'));

      expect(makeStore().load([ref('AAA')]).get('AAA')).toEqual(v1);
      expect(recoveries).toEqual([{ code: 'AAA', backupId: first, problem: 'checksum mismatch' }]);
    });

    it('fails with CorruptStateError when no backup is valid', () => {
      const store = makeStore();
      const only = store.save(new Map([['AAA', mixedLedger()]]));
      fs.writeFileSync(ledgerFile(only, 'AAA'), 'not json');

      expect(() => makeStore().load([ref('AAA')])).toThrow(CorruptStateError);
    });

    it('uses the newest readable generation when the pointer is corrupt', () => {
      const { second } = twoGenerations();
      fs.writeFileSync(path.join(dir, 'CURRENT'), 'garbage');

      const store = makeStore();
      expect(store.currentGeneration()).toBe(second);
      expect(recoveries[0]).toEqual({ code: 'CURRENT', backupId: second, problem: 'invalid generation pointer' });
    });
  });

  describe('pruning', () => {
    it('keeps at most backupMaxCount backups', () => {
      const store = makeStore({ backupMaxCount: 2 });
      const ledgers = new Map([['AAA', mixedLedger()]]);
      const ids: string[] = [];
      for (let i = 0; i < 5; i++) {
        clock = T0 + i * MINUTE;
        ids.push(store.save(ledgers));
      }
      expect(generations()).toEqual(ids.slice(2));
      expect(store.listBackups()).toEqual(ids.slice(2, 4));
    });

    it('drops backups older than the age limit but keeps the newest one', () => {
      const store = makeStore({ backupMaxAgeHours: 1 });
      const ledgers = new Map([['AAA', mixedLedger()]]);
      const ids = [0, 2, 4].map((h) => {
        clock = T0 + h * HOUR;
        return store.save(ledgers);
      });
      expect(generations()).toEqual([ids[1], ids[2]]);
    });

    it('treats a pruning failure as non-fatal', () => {
      const store = makeStore({ backupMaxCount: 1 });
      const ledgers = new Map([['AAA', mixedLedger()]]);
      store.save(ledgers);
      clock = T0 + MINUTE;
      store.save(ledgers);

      vi.spyOn(fs, 'rmSync').mockImplementation(() => {
        throw new Error('EBUSY');
      });
      clock = T0 + 2 * MINUTE;
      const third = store.save(ledgers);
      vi.restoreAllMocks();

      expect(store.currentGeneration()).toBe(third);
      expect(generations()).toHaveLength(3);
    });
  });
});
