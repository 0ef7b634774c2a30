import type Database from 'better-sqlite3';
import { config } from './config.js';
import { openDatabase } from './db/database.js';
import { TradingCycle } from './engine/trading-cycle.js';
import { createKrxFeeFunction } from './execution/fees.js';
import { PaperBroker } from './execution/paper-broker.js';
import { LedgerStore, type RecoveryInfo } from './ledger/ledger-store.js';
import { exposure, openQuantity } from './ledger/position-ledger.js';
import { createChildLogger } from './logger.js';
import { FileMarketFeed } from './market/file-market-feed.js';
import { Notifier } from './notification/notifier.js';
import { BudgetController } from './risk/budget-controller.js';
import { TradingStateMachine } from './risk/state-machine.js';
import { AuditLog } from './safety/audit-log.js';
import { SettingsLoader } from './settings/loader.js';

const log = createChildLogger('runtime');

export interface Runtime {
  readonly cycle: TradingCycle;
  readonly store: LedgerStore;
  readonly settings: SettingsLoader;
  readonly feed: FileMarketFeed;
  readonly broker: PaperBroker;
  readonly budget: BudgetController;
  readonly mode: TradingStateMachine;
  readonly notifier: Notifier;
  readonly audit: AuditLog;
  readonly db: Database.Database;
}

export interface RuntimeOptions {
  /** false면 장 운영시간 검사 생략 */
  readonly sessionCheck: boolean;
  readonly notifier?: Notifier;
}

export function createStore(onRecovery?: (code: string, backupId: string) => void): LedgerStore {
  return new LedgerStore({
    dataDir: config.store.dataDir,
    backupMaxCount: config.store.backupMaxCount,
    backupMaxAgeHours: config.store.backupMaxAgeHours,
    ...(onRecovery ? { onRecovery: (info: RecoveryInfo) => onRecovery(info.code, info.backupId) } : {}),
  });
}

/**
 * 페이퍼 트레이딩 구성 요소 조립
 * 원장 복구 불가 시 CorruptStateError를 그대로 던진다.
 */
export function createRuntime(options: RuntimeOptions): Runtime {
  const settings = new SettingsLoader(config.settingsPath);
  const initial = settings.get();

  const db = openDatabase(config.db.path);
  const audit = new AuditLog(db, config.mode);
  const notifier = options.notifier ?? new Notifier();

  const store = createStore((code, backupId) => {
    audit.warn('ledger-store', 'RECOVERED_FROM_BACKUP', `${code} <- ${backupId}`);
    notifier.notify({ type: 'RECOVERED_FROM_BACKUP', code, backupId });
  });
  const ledgers = store.load(initial.instruments);
  const budget = BudgetController.restore(store.loadBudget(), initial.initialBudget, initial.budget, Date.now());

  const feed = new FileMarketFeed({
    path: config.marketFeed.path,
    maxAgeMs: config.marketFeed.maxAgeMinutes * 60_000,
  });
  const fees = createKrxFeeFunction(initial.fees);

  const invested = [...ledgers.values()].reduce((sum, l) => sum + exposure(l), 0);
  const broker = new PaperBroker({
    cash: budget.state.initialBudget + budget.state.realizedPnl - invested,
    fees,
    quote: (code) => feed.currentPrice(code),
    sessionCheck: options.sessionCheck,
  });
  broker.seedHoldings([...ledgers.values()].map((l) => [l.code, openQuantity(l)] as const));

  const mode = new TradingStateMachine();
  const cycle = new TradingCycle(
    {
      store,
      prices: broker,
      valuations: feed,
      conditions: feed,
      orders: broker,
      fees,
      budget,
      mode,
      notifier,
      audit,
      settings: () => settings.get(),
      signalTimeoutMs: config.cycle.signalTimeoutMs,
      orderTimeoutMs: config.cycle.orderTimeoutMs,
    },
    ledgers,
  );

  log.info(
    { instruments: ledgers.size, effectiveBudget: budget.state.effectiveBudget, cash: Math.floor(broker.cashBalance) },
    'Runtime ready',
  );
  return { cycle, store, settings, feed, broker, budget, mode, notifier, audit, db };
}
