import dotenv from 'dotenv';

dotenv.config();

function env(key: string, fallback: string): string {
  return process.env[key] ?? fallback;
}

function envNum(key: string, fallback: number): number {
  const v = process.env[key];
  if (v === undefined || v.trim() === '') return fallback;
  const n = Number(v);
  if (!Number.isFinite(n)) {
    throw new Error(`Environment variable ${key} must be numeric, got "${v}"`);
  }
  return n;
}

export type TradingMode = 'PAPER';

function parseMode(raw: string): TradingMode {
  // 실주문 브로커 어댑터는 외부 모듈: 코어 데몬은 PAPER만 지원
  if (raw.toUpperCase() !== 'PAPER') {
    throw new Error(`Unsupported TRADING_MODE "${raw}" (only PAPER is built in)`);
  }
  return 'PAPER';
}

export const config = {
  mode: parseMode(env('TRADING_MODE', 'PAPER')),

  /** 전략 설정 JSON (밴드·임계값·종목) */
  settingsPath: env('SETTINGS_PATH', './config/trading.json'),

  store: {
    dataDir: env('DATA_DIR', './data/ledgers'),
    /** 보관할 백업 세대 수 */
    backupMaxCount: envNum('BACKUP_MAX_COUNT', 20),
    /** 이 시간보다 오래된 백업은 저장 성공 후 정리 */
    backupMaxAgeHours: envNum('BACKUP_MAX_AGE_HOURS', 168),
  },

  cycle: {
    /** 평가 주기 (node-cron, 기본: 평일 장중 5분마다) */
    cron: env('CYCLE_CRON', '*/5 9-15 * * 1-5'),
    timezone: env('CYCLE_TIMEZONE', 'Asia/Seoul'),
    orderTimeoutMs: envNum('ORDER_TIMEOUT_MS', 60_000),
    signalTimeoutMs: envNum('SIGNAL_TIMEOUT_MS', 15_000),
  },

  /** 외부 수집기가 기록하는 시세/적정가 스냅샷 */
  marketFeed: {
    path: env('MARKET_FEED_PATH', './data/market-feed.json'),
    /** asOf가 이보다 오래되면 Unavailable */
    maxAgeMinutes: envNum('MARKET_FEED_MAX_AGE_MINUTES', 30),
  },

  db: {
    path: env('DB_PATH', './data/audit.db'),
  },

  log: {
    level: env('LOG_LEVEL', 'info'),
  },

  telegram: {
    enabled: env('TELEGRAM_ENABLED', 'false') === 'true',
    botToken: env('TELEGRAM_BOT_TOKEN', ''),
    chatId: env('TELEGRAM_CHAT_ID', ''),
  },
} as const;
