import { config } from './config.js';
import { startCycleSchedule } from './engine/scheduler.js';
import { CorruptStateError } from './errors.js';
import { logger, createChildLogger } from './logger.js';
import { Notifier } from './notification/notifier.js';
import { createRuntime, type Runtime } from './runtime.js';

const log = createChildLogger('main');

const VERSION = '0.3.0';

async function main(): Promise<void> {
  log.info({ mode: config.mode, version: VERSION }, 'Starting split ledger trader');
  const notifier = new Notifier();

  let runtime: Runtime;
  try {
    runtime = createRuntime({ sessionCheck: true, notifier });
  } catch (err) {
    if (err instanceof CorruptStateError) {
      // 유효한 백업 없음: 빈 원장으로 덮어쓰지 않고 중단
      log.fatal({ err, code: err.code }, 'Unrecoverable ledger corruption, refusing to start');
      notifier.notify({ type: 'CORRUPT_STATE', code: err.code, detail: err.detail });
      await notifier.flush();
      logger.flush();
      process.exit(1);
    }
    throw err;
  }

  const { cycle, mode, audit, db } = runtime;
  audit.info('main', 'STARTUP', `mode=${config.mode}`);
  notifier.notify({ type: 'STARTUP', mode: config.mode });

  const schedule = startCycleSchedule(config.cycle.cron, config.cycle.timezone, () => cycle.runOnce());

  // ── Graceful shutdown ──
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    log.info({ signal }, 'Shutting down');

    // 진행 중인 사이클(저장 포함)이 끝날 때까지 대기
    await schedule.stop();
    if (cycle.hasUnsavedChanges) {
      log.warn('Exiting with unsaved ledger changes (last save failed)');
    }
    audit.info('main', 'SHUTDOWN', signal);
    notifier.notify({ type: 'SHUTDOWN' });
    await notifier.flush();
    db.close();
    log.info('Shutdown complete');
    process.exit(0);
  };

  process.on('SIGINT', () => { shutdown('SIGINT').catch(() => process.exit(1)); });
  process.on('SIGTERM', () => { shutdown('SIGTERM').catch(() => process.exit(1)); });

  // ── STDIN 수동 제어 (h: 중단, r: 해제, q: 종료) ──
  if (process.stdin.isTTY) {
    process.stdin.setRawMode(true);
    process.stdin.resume();
    process.stdin.on('data', (data) => {
      const key = data.toString();
      if (key === 'h' || key === 'H') {
        log.warn('Manual halt triggered');
        mode.transition('HALTED', 'manual halt (keyboard)');
        audit.critical('state-machine', 'HALTED', 'manual halt (keyboard)');
      }
      if (key === 'r' || key === 'R') {
        log.info('Manual reset');
        mode.reset('manual reset (keyboard)');
        audit.info('state-machine', 'RESET', 'keyboard');
      }
      if (key === 'q' || key === '\u0003') { // q or Ctrl+C
        shutdown('keyboard').catch(() => process.exit(1));
      }
    });

    console.log('');
    console.log(`  Mode: ${config.mode}  Schedule: ${config.cycle.cron} (${config.cycle.timezone})`);
    console.log('  Keys: [h] Halt  [r] Reset  [q] Quit');
    console.log('');
  }

  log.info('Trader running. Waiting for next cycle...');
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Fatal error');
  process.exit(1);
});
