import cron from 'node-cron';
import { createChildLogger } from '../logger.js';

const log = createChildLogger('scheduler');

export type CycleTask = () => Promise<unknown>;

export interface NonOverlappingRunner {
  /** 실행 중이면 false를 돌려주고 이번 틱은 버린다 */
  trigger(): boolean;
  /** 진행 중인 실행이 끝날 때까지 대기 */
  idle(): Promise<void>;
  readonly running: boolean;
}

/**
 * 이전 실행(저장 포함)이 끝나기 전에는 다음 실행을 시작하지 않는 러너
 */
export function createNonOverlappingRunner(task: CycleTask): NonOverlappingRunner {
  let current: Promise<void> | null = null;

  return {
    trigger(): boolean {
      if (current) {
        log.warn('Previous cycle still pending, tick dropped');
        return false;
      }
      current = task()
        .then(() => undefined)
        .catch((err: unknown) => {
          log.error({ err }, 'Scheduled cycle failed');
        })
        .finally(() => {
          current = null;
        });
      return true;
    },
    async idle(): Promise<void> {
      if (current) await current;
    },
    get running(): boolean {
      return current !== null;
    },
  };
}

export interface CycleSchedule {
  stop(): Promise<void>;
}

/**
 * 평가 주기 등록 (node-cron)
 */
export function startCycleSchedule(
  expression: string,
  timezone: string,
  task: CycleTask,
): CycleSchedule {
  if (!cron.validate(expression)) {
    throw new Error(`Invalid cron expression "${expression}"`);
  }
  const runner = createNonOverlappingRunner(task);
  const job = cron.schedule(expression, () => {
    runner.trigger();
  }, { timezone });
  log.info({ expression, timezone }, 'Cycle scheduler started');

  return {
    async stop(): Promise<void> {
      job.stop();
      await runner.idle();
      log.info('Cycle scheduler stopped');
    },
  };
}
