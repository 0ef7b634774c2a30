import { config } from '../config.js';
import { createChildLogger } from '../logger.js';
import type { TradingState } from '../types/index.js';
import { TelegramNotifier } from './telegram.js';

const log = createChildLogger('notifier');

export type AlertEvent =
  | {
      readonly type: 'FILL';
      readonly side: 'BUY' | 'SELL';
      readonly code: string;
      readonly stageNumber: number;
      readonly price: number;
      readonly quantity: number;
      readonly realizedPnl?: number;
      readonly reason?: string;
    }
  | { readonly type: 'ORDER_REJECTED'; readonly code: string; readonly reason: string }
  | { readonly type: 'ORDER_TIMEOUT'; readonly code: string; readonly timeoutMs: number }
  | { readonly type: 'INVARIANT_VIOLATION'; readonly code: string; readonly message: string }
  | { readonly type: 'PERSISTENCE_FAILED'; readonly message: string }
  | { readonly type: 'RECOVERED_FROM_BACKUP'; readonly code: string; readonly backupId: string }
  | { readonly type: 'CORRUPT_STATE'; readonly code: string; readonly detail: string }
  | { readonly type: 'MODE_CHANGED'; readonly from: TradingState; readonly to: TradingState; readonly reason: string }
  | {
      readonly type: 'RECONCILIATION_MISMATCH';
      readonly code: string;
      readonly ledgerQuantity: number;
      readonly brokerQuantity: number;
    }
  | { readonly type: 'STARTUP'; readonly mode: string }
  | { readonly type: 'SHUTDOWN' };

/** fire-and-forget: 구현은 절대 throw 하지 않는다 */
export interface NotificationSink {
  notify(event: AlertEvent): void;
}

const krw = (v: number): string => `${Math.round(v).toLocaleString()} KRW`;

export function formatAlert(event: AlertEvent): string {
  switch (event.type) {
    case 'FILL': {
      const head = event.side === 'BUY' ? '📈 <b>매수 체결</b>' : '💰 <b>매도 체결</b>';
      const lines = [
        `${head} ${event.code} ${event.stageNumber}차`,
        `가격: ${krw(event.price)}`,
        `수량: ${event.quantity}`,
      ];
      if (event.realizedPnl !== undefined) {
        lines.push(`손익: ${event.realizedPnl >= 0 ? '+' : ''}${krw(event.realizedPnl)}`);
      }
      if (event.reason) lines.push(`사유: ${event.reason}`);
      return lines.join('\n');
    }
    case 'ORDER_REJECTED':
      return `⚠️ <b>주문 거부</b> ${event.code}\n${event.reason}`;
    case 'ORDER_TIMEOUT':
      return `⏱ <b>주문 시간 초과</b> ${event.code} (${event.timeoutMs}ms), 다음 사이클 재시도`;
    case 'INVARIANT_VIOLATION':
      return `🚫 <b>원장 불변식 위반</b> ${event.code}\n${event.message}`;
    case 'PERSISTENCE_FAILED':
      return `💾 <b>원장 저장 실패</b>\n${event.message}\n이전 상태 유지, 다음 사이클 재시도`;
    case 'RECOVERED_FROM_BACKUP':
      return `♻️ <b>백업에서 복구</b> ${event.code}\n세대: ${event.backupId}`;
    case 'CORRUPT_STATE':
      return `🚨 <b>원장 손상</b> ${event.code}\n${event.detail}`;
    case 'MODE_CHANGED':
      return `🔀 <b>모드 전환</b> ${event.from} → ${event.to}\n${event.reason}`;
    case 'RECONCILIATION_MISMATCH':
      return `🔍 <b>수량 불일치</b> ${event.code}\n원장: ${event.ledgerQuantity} / 계좌: ${event.brokerQuantity}`;
    case 'STARTUP':
      return `🤖 <b>봇 시작</b>\n모드: ${event.mode}`;
    case 'SHUTDOWN':
      return '🛑 <b>봇 종료</b>';
  }
}

/**
 * 알림 허브: TelegramNotifier 래핑 + 이벤트별 메시지 포맷
 * 텔레그램이 꺼져 있으면 모든 호출 무시
 */
export class Notifier implements NotificationSink {
  private readonly tg: TelegramNotifier | null;

  constructor(tg: TelegramNotifier | null = Notifier.fromConfig()) {
    this.tg = tg;
  }

  private static fromConfig(): TelegramNotifier | null {
    if (config.telegram.enabled && config.telegram.botToken && config.telegram.chatId) {
      log.info('Telegram notifier enabled');
      return new TelegramNotifier(config.telegram.botToken, config.telegram.chatId);
    }
    log.debug('Telegram notifier disabled');
    return null;
  }

  notify(event: AlertEvent): void {
    if (!this.tg) return;
    try {
      this.tg.send(formatAlert(event));
    } catch (err) {
      log.warn({ err, type: event.type }, 'Notifier send error');
    }
  }

  /** 종료 전 대기 중인 메시지 전송 */
  async flush(): Promise<void> {
    await this.tg?.drain();
  }
}
