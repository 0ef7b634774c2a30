import { createChildLogger } from '../logger.js';

const log = createChildLogger('telegram');

/**
 * Telegram Bot API를 통한 메시지 전송
 * - 큐 + 초당 1건 제한
 * - 전송 실패 시 로그만 남김
 */
export class TelegramNotifier {
  private readonly botToken: string;
  private readonly chatId: string;
  private readonly queue: string[] = [];
  private readonly intervalMs: number;
  private processing = false;

  constructor(botToken: string, chatId: string, intervalMs: number = 1000) {
    this.botToken = botToken;
    this.chatId = chatId;
    this.intervalMs = intervalMs;
  }

  send(text: string): void {
    this.queue.push(text);
    if (!this.processing) {
      this.processQueue().catch((err: unknown) => {
        this.processing = false;
        log.error({ err }, 'Telegram queue stopped');
      });
    }
  }

  /** 큐가 빌 때까지 대기 (종료 시 사용) */
  async drain(timeoutMs: number = 5000): Promise<void> {
    const deadline = Date.now() + timeoutMs;
    while ((this.processing || this.queue.length > 0) && Date.now() < deadline) {
      await new Promise((r) => setTimeout(r, 50));
    }
  }

  private async processQueue(): Promise<void> {
    this.processing = true;
    for (let msg = this.queue.shift(); msg !== undefined; msg = this.queue.shift()) {
      try {
        await this.doSend(msg);
      } catch (err) {
        log.warn({ err }, 'Telegram send failed');
      }
      // 초당 1건 제한
      if (this.queue.length > 0) {
        await new Promise((r) => setTimeout(r, this.intervalMs));
      }
    }
    this.processing = false;
  }

  private async doSend(text: string): Promise<void> {
    const url = `https://api.telegram.org/bot${this.botToken}/sendMessage`;
    const res = await fetch(url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ chat_id: this.chatId, text, parse_mode: 'HTML' }),
    });
    if (!res.ok) {
      const body = await res.text().catch(() => '');
      log.warn({ status: res.status, body }, 'Telegram API error');
    }
  }
}
