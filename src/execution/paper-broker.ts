import { randomUUID } from 'node:crypto';
import { OrderRejectedError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import { isKrxSessionOpen } from '../market/market-hours.js';
import type { PriceBalanceSource } from '../market/sources.js';
import type { FeeFunction } from './fees.js';
import type { OrderConfirmation, OrderExecutor } from './order-executor.js';

const log = createChildLogger('paper-broker');

export interface PaperBrokerOptions {
  readonly cash: number;
  readonly fees: FeeFunction;
  /** 시장가 조회 (지정가 괴리 검사용) */
  readonly quote: (code: string) => Promise<number>;
  /** 주문가가 시장가에서 이 비율 이상 벗어나면 거부 */
  readonly maxPriceDeviation?: number;
  /** false면 장 운영시간 검사 생략 (수동 1회 실행용) */
  readonly sessionCheck?: boolean;
  readonly now?: () => number;
}

/**
 * 페이퍼 브로커: 주문 즉시 주문가로 전량 체결
 * 현금·보유 수량을 프로세스 안에서 관리한다.
 */
export class PaperBroker implements OrderExecutor, PriceBalanceSource {
  private cash: number;
  private readonly holdings = new Map<string, number>();
  private readonly fees: FeeFunction;
  private readonly quote: (code: string) => Promise<number>;
  private readonly maxPriceDeviation: number;
  private readonly sessionCheck: boolean;
  private readonly now: () => number;

  constructor(options: PaperBrokerOptions) {
    this.cash = options.cash;
    this.fees = options.fees;
    this.quote = options.quote;
    this.maxPriceDeviation = options.maxPriceDeviation ?? 0.05;
    this.sessionCheck = options.sessionCheck ?? true;
    this.now = options.now ?? Date.now;
  }

  /** 기동 시 원장 잔량으로 보유 수량 복원 */
  seedHoldings(entries: Iterable<readonly [string, number]>): void {
    for (const [code, qty] of entries) {
      if (qty > 0) this.holdings.set(code, qty);
    }
  }

  get cashBalance(): number {
    return this.cash;
  }

  async placeBuy(code: string, price: number, quantity: number): Promise<OrderConfirmation> {
    await this.checkOrder(code, price, quantity);
    const cost = price * quantity + this.fees(price, quantity, true);
    if (cost > this.cash) {
      throw new OrderRejectedError(code, `insufficient cash: need ${Math.ceil(cost)}, have ${Math.floor(this.cash)}`);
    }
    this.cash -= cost;
    this.holdings.set(code, (this.holdings.get(code) ?? 0) + quantity);
    return this.confirm('BUY', code, price, quantity);
  }

  async placeSell(code: string, price: number, quantity: number): Promise<OrderConfirmation> {
    await this.checkOrder(code, price, quantity);
    const held = this.holdings.get(code) ?? 0;
    if (quantity > held) {
      throw new OrderRejectedError(code, `insufficient holdings: sell ${quantity}, hold ${held}`);
    }
    this.cash += price * quantity - this.fees(price, quantity, false);
    const left = held - quantity;
    if (left > 0) this.holdings.set(code, left);
    else this.holdings.delete(code);
    return this.confirm('SELL', code, price, quantity);
  }

  async currentPrice(code: string): Promise<number> {
    return this.quote(code);
  }

  async ownedQuantity(code: string): Promise<number> {
    return this.holdings.get(code) ?? 0;
  }

  async isMarketOpen(): Promise<boolean> {
    return !this.sessionCheck || isKrxSessionOpen(this.now());
  }

  private async checkOrder(code: string, price: number, quantity: number): Promise<void> {
    if (!(quantity > 0) || !Number.isInteger(quantity)) {
      throw new OrderRejectedError(code, `invalid quantity ${quantity}`);
    }
    if (!(price > 0)) {
      throw new OrderRejectedError(code, `invalid price ${price}`);
    }
    if (!(await this.isMarketOpen())) {
      throw new OrderRejectedError(code, 'market closed');
    }
    const market = await this.quote(code);
    if (Math.abs(price - market) / market > this.maxPriceDeviation) {
      throw new OrderRejectedError(code, `price ${price} too far from market ${market}`);
    }
  }

  private confirm(side: 'BUY' | 'SELL', code: string, price: number, quantity: number): OrderConfirmation {
    const orderId = randomUUID();
    log.info({ side, code, price, quantity, orderId, cash: Math.floor(this.cash) }, 'Paper order filled');
    return { orderId, quantity, price };
  }
}
