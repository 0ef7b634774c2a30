/** 체결 확인된 주문 */
export interface OrderConfirmation {
  readonly orderId: string;
  readonly quantity: number;   // 체결 수량 (부분 체결 가능)
  readonly price: number;      // 평균 체결가
}

/**
 * 주문 실행 계약
 * 체결이 확인된 경우에만 resolve. 거부는 OrderRejectedError, 시간 초과는 OrderTimeoutError.
 */
export interface OrderExecutor {
  placeBuy(code: string, price: number, quantity: number): Promise<OrderConfirmation>;
  placeSell(code: string, price: number, quantity: number): Promise<OrderConfirmation>;
}

/**
 * ms 안에 끝나지 않으면 onTimeout()의 에러로 reject.
 * 원래 작업은 취소되지 않으므로 결과는 버려진다.
 */
export function withTimeout<T>(work: Promise<T>, ms: number, onTimeout: () => Error): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(onTimeout()), ms);
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timer));
}
