/**
 * 도메인 에러 분류
 *
 * - CorruptStateError: 저장 문서 검증 실패 (백업 복구 실패 시 프로세스 중단 사유)
 * - PersistenceError: 저장 경로 실패 (이번 사이클 커밋 전체 취소)
 * - LedgerInvariantError 계열: 단일 종목 원장 불변식 위반 (해당 종목만 격리)
 * - UnavailableError / OrderTimeoutError: 외부 협력자 응답 없음 (이번 사이클 판단 없음)
 * - OrderRejectedError: 주문 거부 (원장 변경 없음)
 */

export class CorruptStateError extends Error {
  readonly code: string;
  readonly detail: string;

  constructor(code: string, detail: string, options?: { cause?: unknown }) {
    super(`Corrupt ledger state for ${code}: ${detail}`, options);
    this.name = 'CorruptStateError';
    this.code = code;
    this.detail = detail;
  }
}

export class PersistenceError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PersistenceError';
  }
}

export abstract class LedgerInvariantError extends Error {
  readonly code: string;

  protected constructor(code: string, message: string) {
    super(message);
    this.code = code;
  }
}

export class CapacityExceededError extends LedgerInvariantError {
  readonly maxStages: number;

  constructor(code: string, maxStages: number) {
    super(code, `${code}: all ${maxStages} stage slots are open`);
    this.name = 'CapacityExceededError';
    this.maxStages = maxStages;
  }
}

export class InsufficientQuantityError extends LedgerInvariantError {
  readonly stageNumber: number;
  readonly requested: number;
  readonly remaining: number;

  constructor(code: string, stageNumber: number, requested: number, remaining: number) {
    super(
      code,
      requested <= 0
        ? `${code} stage ${stageNumber}: quantity must be positive, got ${requested}`
        : `${code} stage ${stageNumber}: requested ${requested} exceeds remaining ${remaining}`,
    );
    this.name = 'InsufficientQuantityError';
    this.stageNumber = stageNumber;
    this.requested = requested;
    this.remaining = remaining;
  }
}

export class UnknownStageError extends LedgerInvariantError {
  readonly stageNumber: number;

  constructor(code: string, stageNumber: number) {
    super(code, `${code}: no open stage ${stageNumber}`);
    this.name = 'UnknownStageError';
    this.stageNumber = stageNumber;
  }
}

export class UnavailableError extends Error {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super(`${source} unavailable: ${message}`, options);
    this.name = 'UnavailableError';
    this.source = source;
  }
}

export class OrderTimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(operation: string, timeoutMs: number) {
    super(`${operation} timed out after ${timeoutMs}ms`);
    this.name = 'OrderTimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

export class OrderRejectedError extends Error {
  readonly code: string;
  readonly reason: string;

  constructor(code: string, reason: string) {
    super(`Order for ${code} rejected: ${reason}`);
    this.name = 'OrderRejectedError';
    this.code = code;
    this.reason = reason;
  }
}
