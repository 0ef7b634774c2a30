import { createHash } from 'node:crypto';
import { z } from 'zod';
import { MAX_STAGES, type BudgetState, type InstrumentLedger, type StageEntry } from '../types/index.js';

export const LEDGER_SCHEMA_VERSION = 1;

const nonNegative = z.number().finite().nonnegative();
const timestamp = z.number().int().nonnegative();

const sellRecordSchema = z.object({
  timestamp,
  quantity: z.number().finite().positive(),
  price: z.number().finite().positive(),
  realizedPnl: z.number().finite(),
  reason: z.enum(['OVERVALUED_SELL', 'STOP_LOSS', 'PROFIT_TAKE', 'MANUAL']),
});

const stageEntrySchema = z.object({
  stageNumber: z.number().int().min(1).max(MAX_STAGES),
  entryPrice: z.number().finite().positive(),
  entryQuantity: z.number().finite().positive(),
  remainingQuantity: nonNegative,
  entryTimestamp: timestamp,
  sellHistory: z.array(sellRecordSchema),
  isOpen: z.boolean(),
});

const cooldownSchema = z.object({
  closedAt: timestamp,
  closePrice: z.number().finite().positive(),
  reason: sellRecordSchema.shape.reason,
});

export const instrumentLedgerSchema = z.object({
  code: z.string().regex(/^[A-Za-z0-9._-]+$/),
  name: z.string(),
  sector: z.string(),
  stages: z.array(stageEntrySchema).max(MAX_STAGES),
  closedStages: z.array(stageEntrySchema),
  realizedPnl: z.number().finite(),
  cooldowns: z.record(z.string().regex(/^[1-5]$/), cooldownSchema),
  dropRequirements: z.record(z.string().regex(/^[1-5]$/), z.number().finite()),
  updatedAt: timestamp,
});

export const budgetStateSchema = z.object({
  initialBudget: z.number().finite().positive(),
  effectiveBudget: nonNegative,
  realizedPnl: z.number().finite(),
  performanceWindow: z.array(z.object({ timestamp, equity: z.number().finite() })),
  updatedAt: timestamp,
});

export type DocumentKind = 'instrument-ledger' | 'budget-state';

const envelopeSchema = z.object({
  kind: z.enum(['instrument-ledger', 'budget-state']),
  schemaVersion: z.literal(LEDGER_SCHEMA_VERSION),
  checksum: z.string().regex(/^[0-9a-f]{64}$/),
  payload: z.unknown(),
});

// 가벼운 오차 허용 (수량은 정수 주식이 일반적이지만 소수 단위도 허용)
const EPS = 1e-9;

function stageProblems(stage: StageEntry, label: string): string[] {
  const problems: string[] = [];
  if (stage.remainingQuantity > stage.entryQuantity + EPS) {
    problems.push(`${label}: remainingQuantity ${stage.remainingQuantity} > entryQuantity ${stage.entryQuantity}`);
  }
  if (stage.isOpen !== stage.remainingQuantity > 0) {
    problems.push(`${label}: isOpen=${stage.isOpen} but remainingQuantity=${stage.remainingQuantity}`);
  }
  const sold = stage.sellHistory.reduce((sum, r) => sum + r.quantity, 0);
  if (Math.abs(sold - (stage.entryQuantity - stage.remainingQuantity)) > EPS) {
    problems.push(`${label}: sold ${sold} != entry ${stage.entryQuantity} - remaining ${stage.remainingQuantity}`);
  }
  for (let i = 1; i < stage.sellHistory.length; i++) {
    const prev = stage.sellHistory[i - 1];
    const cur = stage.sellHistory[i];
    if (prev && cur && cur.timestamp < prev.timestamp) {
      problems.push(`${label}: sellHistory out of order at ${i}`);
    }
  }
  return problems;
}

/**
 * 구조 검증을 통과한 원장의 불변식 검사: 위반 목록 반환 (빈 배열이면 정상)
 */
export function ledgerInvariantProblems(ledger: InstrumentLedger): string[] {
  const problems: string[] = [];
  let prevNumber = 0;
  for (const stage of ledger.stages) {
    if (stage.stageNumber <= prevNumber) {
      problems.push(`stages must be unique and ordered by stageNumber (saw ${stage.stageNumber} after ${prevNumber})`);
    }
    prevNumber = stage.stageNumber;
    problems.push(...stageProblems(stage, `stage ${stage.stageNumber}`));
  }
  ledger.closedStages.forEach((stage, i) => {
    if (stage.isOpen) problems.push(`closedStages[${i}] is open`);
    problems.push(...stageProblems(stage, `closedStages[${i}]`));
  });
  return problems;
}

export function checksumOf(payload: unknown): string {
  return createHash('sha256').update(JSON.stringify(payload)).digest('hex');
}

export function encodeDocument(kind: DocumentKind, payload: InstrumentLedger | BudgetState): string {
  return `${JSON.stringify(
    { kind, schemaVersion: LEDGER_SCHEMA_VERSION, checksum: checksumOf(payload), payload },
    null,
    2,
  )}\n`;
}

export type DecodeResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly problem: string };

function decodeEnvelope(text: string, kind: DocumentKind): DecodeResult<unknown> {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    return { ok: false, problem: `invalid JSON: ${String(err)}` };
  }
  const env = envelopeSchema.safeParse(raw);
  if (!env.success) {
    return { ok: false, problem: `invalid envelope: ${env.error.issues.map((i) => i.message).join('; ')}` };
  }
  if (env.data.kind !== kind) {
    return { ok: false, problem: `expected ${kind}, found ${env.data.kind}` };
  }
  if (checksumOf(env.data.payload) !== env.data.checksum) {
    return { ok: false, problem: 'checksum mismatch' };
  }
  return { ok: true, value: env.data.payload };
}

export function decodeLedger(text: string, expectedCode?: string): DecodeResult<InstrumentLedger> {
  const env = decodeEnvelope(text, 'instrument-ledger');
  if (!env.ok) return env;
  const parsed = instrumentLedgerSchema.safeParse(env.value);
  if (!parsed.success) {
    return {
      ok: false,
      problem: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
    };
  }
  const ledger: InstrumentLedger = parsed.data;
  if (expectedCode !== undefined && ledger.code !== expectedCode) {
    return { ok: false, problem: `document code ${ledger.code} != ${expectedCode}` };
  }
  const problems = ledgerInvariantProblems(ledger);
  if (problems.length > 0) return { ok: false, problem: problems.join('; ') };
  return { ok: true, value: ledger };
}

export function decodeBudget(text: string): DecodeResult<BudgetState> {
  const env = decodeEnvelope(text, 'budget-state');
  if (!env.ok) return env;
  const parsed = budgetStateSchema.safeParse(env.value);
  if (!parsed.success) {
    return {
      ok: false,
      problem: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
    };
  }
  return { ok: true, value: parsed.data };
}
