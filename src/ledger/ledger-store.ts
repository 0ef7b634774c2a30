import fs from 'node:fs';
import path from 'node:path';
import { CorruptStateError, PersistenceError } from '../errors.js';
import { createChildLogger } from '../logger.js';
import type { BudgetState, InstrumentLedger, InstrumentRef } from '../types/index.js';
import { createLedger } from './position-ledger.js';
import {
  budgetStateSchema,
  decodeBudget,
  decodeLedger,
  encodeDocument,
  instrumentLedgerSchema,
  ledgerInvariantProblems,
  type DecodeResult,
} from './schema.js';

const log = createChildLogger('ledger-store');

const GENERATION_RE = /^(\d{13})-(\d{3})$/;
const POINTER_FILE = 'CURRENT';
const BUDGET_FILE = 'budget.json';
const LEDGER_DIR = 'ledgers';

export interface RecoveryInfo {
  readonly code: string;       // 종목 코드 또는 'budget'
  readonly backupId: string;   // 복구에 사용한 세대
  readonly problem: string;
}

export interface LedgerStoreOptions {
  readonly dataDir: string;
  /** 현재 세대를 제외하고 보관할 백업 세대 수 */
  readonly backupMaxCount: number;
  readonly backupMaxAgeHours: number;
  readonly now?: () => number;
  readonly onRecovery?: (info: RecoveryInfo) => void;
}

/**
 * 원장 저장소: 세대(generation) 디렉터리 + CURRENT 포인터
 *
 * <dataDir>/
 *   CURRENT                       현재 세대 id (rename으로 원자 교체)
 *   generations/<id>/ledgers/*.json, budget.json
 *   staging/<id>/                 저장 중인 세대 (포인터 교체 전까지 무시됨)
 *
 * 저장: 스테이징에 전체 문서 기록 → fsync → 재파싱 검증 → 세대 rename → 포인터 교체.
 * 직전 세대가 그대로 타임스탬프 백업이 되고, 정리는 저장 성공 후에만 한다.
 */
export class LedgerStore {
  private readonly dataDir: string;
  private readonly generationsDir: string;
  private readonly stagingDir: string;
  private readonly pointerPath: string;
  private readonly backupMaxCount: number;
  private readonly backupMaxAgeMs: number;
  private readonly now: () => number;
  private readonly onRecovery: ((info: RecoveryInfo) => void) | undefined;

  constructor(options: LedgerStoreOptions) {
    this.dataDir = path.resolve(options.dataDir);
    this.generationsDir = path.join(this.dataDir, 'generations');
    this.stagingDir = path.join(this.dataDir, 'staging');
    this.pointerPath = path.join(this.dataDir, POINTER_FILE);
    this.backupMaxCount = options.backupMaxCount;
    this.backupMaxAgeMs = options.backupMaxAgeHours * 3600 * 1000;
    this.now = options.now ?? Date.now;
    this.onRecovery = options.onRecovery;
  }

  // ─── 읽기 ────────────────────────────────────────────────────────────────

  currentGeneration(): string | null {
    let raw: string;
    try {
      raw = fs.readFileSync(this.pointerPath, 'utf-8').trim();
    } catch (err) {
      if (isNotFound(err)) return null;
      throw new CorruptStateError('CURRENT', `pointer unreadable: ${String(err)}`, { cause: err });
    }
    if (GENERATION_RE.test(raw) && fs.existsSync(this.generationPath(raw))) {
      return raw;
    }

    // 포인터 손상: 가장 최근의 온전한 세대로 복구
    const fallback = this.listGenerations().reverse().find((g) => this.isGenerationReadable(g));
    if (!fallback) {
      throw new CorruptStateError('CURRENT', `pointer "${raw.slice(0, 40)}" is invalid and no generation is readable`);
    }
    log.error({ pointer: raw.slice(0, 40), fallback }, 'Generation pointer corrupt, using newest generation');
    this.onRecovery?.({ code: 'CURRENT', backupId: fallback, problem: 'invalid generation pointer' });
    return fallback;
  }

  /** 현재 세대보다 오래된 세대 (백업), 오래된 순 */
  listBackups(): string[] {
    const current = this.currentGeneration();
    if (!current) return [];
    return this.listGenerations().filter((g) => g < current);
  }

  /**
   * 종목별 원장 로드
   * - 문서 없음 → 빈 원장
   * - 검증 실패 → 가장 최근의 유효한 백업
   * - 유효한 백업 없음 → CorruptStateError
   */
  load(instruments: readonly InstrumentRef[]): Map<string, InstrumentLedger> {
    const current = this.currentGeneration();
    const ledgers = new Map<string, InstrumentLedger>();

    for (const ref of instruments) {
      if (!current) {
        ledgers.set(ref.code, createLedger(ref, this.now()));
        continue;
      }
      const file = path.join(LEDGER_DIR, `${ref.code}.json`);
      const ledger = this.readWithFallback(current, file, ref.code, (text) => decodeLedger(text, ref.code));
      if (ledger === null) {
        ledgers.set(ref.code, createLedger(ref, this.now()));
        continue;
      }
      // 종목명·섹터는 설정이 우선
      ledgers.set(ref.code, { ...ledger, name: ref.name, sector: ref.sector });
    }

    log.info({ generation: current, instruments: ledgers.size }, 'Ledgers loaded');
    return ledgers;
  }

  loadBudget(): BudgetState | null {
    const current = this.currentGeneration();
    if (!current) return null;
    return this.readWithFallback(current, BUDGET_FILE, 'budget', decodeBudget);
  }

  private readWithFallback<T>(
    current: string,
    file: string,
    code: string,
    decode: (text: string) => DecodeResult<T>,
  ): T | null {
    const primaryPath = path.join(this.generationPath(current), file);
    if (!fs.existsSync(primaryPath)) return null;

    const primary = decode(readText(primaryPath));
    if (primary.ok) return primary.value;

    log.error({ code, generation: current, problem: primary.problem }, 'Persisted document failed validation');
    const backups = this.listGenerations().filter((g) => g < current).reverse();
    for (const backupId of backups) {
      const candidate = path.join(this.generationPath(backupId), file);
      if (!fs.existsSync(candidate)) continue;
      const result = decode(readText(candidate));
      if (result.ok) {
        log.warn({ code, backupId }, 'Recovered document from backup');
        this.onRecovery?.({ code, backupId, problem: primary.problem });
        return result.value;
      }
      log.warn({ code, backupId, problem: result.problem }, 'Backup also invalid');
    }
    throw new CorruptStateError(code, primary.problem);
  }

  // ─── 쓰기 ────────────────────────────────────────────────────────────────

  /**
   * 전체 문서 세트를 한 번에 저장. 실패 시 이전 세대가 그대로 유효하다.
   * @returns 새 세대 id
   */
  save(ledgers: ReadonlyMap<string, InstrumentLedger>, budget?: BudgetState): string {
    this.validateBeforeWrite(ledgers, budget);

    const current = this.currentGenerationForWrite();
    this.discardUncommitted(current);
    const generationId = this.nextGenerationId(current);
    const staging = path.join(this.stagingDir, generationId);
    const target = this.generationPath(generationId);
    let renamed = false;

    try {
      fs.mkdirSync(path.join(staging, LEDGER_DIR), { recursive: true });

      for (const ledger of ledgers.values()) {
        writeFileDurable(
          path.join(staging, LEDGER_DIR, `${ledger.code}.json`),
          encodeDocument('instrument-ledger', ledger),
        );
      }
      if (budget) {
        writeFileDurable(path.join(staging, BUDGET_FILE), encodeDocument('budget-state', budget));
      }
      if (current) {
        this.carryForward(current, staging, ledgers, budget !== undefined);
      }

      this.verifyStaging(staging);
      fsyncDir(path.join(staging, LEDGER_DIR));
      fsyncDir(staging);

      fs.mkdirSync(this.generationsDir, { recursive: true });
      fs.renameSync(staging, target);
      renamed = true;
      fsyncDir(this.generationsDir);

      this.writePointer(generationId);
    } catch (err) {
      removeQuietly(staging);
      if (renamed) removeQuietly(target);
      log.error({ err, generation: generationId }, 'Ledger save failed, previous state kept');
      throw new PersistenceError(`Ledger save failed: ${errorMessage(err)}`, { cause: err });
    }

    log.debug({ generation: generationId, documents: ledgers.size }, 'Ledger generation committed');
    this.pruneQuietly(generationId);
    return generationId;
  }

  private validateBeforeWrite(ledgers: ReadonlyMap<string, InstrumentLedger>, budget?: BudgetState): void {
    for (const [code, ledger] of ledgers) {
      if (code !== ledger.code) {
        throw new PersistenceError(`Ledger keyed ${code} carries code ${ledger.code}`);
      }
      const parsed = instrumentLedgerSchema.safeParse(ledger);
      if (!parsed.success) {
        throw new PersistenceError(
          `Ledger ${code} failed validation: ${parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
        );
      }
      const problems = ledgerInvariantProblems(ledger);
      if (problems.length > 0) {
        throw new PersistenceError(`Ledger ${code} violates invariants: ${problems.join('; ')}`);
      }
    }
    if (budget && !budgetStateSchema.safeParse(budget).success) {
      throw new PersistenceError('Budget state failed validation');
    }
  }

  private currentGenerationForWrite(): string | null {
    try {
      return this.currentGeneration();
    } catch (err) {
      throw new PersistenceError(`Cannot resolve current generation: ${errorMessage(err)}`, { cause: err });
    }
  }

  /**
   * 포인터 교체 전에 중단된 저장의 흔적 삭제
   * 현재 세대보다 새로운 세대는 커밋된 적이 없으므로 백업으로 남기지 않는다.
   */
  private discardUncommitted(current: string | null): void {
    try {
      for (const orphan of this.listGenerations().filter((g) => current === null || g > current)) {
        fs.rmSync(this.generationPath(orphan), { recursive: true, force: true });
        log.warn({ generation: orphan }, 'Removed generation left by an interrupted save');
      }
      this.removeStaleStaging();
    } catch (err) {
      throw new PersistenceError(`Cannot clear interrupted save: ${errorMessage(err)}`, { cause: err });
    }
  }

  /** 이번 세트에 없는 종목 문서·예산 문서는 현재 세대에서 이어받는다 (유효한 것만) */
  private carryForward(
    current: string,
    staging: string,
    ledgers: ReadonlyMap<string, InstrumentLedger>,
    hasBudget: boolean,
  ): void {
    const sourceDir = path.join(this.generationPath(current), LEDGER_DIR);
    const files = fs.existsSync(sourceDir) ? fs.readdirSync(sourceDir) : [];
    for (const file of files) {
      if (!file.endsWith('.json')) continue;
      const code = file.slice(0, -'.json'.length);
      if (ledgers.has(code)) continue;
      const text = readText(path.join(sourceDir, file));
      if (!decodeLedger(text, code).ok) {
        log.warn({ code, generation: current }, 'Invalid document not carried forward');
        continue;
      }
      writeFileDurable(path.join(staging, LEDGER_DIR, file), text);
    }

    const budgetPath = path.join(this.generationPath(current), BUDGET_FILE);
    if (!hasBudget && fs.existsSync(budgetPath)) {
      const text = readText(budgetPath);
      if (decodeBudget(text).ok) {
        writeFileDurable(path.join(staging, BUDGET_FILE), text);
      }
    }
  }

  /** 스테이징 문서를 다시 읽어 구조·불변식·체크섬 검증 */
  private verifyStaging(staging: string): void {
    const ledgerDir = path.join(staging, LEDGER_DIR);
    for (const file of fs.readdirSync(ledgerDir)) {
      const code = file.slice(0, -'.json'.length);
      const result = decodeLedger(readText(path.join(ledgerDir, file)), code);
      if (!result.ok) {
        throw new PersistenceError(`Staged document ${file} failed verification: ${result.problem}`);
      }
    }
    const budgetPath = path.join(staging, BUDGET_FILE);
    if (fs.existsSync(budgetPath)) {
      const result = decodeBudget(readText(budgetPath));
      if (!result.ok) {
        throw new PersistenceError(`Staged budget failed verification: ${result.problem}`);
      }
    }
  }

  private writePointer(generationId: string): void {
    const tmp = `${this.pointerPath}.tmp`;
    writeFileDurable(tmp, `${generationId}\n`);
    fs.renameSync(tmp, this.pointerPath);
    fsyncDir(this.dataDir);
  }

  // ─── 정리 ────────────────────────────────────────────────────────────────

  private pruneQuietly(current: string): void {
    try {
      const removed = this.prune(current);
      if (removed.length > 0) {
        log.debug({ removed }, 'Pruned ledger backups');
      }
    } catch (err) {
      log.warn({ err }, 'Backup pruning failed (non-fatal)');
    }
  }

  /** 백업: 최근 backupMaxCount개, backupMaxAgeHours 이내만 유지 (가장 최근 백업 1개는 항상 유지) */
  private prune(current: string): string[] {
    const removed: string[] = [];
    const now = this.now();
    const backups = this.listGenerations().filter((g) => g < current).reverse();

    backups.forEach((id, index) => {
      if (index === 0) return;
      const tooMany = index >= this.backupMaxCount;
      const tooOld = now - generationTimestamp(id) > this.backupMaxAgeMs;
      if (tooMany || tooOld) {
        fs.rmSync(this.generationPath(id), { recursive: true, force: true });
        removed.push(id);
      }
    });
    return removed;
  }

  private removeStaleStaging(): void {
    if (!fs.existsSync(this.stagingDir)) return;
    for (const entry of fs.readdirSync(this.stagingDir)) {
      fs.rmSync(path.join(this.stagingDir, entry), { recursive: true, force: true });
      log.warn({ staging: entry }, 'Removed staging left by an interrupted save');
    }
  }

  // ─── 세대 id ─────────────────────────────────────────────────────────────

  private listGenerations(): string[] {
    if (!fs.existsSync(this.generationsDir)) return [];
    return fs
      .readdirSync(this.generationsDir)
      .filter((name) => GENERATION_RE.test(name))
      .sort();
  }

  private isGenerationReadable(id: string): boolean {
    const dir = path.join(this.generationPath(id), LEDGER_DIR);
    if (!fs.existsSync(dir)) return false;
    return fs
      .readdirSync(dir)
      .every((file) => decodeLedger(readText(path.join(dir, file)), file.slice(0, -'.json'.length)).ok);
  }

  private generationPath(id: string): string {
    return path.join(this.generationsDir, id);
  }

  /** 시간순 정렬 가능한 id. 시계가 뒤로 가도 현재 세대보다 크게 만든다 */
  private nextGenerationId(current: string | null): string {
    let ts = this.now();
    let seq = 0;
    if (current) {
      const cts = generationTimestamp(current);
      if (ts <= cts) {
        ts = cts;
        seq = generationSeq(current) + 1;
      }
    }
    for (;;) {
      if (seq > 999) {
        ts += 1;
        seq = 0;
      }
      const id = formatGenerationId(ts, seq);
      if (!fs.existsSync(this.generationPath(id)) && !fs.existsSync(path.join(this.stagingDir, id))) {
        return id;
      }
      seq += 1;
    }
  }
}

// ─── 파일 유틸 ───────────────────────────────────────────────────────────────

function formatGenerationId(ts: number, seq: number): string {
  return `${String(ts).padStart(13, '0')}-${String(seq).padStart(3, '0')}`;
}

function generationTimestamp(id: string): number {
  const m = GENERATION_RE.exec(id);
  return m?.[1] !== undefined ? Number(m[1]) : 0;
}

function generationSeq(id: string): number {
  const m = GENERATION_RE.exec(id);
  return m?.[2] !== undefined ? Number(m[2]) : 0;
}

function readText(filePath: string): string {
  return fs.readFileSync(filePath, 'utf-8');
}

function writeFileDurable(filePath: string, data: string): void {
  const fd = fs.openSync(filePath, 'w');
  try {
    fs.writeSync(fd, data);
    fs.fsyncSync(fd);
  } finally {
    fs.closeSync(fd);
  }
}

/** 디렉터리 엔트리 영속화 (지원하지 않는 플랫폼에서는 건너뜀) */
function fsyncDir(dir: string): void {
  let fd: number | null = null;
  try {
    fd = fs.openSync(dir, 'r');
    fs.fsyncSync(fd);
  } catch (err) {
    log.debug({ err, dir }, 'Directory fsync unsupported');
  } finally {
    if (fd !== null) fs.closeSync(fd);
  }
}

function removeQuietly(target: string): void {
  try {
    fs.rmSync(target, { recursive: true, force: true });
  } catch (err) {
    log.warn({ err, target }, 'Cleanup after failed save did not complete');
  }
}

function isNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
