import { readFileSync, statSync } from 'node:fs';
import { ZodError } from 'zod';
import { createChildLogger } from '../logger.js';
import { tradingSettingsSchema, type TradingSettings } from './schema.js';

const log = createChildLogger('settings');

export class SettingsValidationError extends Error {
  readonly issues: string[];

  constructor(path: string, issues: string[]) {
    super(`Invalid settings in ${path}:\n  ${issues.join('\n  ')}`);
    this.name = 'SettingsValidationError';
    this.issues = issues;
  }
}

/**
 * JSON 설정 파싱 + 검증 (밴드 단조성 위반 등은 로드 시점 에러)
 */
export function parseSettings(raw: unknown, source = '<inline>'): TradingSettings {
  try {
    return tradingSettingsSchema.parse(raw);
  } catch (err) {
    if (err instanceof ZodError) {
      throw new SettingsValidationError(
        source,
        err.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
      );
    }
    throw err;
  }
}

export function loadSettingsFile(filePath: string): TradingSettings {
  const text = readFileSync(filePath, 'utf-8');
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new SettingsValidationError(filePath, [`not valid JSON: ${String(err)}`]);
  }
  return parseSettings(raw, filePath);
}

/**
 * 파일 mtime이 바뀐 경우에만 다시 읽는다.
 * 수정된 파일이 검증에 실패하면 직전 설정을 유지하고 경고만 남긴다.
 */
export class SettingsLoader {
  private readonly filePath: string;
  private current: TradingSettings | null = null;
  private loadedMtimeMs = -1;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  get(): TradingSettings {
    const mtimeMs = statSync(this.filePath).mtimeMs;
    if (this.current && mtimeMs === this.loadedMtimeMs) {
      return this.current;
    }

    try {
      const next = loadSettingsFile(this.filePath);
      const reloaded = this.current !== null;
      this.current = next;
      this.loadedMtimeMs = mtimeMs;
      log.info(
        { path: this.filePath, instruments: next.instruments.length, reloaded },
        reloaded ? 'Settings reloaded' : 'Settings loaded',
      );
      return next;
    } catch (err) {
      if (!this.current) throw err;
      log.warn({ err, path: this.filePath }, 'Settings change rejected, keeping previous settings');
      this.loadedMtimeMs = mtimeMs;
      return this.current;
    }
  }
}
