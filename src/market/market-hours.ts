const KST_OFFSET_MS = 9 * 3600 * 1000;

/** 09:00 ~ 15:30 KST (분 단위) */
const SESSION_OPEN_MIN = 9 * 60;
const SESSION_CLOSE_MIN = 15 * 60 + 30;

/** KST 기준 날짜 (YYYY-MM-DD) */
export function kstDayKey(ts: number): string {
  return new Date(ts + KST_OFFSET_MS).toISOString().slice(0, 10);
}

/**
 * 정규장 여부 (평일 09:00~15:30 KST)
 * 공휴일은 시세 소스가 판단: 여기서는 요일·시간만 본다.
 */
export function isKrxSessionOpen(ts: number): boolean {
  const kst = new Date(ts + KST_OFFSET_MS);
  const day = kst.getUTCDay();
  if (day === 0 || day === 6) return false;
  const minutes = kst.getUTCHours() * 60 + kst.getUTCMinutes();
  return minutes >= SESSION_OPEN_MIN && minutes < SESSION_CLOSE_MIN;
}
