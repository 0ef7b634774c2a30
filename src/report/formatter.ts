import type { BudgetState, InstrumentLedger } from '../types/index.js';
import type { LedgerReport, MonthlyPnl } from './summary.js';

/**
 * 콘솔 테이블 출력
 */
export function formatLedgerReport(report: LedgerReport, budget: BudgetState | null): string {
  const lines: string[] = [];

  lines.push('');
  lines.push('═══════════════════════════════════════════');
  lines.push('          LEDGER REPORT');
  lines.push('═══════════════════════════════════════════');
  lines.push('');

  if (budget) {
    lines.push(formatSection('Budget', [
      ['Initial Budget', formatKrw(budget.initialBudget)],
      ['Effective Budget', formatKrw(budget.effectiveBudget)],
      ['Realized PnL', formatKrw(budget.realizedPnl)],
      ['Equity Samples', String(budget.performanceWindow.length)],
    ]));
  }

  lines.push(formatSection('Sells', [
    ['Total Sells', String(report.sellCount)],
    ['Win Rate', `${(report.winRate * 100).toFixed(1)}%`],
    ['Wins / Losses', `${report.winCount} / ${report.sellCount - report.winCount}`],
    ['Stop-losses', String(report.stopLossCount)],
    ['Realized PnL', formatKrw(report.totalRealized)],
    ['Open Exposure', formatKrw(report.totalExposure)],
  ]));

  if (report.monthly.length > 0) {
    lines.push('── Monthly PnL ──────────────────────────');
    lines.push(formatMonthlyTable(report.monthly));
  }

  lines.push('');
  return lines.join('\n');
}

/**
 * 종목별 차수 현황
 */
export function formatStatus(ledgers: Iterable<InstrumentLedger>): string {
  const lines: string[] = [];
  lines.push('  Code     Stage  Entry Price   Qty (rem/entry)   Entered           Status');
  lines.push('  ──────── ───── ──────────── ───────────────── ───────────────── ──────');

  for (const ledger of ledgers) {
    if (ledger.stages.length === 0) {
      lines.push(`  ${ledger.code.padEnd(8)} ${'-'.padStart(5)} ${'(no stages)'.padStart(12)}`);
      continue;
    }
    for (const s of ledger.stages) {
      const qty = `${s.remainingQuantity}/${s.entryQuantity}`.padStart(17);
      const status = s.isOpen ? 'OPEN' : 'CLOSED';
      lines.push(
        `  ${ledger.code.padEnd(8)} ${String(s.stageNumber).padStart(5)} ${String(Math.round(s.entryPrice)).padStart(12)} ${qty} ${formatDate(s.entryTimestamp)} ${status}`,
      );
    }
  }
  return lines.join('\n');
}

function formatSection(title: string, rows: [string, string][]): string {
  const lines: string[] = [];
  lines.push(`── ${title} ${'─'.repeat(38 - title.length)}`);
  for (const [key, value] of rows) {
    lines.push(`  ${key.padEnd(22)} ${value}`);
  }
  lines.push('');
  return lines.join('\n');
}

export function formatKrw(value: number): string {
  const sign = value >= 0 ? '' : '-';
  const abs = Math.abs(value);
  if (abs >= 1_000_000) {
    return `${sign}${(abs / 1_000_000).toFixed(2)}M KRW`;
  }
  if (abs >= 1_000) {
    return `${sign}${(abs / 1_000).toFixed(1)}K KRW`;
  }
  return `${sign}${abs.toFixed(0)} KRW`;
}

function formatMonthlyTable(monthly: MonthlyPnl[]): string {
  const lines: string[] = [];
  lines.push('  Year-Mo    PnL          Sells');
  lines.push('  ────────── ──────────── ──────');

  for (const m of monthly) {
    const pnl = formatKrw(m.pnl).padStart(12);
    lines.push(`  ${m.month.padEnd(10)} ${pnl}   ${String(m.sellCount).padStart(4)}`);
  }

  return lines.join('\n');
}

function formatDate(ms: number): string {
  const d = new Date(ms + 9 * 3600 * 1000);
  return d.toISOString().slice(0, 16).replace('T', ' ');
}
