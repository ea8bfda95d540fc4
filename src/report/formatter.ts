import type { RunOutcome, StatusSnapshot } from '../types/index.js';

/**
 * Final statistics block, printed once at shutdown.
 */
export function formatFinalReport(market: string, outcome: RunOutcome): string {
  const { stats } = outcome;
  const lines: string[] = [];

  lines.push('');
  lines.push('═══════════════════════════════════════════');
  lines.push('          GRID BOT SUMMARY');
  lines.push('═══════════════════════════════════════════');
  lines.push('');

  lines.push(formatSection('Run', [
    ['Market', market],
    ['Final State', outcome.finalState],
    ['Exit Code', String(outcome.exitCode)],
    ['Uptime', formatDuration(stats.uptimeSec)],
    ['Emergency Reason', stats.emergencyReason ?? '-'],
  ]));

  lines.push(formatSection('Orders', [
    ['Total Trades', String(stats.totalTrades)],
    ['Open Orders', String(stats.openOrders)],
    ['Pending Rungs', String(stats.pendingRungs)],
    ['Consec. Failures', String(stats.consecutiveFailures)],
  ]));

  return lines.join('\n');
}

/** single line, logged every statusEverySec */
export function formatStatusLine(s: StatusSnapshot): string {
  return (
    `[${s.state}] ${s.market} price=${s.lastPrice} ` +
    `open=${s.openOrders} pending=${s.pendingRungs} trades=${s.totalTrades} ` +
    `failures=${s.consecutiveFailures} uptime=${formatDuration(s.uptimeSec)}`
  );
}

export function formatDuration(totalSec: number): string {
  const sec = Math.max(0, Math.floor(totalSec));
  const h = Math.floor(sec / 3600);
  const m = Math.floor((sec % 3600) / 60);
  const s = sec % 60;
  if (h > 0) return `${h}h ${m}m ${s}s`;
  if (m > 0) return `${m}m ${s}s`;
  return `${s}s`;
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
