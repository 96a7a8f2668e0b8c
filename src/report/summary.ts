import type { RunSummary } from '../schema/index.js';

// ── Duration ─────────────────────────────────────────────────

/** `H:MM:SS`, the way a session clock reads. */
export function formatDuration(durationMs: number): string {
  const totalSeconds = Math.floor(durationMs / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;
  return `${String(hours)}:${String(minutes).padStart(2, '0')}:${String(seconds).padStart(2, '0')}`;
}

// ── Summary block ────────────────────────────────────────────

const EXIT_LABELS: Record<RunSummary['exitReason'], string> = {
  completed: 'completed',
  interrupted: 'interrupted by user',
  fatal: 'aborted (fatal)',
};

export function formatSummary(summary: RunSummary, logFile?: string): string {
  const rule = '='.repeat(60);
  const lines = [
    rule,
    '📊 EXECUTION SUMMARY',
    rule,
    `✅ Successful searches: ${String(summary.successful)}`,
    `❌ Failed searches: ${String(summary.failed)}`,
    `📈 Success rate: ${summary.successRate.toFixed(1)}%`,
    `⏱️  Session duration: ${formatDuration(summary.durationMs)}`,
    `🏁 Run ${EXIT_LABELS[summary.exitReason]} (${String(summary.successful + summary.failed)}/${String(summary.plannedCycles)} cycles)`,
  ];

  if (summary.fatalError !== undefined) {
    lines.push(`💥 ${summary.fatalError}`);
  }
  if (logFile !== undefined) {
    lines.push(`📝 Results logged to: ${logFile}`);
  }
  lines.push(rule);

  return lines.join('\n');
}
