/**
 * Live execution logger for searchloop.
 *
 * All output goes to stderr so stdout stays clean for `generate` output.
 * Emoji prefixes give instant visual context in the terminal.
 */

// ── Levels ──────────────────────────────────────────────────

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

let threshold: LogLevel = 'info';

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(threshold);
}

// ── Core write ──────────────────────────────────────────────

function write(message: string, level: LogLevel = 'info'): void {
  if (!enabled(level)) return;
  process.stderr.write(message + '\n');
}

// ── Public API ──────────────────────────────────────────────

export function debug(message: string): void {
  write(`🐛 ${message}`, 'debug');
}

export function info(message: string): void {
  write(`ℹ️  ${message}`);
}

export function detail(message: string): void {
  write(`   ${message}`);
}

export function warn(message: string): void {
  write(`⚠️  ${message}`, 'warn');
}

export function error(message: string): void {
  write(`💥 ${message}`, 'error');
}

export function section(title: string): void {
  write(`\n${'─'.repeat(50)}`);
  write(`▶  ${title}`);
  write(`${'─'.repeat(50)}`);
}

export function cycle(index: number, total: number): void {
  write(`\n🔁 Cycle ${String(index)}/${String(total)}`);
}

export function query(text: string, category: string, queryType: string): void {
  write(`🧠 Query: "${text}" [${category} / ${queryType}]`);
}

export function web(message: string): void {
  write(`🌐 ${message}`);
}

export function outcome(success: boolean, text: string): void {
  write(success ? `✅ Success: ${text}` : `❌ Failed: ${text}`);
}

export function progress(successful: number, attempted: number): void {
  write(`📈 Progress: ${String(successful)}/${String(attempted)} successful`);
}

export function recovery(message: string): void {
  write(`🩹 ${message}`, 'warn');
}

// Rewrites a single terminal line; call countdownDone() to finish it.
export function countdown(remainingSeconds: number): void {
  if (!enabled('info')) return;
  process.stderr.write(`\r⏳ Next search in: ${String(remainingSeconds).padStart(2)}s`);
}

export function countdownDone(): void {
  if (!enabled('info')) return;
  process.stderr.write('\n');
}
