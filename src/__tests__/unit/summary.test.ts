import { describe, expect, it } from 'vitest';

import { formatDuration, formatSummary } from '../../report/summary.js';
import type { RunSummary } from '../../schema/index.js';

describe('formatDuration', () => {
  it.each([
    [0, '0:00:00'],
    [59_999, '0:00:59'],
    [61_000, '0:01:01'],
    [3_723_000, '1:02:03'],
    [36_000_000, '10:00:00'],
  ])('%d ms reads %s', (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});

describe('formatSummary', () => {
  const summary: RunSummary = {
    plannedCycles: 10,
    successful: 7,
    failed: 2,
    successRate: (7 / 9) * 100,
    durationMs: 125_000,
    exitReason: 'interrupted',
  };

  it('prints counts, rate, duration and exit reason', () => {
    const lines = formatSummary(summary).split('\n');

    expect(lines).toEqual([
      '='.repeat(60),
      '📊 EXECUTION SUMMARY',
      '='.repeat(60),
      '✅ Successful searches: 7',
      '❌ Failed searches: 2',
      '📈 Success rate: 77.8%',
      '⏱️  Session duration: 0:02:05',
      '🏁 Run interrupted by user (9/10 cycles)',
      '='.repeat(60),
    ]);
  });

  it('adds the fatal error and log file when present', () => {
    const text = formatSummary(
      { ...summary, exitReason: 'fatal', fatalError: 'Cannot continue - browser recovery failed' },
      '/tmp/search_log_20240102_030405.csv',
    );
    const lines = text.split('\n');

    expect(lines[7]).toBe('🏁 Run aborted (fatal) (9/10 cycles)');
    expect(lines[8]).toBe('💥 Cannot continue - browser recovery failed');
    expect(lines[9]).toBe('📝 Results logged to: /tmp/search_log_20240102_030405.csv');
  });
});
