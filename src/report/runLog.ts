import { appendFile, mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';

import { stringify } from 'csv-stringify/sync';

import type { RunLogRow } from '../schema/index.js';
import { runLogRowSchema } from '../schema/index.js';

// ── Format ───────────────────────────────────────────────────

export const RUN_LOG_HEADER = [
  'timestamp',
  'generated_query',
  'search_url',
  'response_status',
  'execution_time',
  'category',
  'query_type',
] as const;

/** `search_log_YYYYMMDD_HHMMSS.csv`, local time. */
export function runLogFileName(startedAt: Date): string {
  const pad = (n: number): string => String(n).padStart(2, '0');
  const date = `${String(startedAt.getFullYear())}${pad(startedAt.getMonth() + 1)}${pad(startedAt.getDate())}`;
  const time = `${pad(startedAt.getHours())}${pad(startedAt.getMinutes())}${pad(startedAt.getSeconds())}`;
  return `search_log_${date}_${time}.csv`;
}

export function formatRow(row: RunLogRow): string[] {
  return [
    row.timestamp,
    row.query,
    row.locator,
    row.status,
    row.executionTime.toFixed(2),
    row.category,
    row.queryType,
  ];
}

// ── Error ────────────────────────────────────────────────────

/** The run's record cannot be written; the run is invalid. */
export class RunLogError extends Error {
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'RunLogError';
  }
}

// ── Logger ───────────────────────────────────────────────────

/**
 * Append-only CSV record of one run. Each append opens, writes and
 * closes the file, so every completed row survives a crash.
 */
export class RunLogger {
  private file: string | undefined;

  constructor(private readonly directory: string) {}

  get filePath(): string | undefined {
    return this.file;
  }

  /** Create the log file and write the header. Never overwrites. */
  async init(startedAt: Date): Promise<string> {
    const file = path.resolve(this.directory, runLogFileName(startedAt));
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(file, stringify([[...RUN_LOG_HEADER]]), {
        encoding: 'utf-8',
        flag: 'wx',
      });
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new RunLogError(`Cannot create run log ${file}: ${message}`, {
        cause: err,
      });
    }

    this.file = file;
    return file;
  }

  async append(row: RunLogRow): Promise<void> {
    if (this.file === undefined) {
      throw new RunLogError('Run log used before init()');
    }

    const valid = runLogRowSchema.parse(row);
    try {
      await appendFile(this.file, stringify([formatRow(valid)]), 'utf-8');
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      throw new RunLogError(`Cannot append to run log ${this.file}: ${message}`, {
        cause: err,
      });
    }
  }
}
