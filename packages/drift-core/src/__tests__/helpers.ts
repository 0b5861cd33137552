import type { CellValue, DataRecord, Window } from '../types.js';
import type { LogEntry, Logger } from '../logging/logger.js';
import { createLogger } from '../logging/logger.js';

/** Build a window from column arrays of equal length. */
export function windowFromColumns(columns: Record<string, readonly CellValue[]>): Window {
  const names = Object.keys(columns);
  const length = names.length > 0 ? (columns[names[0] ?? '']?.length ?? 0) : 0;
  const rows: DataRecord[] = [];
  for (let i = 0; i < length; i++) {
    const row: Record<string, CellValue> = {};
    for (const name of names) row[name] = columns[name]?.[i] ?? null;
    rows.push(row);
  }
  return { columns: names, rows };
}

/** `n` evenly spaced values in [start, start + 1). */
export function evenlySpaced(n: number, start: number): number[] {
  return Array.from({ length: n }, (_, i) => start + i / n);
}

export function repeat<T>(value: T, n: number): T[] {
  return Array.from({ length: n }, () => value);
}

export function captureLogger(level: 'debug' | 'info' | 'warn' = 'debug'): {
  logger: Logger;
  entries: LogEntry[];
} {
  const entries: LogEntry[] = [];
  return { logger: createLogger({ level, sink: (e) => entries.push(e) }), entries };
}
