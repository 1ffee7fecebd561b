import type { LogEntry, LogRow } from '../types.js';

export function toLogEntry(row: LogRow): LogEntry {
  const { dt, raw, ...rest } = row;
  const entry: LogEntry = {
    dt: typeof dt === 'string' ? dt : dt === undefined || dt === null ? '' : String(dt),
    extra: new Map(Object.entries(rest))
  };

  if (raw !== undefined) {
    entry.raw = typeof raw === 'string' ? raw : JSON.stringify(raw);
  }
  return entry;
}

/** Plain object view in `dt`, `raw`, extras order. */
export function toDisplayRow(entry: LogEntry): LogRow {
  const row: LogRow = { dt: entry.dt };
  if (entry.raw !== undefined) row.raw = entry.raw;
  for (const [key, value] of entry.extra) {
    row[key] = value;
  }
  return row;
}

export function withExtraField(entry: LogEntry, key: string, value: unknown): LogEntry {
  const extra = new Map(entry.extra);
  extra.set(key, value);
  return { ...entry, extra };
}
