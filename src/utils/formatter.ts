import type { LogRow, OutputFormat } from '../types.js';
import { blue, cyan, dim, red, white, yellow } from './colors.js';

const LEVEL_PATTERN = /\b(ERROR|WARN|WARNING|INFO|DEBUG|FATAL)\b/i;
const PRETTY_EXCLUDED_KEYS = new Set(['dt', 'raw', 'level', 'message', 'subsystem', 'time', 'severity']);
const TABLE_COLUMN_WIDTHS: Record<string, number> = { raw: 50, message: 40 };

const nonEmptyString = (value: unknown): value is string => typeof value === 'string' && value.length > 0;

/** The `raw` column decoded as a JSON object, when it is one. */
export function parseRaw(raw: unknown): Record<string, unknown> | undefined {
  let candidate: unknown = raw;
  if (typeof raw === 'string') {
    try {
      candidate = JSON.parse(raw);
    } catch {
      return undefined;
    }
  }
  if (candidate !== null && typeof candidate === 'object' && !Array.isArray(candidate)) {
    return Object.fromEntries(Object.entries(candidate));
  }
  return undefined;
}

export function extractLevel(row: LogRow): string | undefined {
  if (nonEmptyString(row.level)) return row.level;

  const parsed = parseRaw(row.raw);
  if (parsed) {
    if (nonEmptyString(parsed.level)) return parsed.level;
    if (nonEmptyString(parsed.severity)) return parsed.severity;
    const vercel = parseRaw(parsed.vercel);
    if (vercel && nonEmptyString(vercel.level)) return vercel.level;
    return undefined;
  }

  if (typeof row.raw === 'string') {
    return LEVEL_PATTERN.exec(row.raw)?.[1];
  }
  return undefined;
}

export function extractMessage(row: LogRow): string {
  if (nonEmptyString(row.message)) return row.message;

  const parsed = parseRaw(row.raw);
  if (parsed) {
    const primary = parsed.message || parsed.msg;
    if (nonEmptyString(primary)) return primary;
    return JSON.stringify(parsed);
  }

  if (nonEmptyString(row.raw)) return row.raw;
  return JSON.stringify(row);
}

export function extractSubsystem(row: LogRow): string | undefined {
  if (nonEmptyString(row.subsystem)) return row.subsystem;

  const parsed = parseRaw(row.raw);
  if (parsed) {
    const candidate = parsed.subsystem || parsed.service || parsed.component;
    if (nonEmptyString(candidate)) return candidate;
  }
  return undefined;
}

export function formatBytes(bytes: number): string {
  if (bytes <= 0) return '0 Bytes';

  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB', 'TB'];
  const i = Math.min(sizes.length - 1, Math.floor(Math.log(bytes) / Math.log(k)));
  return `${(bytes / Math.pow(k, i)).toFixed(2)} ${sizes[i]}`;
}

function colorLevel(level: string | undefined): string {
  if (!level) return dim('LOG');

  const label = level.toUpperCase();
  switch (level.toLowerCase()) {
    case 'error':
    case 'fatal':
      return red(label);
    case 'warn':
    case 'warning':
      return yellow(label);
    case 'info':
      return blue(label);
    case 'debug':
      return dim(label);
    default:
      return white(label);
  }
}

function formatValue(value: unknown): string {
  if (value === null || value === undefined) return 'null';
  if (typeof value === 'object') return JSON.stringify(value, null, 2);
  return String(value);
}

/** Fields shown under a pretty line: decoded `raw` keys, then the row's own columns. */
export function extraFields(row: LogRow): Map<string, unknown> {
  const extras = new Map<string, unknown>();

  if (row.raw !== undefined && row.raw !== null) {
    const parsed = parseRaw(row.raw);
    if (parsed) {
      for (const [key, value] of Object.entries(parsed)) {
        if (!PRETTY_EXCLUDED_KEYS.has(key)) extras.set(key, value);
      }
    } else {
      extras.set('raw', row.raw);
    }
  }

  for (const [key, value] of Object.entries(row)) {
    if (!PRETTY_EXCLUDED_KEYS.has(key)) extras.set(key, value);
  }
  return extras;
}

function formatPretty(rows: LogRow[]): string {
  const lines: string[] = [];

  for (const row of rows) {
    const timestamp = typeof row.dt === 'string' ? row.dt : 'No timestamp';
    const level = typeof row.level === 'string' ? row.level : extractLevel(row);
    const subsystem = extractSubsystem(row);

    let line = `${dim(timestamp)} ${colorLevel(level)}`;
    if (subsystem) line += ` ${cyan(`[${subsystem}]`)}`;
    line += ` ${extractMessage(row)}`;
    lines.push(line);

    for (const [key, value] of extraFields(row)) {
      lines.push(`  ${dim(key)}: ${formatValue(value)}`);
    }
  }

  return lines.join('\n');
}

function collectColumns(rows: LogRow[]): string[] {
  const columns: string[] = [];
  const seen = new Set<string>();
  for (const row of rows) {
    for (const key of Object.keys(row)) {
      if (!seen.has(key)) {
        seen.add(key);
        columns.push(key);
      }
    }
  }
  return columns;
}

function cellText(value: unknown): string {
  if (value === null || value === undefined) return '';
  if (typeof value === 'object') return JSON.stringify(value);
  return String(value);
}

function fitCell(text: string, width: number | undefined): string {
  const flat = text.replace(/\r?\n/g, ' ');
  if (width === undefined || flat.length <= width) return flat;
  return `${flat.slice(0, width - 1)}…`;
}

function formatTable(rows: LogRow[]): string {
  if (rows.length === 0) return 'No results found';

  const columns = collectColumns(rows);
  const cells = rows.map((row) => columns.map((column) => fitCell(cellText(row[column]), TABLE_COLUMN_WIDTHS[column])));
  const widths = columns.map((column, idx) => Math.max(column.length, ...cells.map((row) => row[idx].length)));

  const border = (left: string, join: string, right: string) =>
    `${left}${widths.map((w) => '─'.repeat(w + 2)).join(join)}${right}`;
  const line = (values: string[]) => `│${values.map((value, idx) => ` ${value.padEnd(widths[idx])} `).join('│')}│`;

  return [
    border('┌', '┬', '┐'),
    line(columns),
    border('├', '┼', '┤'),
    ...cells.map(line),
    border('└', '┴', '┘')
  ].join('\n');
}

export function escapeCsv(value: string): string {
  if (value.includes(',') || value.includes('"') || value.includes('\n')) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatCsv(rows: LogRow[]): string {
  if (rows.length === 0) return '';

  const columns = collectColumns(rows);
  const lines = [columns.map(escapeCsv).join(',')];
  for (const row of rows) {
    lines.push(columns.map((column) => escapeCsv(cellText(row[column]))).join(','));
  }
  return lines.join('\n');
}

export function formatOutput(rows: LogRow[], format: OutputFormat = 'json'): string {
  switch (format) {
    case 'pretty':
      return formatPretty(rows);
    case 'table':
      return formatTable(rows);
    case 'csv':
      return formatCsv(rows);
    case 'json':
      return JSON.stringify(rows, null, 2);
  }
}
