import type { Value } from './utils/values.js';

// JSON:API format from the Better Stack Telemetry API
export interface SourceAttributes {
  name: string;
  platform: string;
  token: string;
  team_id: number;
  table_name: string;
  created_at: string;
  updated_at: string;
  ingesting_paused: boolean;
  messages_count: number;
  bytes_count: number;
}

export interface SourceDescriptor {
  id: string;
  type: string;
  attributes: SourceAttributes;
}

export interface Pagination {
  first?: string | null;
  last?: string | null;
  prev?: string | null;
  next?: string | null;
}

export interface SourcesPage {
  data: SourceDescriptor[];
  pagination?: Pagination;
}

/** Ordered field-path to value filters; insertion order is clause order. */
export type WhereFilters = Map<string, Value>;

export interface QueryOptions {
  limit?: number;
  level?: string;
  subsystem?: string;
  since?: string;
  until?: string;
  search?: string;
  where?: WhereFilters;
  fields?: string[];
  source?: string;
  sources?: string[];
  verbose?: boolean;
}

/** A decoded JSONEachRow line. */
export type LogRow = Record<string, unknown>;

/**
 * Rendering view of a row: the timestamp and raw payload every log row
 * carries, plus the selected aliases and pass-through columns in order.
 */
export interface LogEntry {
  dt: string;
  raw?: string;
  extra: Map<string, unknown>;
}

export type OutputFormat = 'json' | 'table' | 'csv' | 'pretty';

export const OUTPUT_FORMATS: readonly OutputFormat[] = ['json', 'table', 'csv', 'pretty'];

export function isOutputFormat(value: unknown): value is OutputFormat {
  return typeof value === 'string' && (OUTPUT_FORMATS as readonly string[]).includes(value);
}
