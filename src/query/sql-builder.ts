import { SourceNotSpecified } from '../errors.js';
import { resolveSourceAlias } from '../sources.js';
import type { QueryOptions, SourceDescriptor } from '../types.js';
import { parseTimeString, toClickHouseDateTime } from '../utils/time.js';
import { compactJson, type Value } from '../utils/values.js';
import { buildJsonAccessor } from './json-path.js';

export const DEFAULT_QUERY_LIMIT = 100;

const LEVEL_EXPRESSION =
  "lowerUTF8(COALESCE(JSONExtractString(raw, 'level'), JSON_VALUE(raw, '$.level'), " +
  "JSON_VALUE(raw, '$.levelName'), JSON_VALUE(raw, '$.vercel.level')))";
const MESSAGE_EXPRESSION = "COALESCE(JSONExtractString(raw, 'message'), JSON_VALUE(raw, '$.message'))";
const STATUS_EXPRESSION = "toInt32OrZero(JSON_VALUE(raw, '$.vercel.proxy.status_code'))";

export interface BuildSettings {
  defaultLogLevel?: string;
  defaultLimit?: number;
  now: Date;
}

export interface SourceSettings {
  defaultSource?: string;
  sourceAliases?: Record<string, string>;
}

/**
 * Escape user text for a single-quoted ClickHouse literal: backslashes are
 * doubled, then single quotes are doubled.
 */
export function sanitizeSqlString(input: string): string {
  return input.replace(/\\/g, '\\\\').replace(/'/g, "''");
}

export function resolveSourceName(options: QueryOptions, settings: SourceSettings): string {
  const name = resolveSourceAlias(options.source ?? settings.defaultSource, settings.sourceAliases ?? {});
  if (!name) {
    throw new SourceNotSpecified();
  }
  return name;
}

export function effectiveLevel(options: QueryOptions, defaultLogLevel?: string): string | undefined {
  if (options.level !== undefined) return options.level;
  if (defaultLogLevel && defaultLogLevel.toLowerCase() !== 'all') return defaultLogLevel;
  return undefined;
}

export function buildFieldSelection(fields: string[]): string {
  const selections = ['dt'];

  for (const field of fields) {
    if (field === '*' || field === 'raw') {
      selections.push('raw');
      continue;
    }
    if (field === 'dt') continue;

    selections.push(`${buildJsonAccessor(field)} AS "${field.replace(/"/g, '""')}"`);
  }

  return selections.join(', ');
}

export function buildLevelCondition(level: string): string {
  const escaped = sanitizeSqlString(level).toLowerCase();

  if (escaped === 'error') {
    return (
      `(${LEVEL_EXPRESSION} = 'error'` +
      ` OR ${STATUS_EXPRESSION} >= 500` +
      ` OR positionCaseInsensitive(${MESSAGE_EXPRESSION}, 'error') > 0` +
      ` OR JSONHas(raw, 'error'))`
    );
  }

  if (escaped === 'warning' || escaped === 'warn') {
    return (
      `(${LEVEL_EXPRESSION} IN ('${escaped}', 'warning', 'warn')` +
      ` OR (${STATUS_EXPRESSION} >= 400 AND ${STATUS_EXPRESSION} < 500))`
    );
  }

  return `${LEVEL_EXPRESSION} = '${escaped}'`;
}

export function buildWhereCondition(field: string, value: Value): string {
  const accessor = buildJsonAccessor(field);

  switch (value.kind) {
    case 'null':
      return `${accessor} IS NULL`;
    case 'string':
      return `${accessor} = '${sanitizeSqlString(value.value)}'`;
    case 'bool':
      return `${accessor} = '${value.value ? 'true' : 'false'}'`;
    case 'int':
    case 'float':
      return `${accessor} = '${sanitizeSqlString(String(value.value))}'`;
    case 'object':
    case 'array':
      return `${accessor} = '${sanitizeSqlString(compactJson(value))}'`;
  }
}

const timeBound = (operator: '>=' | '<=', input: string, now: Date): string =>
  `dt ${operator} toDateTime64('${toClickHouseDateTime(parseTimeString(input, now))}', 3)`;

/**
 * Compiles query options into one ClickHouse statement against the source's
 * hot table, with a cold-storage `UNION ALL` branch when a search is present.
 */
export function buildSqlStatement(
  options: QueryOptions,
  source: SourceDescriptor,
  settings: BuildSettings
): string {
  const level = effectiveLevel(options, settings.defaultLogLevel);
  const { team_id, table_name } = source.attributes;
  const tablePrefix = `t${team_id}_${table_name}`;

  const requested = options.fields && options.fields.length > 0 && options.fields[0] !== '*' ? options.fields : undefined;
  const fields = requested ? buildFieldSelection(requested) : 'dt, raw';

  let sql = `SELECT ${fields} FROM remote(${tablePrefix}_logs)`;

  const conditions: string[] = [];

  if (options.since) conditions.push(timeBound('>=', options.since, settings.now));
  if (options.until) conditions.push(timeBound('<=', options.until, settings.now));
  if (level) conditions.push(buildLevelCondition(level));
  if (options.subsystem) {
    conditions.push(`${buildJsonAccessor('subsystem')} = '${sanitizeSqlString(options.subsystem)}'`);
  }
  if (options.search) conditions.push(`raw LIKE '%${sanitizeSqlString(options.search)}%'`);

  const whereConditions: string[] = [];
  for (const [field, value] of options.where ?? []) {
    whereConditions.push(buildWhereCondition(field, value));
  }
  conditions.push(...whereConditions);

  if (conditions.length > 0) {
    sql += ` WHERE ${conditions.join(' AND ')}`;
  }

  if (options.search) {
    const coldConditions = ['_row_type = 1'];
    coldConditions.push(
      options.since ? timeBound('>=', options.since, settings.now) : 'dt > now() - INTERVAL 24 HOUR'
    );
    if (options.until) coldConditions.push(timeBound('<=', options.until, settings.now));
    coldConditions.push(`raw LIKE '%${sanitizeSqlString(options.search)}%'`);
    coldConditions.push(...whereConditions);

    sql += ` UNION ALL SELECT ${fields} FROM s3Cluster(primary, ${tablePrefix}_s3)`;
    sql += ` WHERE ${coldConditions.join(' AND ')}`;
  }

  sql += ' ORDER BY dt DESC';
  sql += ` LIMIT ${options.limit || settings.defaultLimit || DEFAULT_QUERY_LIMIT}`;
  sql += ' FORMAT JSONEachRow';

  return sql;
}
