import { InvalidQueryFormat } from '../errors.js';
import type { QueryOptions } from '../types.js';
import {
  arrayValue,
  boolValue,
  intValue,
  objectValue,
  stringValue,
  valueToText,
  type Value
} from '../utils/values.js';

const LOGS_PATTERN = /logs\s*\((.*?)\)\s*\{(.*?)\}/s;
const DIGITS_PATTERN = /^\d+$/;

const isQuoted = (text: string): boolean =>
  (text.startsWith("'") && text.endsWith("'")) || (text.startsWith('"') && text.endsWith('"'));

const unquote = (text: string): string => (text.length >= 2 && isQuoted(text) ? text.slice(1, -1) : text);

/**
 * Parses one shorthand argument value. Objects and arrays are split on commas
 * one level deep, so nested containers stay as literal strings.
 */
export function parseShorthandValue(text: string): Value {
  if (isQuoted(text)) return stringValue(text.slice(1, -1));
  if (DIGITS_PATTERN.test(text)) return intValue(parseInt(text, 10));
  if (text === 'true') return boolValue(true);
  if (text === 'false') return boolValue(false);

  if (text.startsWith('{') && text.endsWith('}')) {
    const entries: Array<[string, Value]> = [];
    for (const pair of text.slice(1, -1).split(',')) {
      const colon = pair.indexOf(':');
      if (colon < 0) continue;
      const key = unquote(pair.slice(0, colon).trim());
      const value = pair.slice(colon + 1).trim();
      if (key && value) entries.push([key, parseShorthandValue(value)]);
    }
    return objectValue(entries);
  }

  if (text.startsWith('[') && text.endsWith(']')) {
    return arrayValue(
      text
        .slice(1, -1)
        .split(',')
        .map((item) => parseShorthandValue(item.trim()))
    );
  }

  return stringValue(text);
}

/**
 * Splits `key: value, key: value` at top level. Commas and colons inside
 * quotes, braces or brackets belong to the value.
 */
export function parseArguments(text: string): Map<string, Value> {
  const result = new Map<string, Value>();

  let currentKey = '';
  let currentValue = '';
  let depth = 0;
  let inString = false;
  let stringChar = '';

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inString) {
      if (char === stringChar && (i === 0 || text[i - 1] !== '\\')) {
        inString = false;
      }
      currentValue += char;
    } else if (char === '"' || char === "'") {
      inString = true;
      stringChar = char;
      currentValue += char;
    } else if (char === '{' || char === '[') {
      depth++;
      currentValue += char;
    } else if (char === '}' || char === ']') {
      depth--;
      currentValue += char;
    } else if (char === ':' && depth === 0 && !currentKey) {
      currentKey = currentValue.trim();
      currentValue = '';
    } else if (char === ',' && depth === 0) {
      if (currentKey) {
        result.set(currentKey, parseShorthandValue(currentValue.trim()));
        currentKey = '';
        currentValue = '';
      }
    } else {
      currentValue += char;
    }
  }

  if (currentKey && currentValue) {
    result.set(currentKey, parseShorthandValue(currentValue.trim()));
  }

  return result;
}

function isPresent(value: Value | undefined): value is Value {
  if (!value) return false;
  switch (value.kind) {
    case 'string':
      return value.value.length > 0;
    case 'int':
    case 'float':
      return value.value !== 0;
    case 'bool':
      return value.value;
    case 'null':
      return false;
    case 'object':
      return value.entries.length > 0;
    case 'array':
      return value.items.length > 0;
  }
}

function parseLimit(value: Value): number {
  if (value.kind === 'int') return value.value;
  if (value.kind === 'string' && /^-?\d+$/.test(value.value.trim())) {
    return parseInt(value.value, 10);
  }
  throw new InvalidQueryFormat(`Invalid limit: ${valueToText(value)}`);
}

/**
 * Parses `{ logs(level: 'error', limit: 50) { dt, message } }` into query
 * options. The outer braces are optional.
 */
export function parseShorthandQuery(query: string): QueryOptions {
  let normalized = query.trim();
  if (normalized.startsWith('{') && normalized.endsWith('}')) {
    normalized = normalized.slice(1, -1).trim();
  }

  const match = LOGS_PATTERN.exec(normalized);
  if (!match) {
    throw new InvalidQueryFormat();
  }

  const [, argsText, fieldsText] = match;
  const options: QueryOptions = {};

  if (argsText) {
    const args = parseArguments(argsText);

    const limit = args.get('limit');
    if (limit) options.limit = parseLimit(limit);

    const level = args.get('level');
    if (isPresent(level)) options.level = valueToText(level);

    const subsystem = args.get('subsystem');
    if (isPresent(subsystem)) options.subsystem = valueToText(subsystem);

    const since = args.get('since');
    if (isPresent(since)) options.since = valueToText(since);

    const until = args.get('until');
    if (isPresent(until)) options.until = valueToText(until);

    const between = args.get('between');
    if (between?.kind === 'array' && between.items.length === 2) {
      options.since = valueToText(between.items[0]);
      options.until = valueToText(between.items[1]);
    }

    const search = args.get('search');
    if (isPresent(search)) options.search = valueToText(search);

    const where = args.get('where');
    if (where?.kind === 'object') options.where = new Map(where.entries);

    const source = args.get('source');
    if (isPresent(source)) options.source = valueToText(source);
  }

  if (fieldsText) {
    const fields = fieldsText
      .split(',')
      .map((field) => field.trim())
      .filter(Boolean);
    if (fields.length > 0 && fields[0] !== '*') {
      options.fields = fields;
    }
  }

  return options;
}
