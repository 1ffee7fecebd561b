/**
 * Typed values for filter arguments coming from untyped text
 * (shorthand query arguments and `--where key=value` flags).
 */
export type Value =
  | { kind: 'string'; value: string }
  | { kind: 'int'; value: number }
  | { kind: 'float'; value: number }
  | { kind: 'bool'; value: boolean }
  | { kind: 'null' }
  | { kind: 'object'; entries: Array<[string, Value]> }
  | { kind: 'array'; items: Value[] };

export type JsonValue = string | number | boolean | null | JsonValue[] | { [key: string]: JsonValue };

export const stringValue = (value: string): Value => ({ kind: 'string', value });
export const intValue = (value: number): Value => ({ kind: 'int', value });
export const floatValue = (value: number): Value => ({ kind: 'float', value });
export const boolValue = (value: boolean): Value => ({ kind: 'bool', value });
export const nullValue = (): Value => ({ kind: 'null' });
export const objectValue = (entries: Array<[string, Value]>): Value => ({ kind: 'object', entries });
export const arrayValue = (items: Value[]): Value => ({ kind: 'array', items });

export function toJson(value: Value): JsonValue {
  switch (value.kind) {
    case 'string':
    case 'int':
    case 'float':
    case 'bool':
      return value.value;
    case 'null':
      return null;
    case 'array':
      return value.items.map(toJson);
    case 'object': {
      const result: { [key: string]: JsonValue } = {};
      for (const [key, item] of value.entries) {
        result[key] = toJson(item);
      }
      return result;
    }
  }
}

export function fromJson(json: unknown): Value {
  if (json === null || json === undefined) return nullValue();
  if (typeof json === 'string') return stringValue(json);
  if (typeof json === 'boolean') return boolValue(json);
  if (typeof json === 'number') {
    return Number.isInteger(json) ? intValue(json) : floatValue(json);
  }
  if (Array.isArray(json)) return arrayValue(json.map(fromJson));
  if (typeof json === 'object') {
    return objectValue(Object.entries(json).map(([key, item]): [string, Value] => [key, fromJson(item)]));
  }
  return stringValue(String(json));
}

/** JSON without whitespace, e.g. `{"feature":"timeline","enabled":true}`. */
export function compactJson(value: Value): string {
  return JSON.stringify(toJson(value));
}

export function valueToText(value: Value): string {
  switch (value.kind) {
    case 'string':
      return value.value;
    case 'int':
    case 'float':
      return String(value.value);
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'null':
      return 'null';
    case 'object':
    case 'array':
      return compactJson(value);
  }
}

const INT_PATTERN = /^-?\d+$/;
const FLOAT_PATTERN = /^-?\d*\.\d+$/;

/**
 * Infers a typed value from `--where` text. Keywords and numbers are checked
 * before falling back to a string; brace/bracket text is tried as JSON.
 */
export function inferWhereValue(text: string): Value {
  if (text.length === 0) return stringValue('');

  const lower = text.toLowerCase();
  if (lower === 'null') return nullValue();
  if (lower === 'true') return boolValue(true);
  if (lower === 'false') return boolValue(false);

  if (INT_PATTERN.test(text)) return intValue(parseInt(text, 10));
  if (FLOAT_PATTERN.test(text)) return floatValue(parseFloat(text));

  const looksStructured =
    (text.startsWith('{') && text.endsWith('}')) || (text.startsWith('[') && text.endsWith(']'));
  if (looksStructured) {
    try {
      return fromJson(JSON.parse(text));
    } catch {
      // not JSON, keep the literal text
      return stringValue(text);
    }
  }

  return stringValue(text);
}
