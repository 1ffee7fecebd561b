import type { WhereFilters } from '../types.js';
import { inferWhereValue } from './values.js';

type RepeatableOption = string | string[] | undefined;

const asList = (input: RepeatableOption): string[] => (input === undefined ? [] : Array.isArray(input) ? input : [input]);

/** Comma-separated, possibly repeated, list option: trimmed, blanks dropped, first occurrence kept. */
export function splitListOption(input: RepeatableOption): string[] | undefined {
  const names: string[] = [];
  for (const value of asList(input)) {
    for (const name of value.split(',')) {
      const trimmed = name.trim();
      if (trimmed) names.push(trimmed);
    }
  }
  return names.length > 0 ? [...new Set(names)] : undefined;
}

export const normalizeSourcesOption = splitListOption;
export const normalizeFieldsOption = splitListOption;

function stripMatchingQuotes(text: string): string {
  if (text.length < 2) return text;
  const first = text[0];
  const last = text[text.length - 1];
  if ((first === '"' && last === '"') || (first === "'" && last === "'")) {
    return text.slice(1, -1);
  }
  return text;
}

/**
 * Parses repeated `--where field=value` options. The split happens at the
 * first `=`; entries without a key are ignored. Later entries for the same
 * field replace earlier ones.
 */
export function parseWhereOption(input: RepeatableOption): WhereFilters | undefined {
  const where: WhereFilters = new Map();

  for (const raw of asList(input)) {
    const trimmed = raw.trim();
    const equalsIndex = trimmed.indexOf('=');
    if (equalsIndex <= 0) continue;

    const key = trimmed.slice(0, equalsIndex).trim();
    if (!key) continue;

    const valueText = stripMatchingQuotes(trimmed.slice(equalsIndex + 1).trim());
    where.set(key, inferWhereValue(valueText));
  }

  return where.size > 0 ? where : undefined;
}

export function parseLimitOption(raw: unknown): number | undefined {
  if (typeof raw === 'number') return Number.isNaN(raw) ? undefined : Math.trunc(raw);
  if (typeof raw === 'string' && /^\s*[-+]?\d+\s*$/.test(raw)) return parseInt(raw, 10);
  return undefined;
}

/** A positive integer, else `fallback`. */
export function positiveIntOr(raw: unknown, fallback: number): number {
  const parsed = parseLimitOption(raw);
  return parsed !== undefined && parsed > 0 ? parsed : fallback;
}
