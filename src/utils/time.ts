import { InvalidQueryFormat } from '../errors.js';

const RELATIVE_PATTERN = /^(\d+)([hdmw])$/;
const BAD_UNIT_PATTERN = /^\d+([a-zA-Z])$/;
const ABSOLUTE_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?(Z|[+-]\d{2}:?\d{2})?$/;

const UNIT_MS: Record<string, number> = {
  m: 60 * 1000,
  h: 60 * 60 * 1000,
  d: 24 * 60 * 60 * 1000,
  w: 7 * 24 * 60 * 60 * 1000
};

/**
 * Parses a relative offset (`30m`, `1h`, `2d`, `1w`) measured back from `now`,
 * or an absolute date/date-time. Values without a zone are read as UTC.
 */
export function parseTimeString(input: string, now: Date = new Date()): Date {
  const text = input.trim();

  const relative = RELATIVE_PATTERN.exec(text);
  if (relative) {
    const amount = parseInt(relative[1], 10);
    return new Date(now.getTime() - amount * UNIT_MS[relative[2]]);
  }

  const badUnit = BAD_UNIT_PATTERN.exec(text);
  if (badUnit) {
    throw new InvalidQueryFormat(`Unknown time unit: ${badUnit[1]}`);
  }

  const absolute = ABSOLUTE_PATTERN.exec(text);
  if (!absolute) {
    throw new InvalidQueryFormat(`Invalid time format: ${input}`);
  }

  const [, year, month, day, hour = '0', minute = '0', second = '0', fraction = '', zone] = absolute;
  const millis = fraction ? parseInt(fraction.padEnd(3, '0').slice(0, 3), 10) : 0;
  const fields = [year, month, day, hour, minute, second].map((part) => parseInt(part, 10));
  const utc = Date.UTC(fields[0], fields[1] - 1, fields[2], fields[3], fields[4], fields[5], millis);
  const check = new Date(utc);

  if (
    check.getUTCFullYear() !== fields[0] ||
    check.getUTCMonth() !== fields[1] - 1 ||
    check.getUTCDate() !== fields[2] ||
    check.getUTCHours() !== fields[3] ||
    check.getUTCMinutes() !== fields[4] ||
    check.getUTCSeconds() !== fields[5]
  ) {
    throw new InvalidQueryFormat(`Invalid time format: ${input}`);
  }

  return new Date(utc - zoneOffsetMs(zone));
}

function zoneOffsetMs(zone: string | undefined): number {
  if (!zone || zone === 'Z') return 0;
  const sign = zone.startsWith('-') ? -1 : 1;
  const digits = zone.slice(1).replace(':', '');
  const hours = parseInt(digits.slice(0, 2), 10);
  const minutes = parseInt(digits.slice(2, 4), 10);
  return sign * (hours * 60 + minutes) * 60 * 1000;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/** `YYYY-MM-DD HH:MM:SS` in UTC, the literal form `toDateTime64` accepts. */
export function toClickHouseDateTime(date: Date): string {
  return (
    `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())} ` +
    `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`
  );
}
