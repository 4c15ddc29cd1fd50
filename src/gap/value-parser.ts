/**
 * Typed value parsing for the selected field.
 *
 * Turns field text into a `ParsedValue` according to the run's format.
 * Integers are parsed as bigint and range-checked against 64-bit bounds.
 * Timestamps (`unix`, `unix_ms`, `rfc-3339`) all end up as UTC epoch
 * milliseconds, so they share one delta representation.
 *
 * @module gap/value-parser
 */

import type { ParsedValue, ValueFormat } from '../types/gap.js';
import { abbreviate } from './errors.js';

// ============================================================================
// Constants
// ============================================================================

export const U64_MAX = (1n << 64n) - 1n;
export const I64_MIN = -(1n << 63n);
export const I64_MAX = (1n << 63n) - 1n;

/** Largest distance from the epoch a JavaScript Date can represent. */
export const MAX_EPOCH_MS = 8_640_000_000_000_000n;

const UNSIGNED_PATTERN = /^\d+$/;
const SIGNED_PATTERN = /^[+-]?\d+$/;

// yyyy-mm-dd, separator, HH:MM:SS, optional fraction, Z or +HH:MM
const RFC3339_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[Tt_ ](\d{2}):(\d{2}):(\d{2})(?:\.(\d+))?([Zz]|[+-]\d{2}:\d{2})$/;

const DAYS_PER_MONTH = [31, 28, 31, 30, 31, 30, 31, 31, 30, 31, 30, 31];

// ============================================================================
// Types
// ============================================================================

export type ValueParseResult =
  | { ok: true; value: ParsedValue }
  | { ok: false; kind: 'FormatError'; detail: string };

// ============================================================================
// Helpers
// ============================================================================

/**
 * Strip surrounding whitespace and one pair of enclosing double quotes.
 */
export function cleanFieldText(field: string): string {
  const trimmed = field.trim();
  if (trimmed.length >= 2 && trimmed.startsWith('"') && trimmed.endsWith('"')) {
    return trimmed.slice(1, -1);
  }
  return trimmed;
}

/**
 * Parse a base-10 integer within [min, max], or return null.
 */
export function parseBoundedInteger(
  text: string,
  min: bigint,
  max: bigint,
  signed: boolean,
): bigint | null {
  const pattern = signed ? SIGNED_PATTERN : UNSIGNED_PATTERN;
  if (!pattern.test(text)) return null;
  const value = BigInt(text);
  if (value < min || value > max) return null;
  return value;
}

function isLeapYear(year: number): boolean {
  return (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
}

function daysInMonth(year: number, month: number): number {
  if (month === 2 && isLeapYear(year)) return 29;
  return DAYS_PER_MONTH[month - 1] ?? 0;
}

/**
 * Parse an RFC 3339 timestamp into UTC epoch milliseconds, or null.
 *
 * Fractions beyond millisecond precision are truncated. A leap second
 * (`:60`) counts as the first second of the next minute.
 */
export function parseRfc3339(text: string): bigint | null {
  const match = RFC3339_PATTERN.exec(text);
  if (!match) return null;

  const [, y, mo, d, h, mi, s, fraction, offset] = match;
  const year = Number(y);
  const month = Number(mo);
  const day = Number(d);
  const hour = Number(h);
  const minute = Number(mi);
  const second = Number(s);

  if (month < 1 || month > 12) return null;
  if (day < 1 || day > daysInMonth(year, month)) return null;
  if (hour > 23 || minute > 59 || second > 60) return null;

  const millis = fraction ? Number(fraction.slice(0, 3).padEnd(3, '0')) : 0;

  let offsetMinutes = 0;
  if (offset && offset !== 'Z' && offset !== 'z') {
    const offsetHours = Number(offset.slice(1, 3));
    const offsetMins = Number(offset.slice(4, 6));
    if (offsetHours > 23 || offsetMins > 59) return null;
    offsetMinutes = (offsetHours * 60 + offsetMins) * (offset.startsWith('-') ? -1 : 1);
  }

  // setUTCFullYear keeps years 0-99 literal, unlike Date.UTC
  const date = new Date(0);
  date.setUTCFullYear(year, month - 1, day);
  // second 60 rolls over into the next minute
  date.setUTCHours(hour, minute, second, millis);

  return BigInt(date.getTime()) - BigInt(offsetMinutes) * 60_000n;
}

function formatError(field: string, format: ValueFormat, reason?: string): ValueParseResult {
  const suffix = reason ? ` (${reason})` : '';
  return {
    ok: false,
    kind: 'FormatError',
    detail: `field '${abbreviate(field)}' is not a valid ${format} value${suffix}`,
  };
}

function toInstant(epochMs: bigint | null, field: string, format: ValueFormat): ValueParseResult {
  if (epochMs === null) return formatError(field, format);
  if (epochMs < -MAX_EPOCH_MS || epochMs > MAX_EPOCH_MS) {
    return formatError(field, format, 'timestamp out of range');
  }
  return { ok: true, value: { kind: 'instant', epochMs } };
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Parse field text according to the run's format.
 *
 * @param field - Field text as extracted from the line
 * @param format - Active value format
 */
export function parseValue(field: string, format: ValueFormat): ValueParseResult {
  const text = cleanFieldText(field);

  switch (format) {
    case 'uint': {
      const value = parseBoundedInteger(text, 0n, U64_MAX, false);
      return value === null ? formatError(field, format) : { ok: true, value: { kind: 'uint', value } };
    }

    case 'int': {
      const value = parseBoundedInteger(text, I64_MIN, I64_MAX, true);
      return value === null ? formatError(field, format) : { ok: true, value: { kind: 'int', value } };
    }

    case 'unix': {
      const seconds = parseBoundedInteger(text, I64_MIN, I64_MAX, true);
      return toInstant(seconds === null ? null : seconds * 1000n, field, format);
    }

    case 'unix_ms':
      return toInstant(parseBoundedInteger(text, I64_MIN, I64_MAX, true), field, format);

    case 'rfc-3339':
      return toInstant(parseRfc3339(text), field, format);
  }
}
