/**
 * Gap threshold parsing.
 *
 * Numeric formats take a signed integer ("4", "-10"). Time formats take a
 * signed integer followed by one unit character from [dhms] ("12h", "90s").
 * Parsing happens once, before any line is read; failures are usage
 * errors and always fatal.
 *
 * @module gap/threshold-parser
 */

import type { GapThreshold, TimeFormat, TimeUnit, ValueFormat } from '../types/gap.js';
import { GapSyntaxError } from './errors.js';
import { I64_MAX, I64_MIN, parseBoundedInteger } from './value-parser.js';

/** Milliseconds per time unit. */
export const UNIT_MILLIS: Record<TimeUnit, bigint> = {
  d: 86_400_000n,
  h: 3_600_000n,
  m: 60_000n,
  s: 1_000n,
};

const TIME_GAP_PATTERN = /^([+-]?\d+)([dhms])$/;

function isTimeUnit(value: string | undefined): value is TimeUnit {
  return value === 'd' || value === 'h' || value === 'm' || value === 's';
}

export function isTimeFormat(format: ValueFormat): format is TimeFormat {
  return format === 'unix' || format === 'unix_ms' || format === 'rfc-3339';
}

/**
 * Threshold used when none is given: one unit for numbers, one hour for times.
 */
export function defaultGapFor(format: ValueFormat): string {
  return isTimeFormat(format) ? '1h' : '1';
}

export interface ThresholdOptions {
  /** Accept negative time-based thresholds such as "-5m". */
  allowNegative?: boolean;
}

/**
 * Parse a threshold string for the given format.
 *
 * @throws {GapSyntaxError} When the string does not match the format's syntax
 */
export function parseThreshold(
  gap: string,
  format: ValueFormat,
  options: ThresholdOptions = {},
): GapThreshold {
  if (!isTimeFormat(format)) {
    const value = parseBoundedInteger(gap, I64_MIN, I64_MAX, true);
    if (value === null) {
      throw new GapSyntaxError(`invalid numeric gap '${gap}': expected a signed integer`, gap);
    }
    return { kind: 'number', value };
  }

  const match = TIME_GAP_PATTERN.exec(gap);
  if (!match) {
    throw new GapSyntaxError(
      `invalid ${format} gap '${gap}': expected a signed integer followed by one of d, h, m, s`,
      gap,
    );
  }

  const amount = parseBoundedInteger(match[1] ?? '', I64_MIN, I64_MAX, true);
  if (amount === null) {
    throw new GapSyntaxError(`invalid ${format} gap '${gap}': value out of range`, gap);
  }
  if (amount < 0n && !options.allowNegative) {
    throw new GapSyntaxError(
      `invalid ${format} gap '${gap}': negative time gaps need --allow-negative-gap`,
      gap,
    );
  }

  const unit = match[2];
  if (!isTimeUnit(unit)) {
    throw new GapSyntaxError(`invalid ${format} gap '${gap}': unknown unit`, gap);
  }
  return { kind: 'duration', amount, unit, millis: amount * UNIT_MILLIS[unit] };
}
