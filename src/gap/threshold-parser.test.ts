import { describe, it, expect } from 'vitest';
import { parseThreshold, defaultGapFor, isTimeFormat, UNIT_MILLIS } from './threshold-parser.js';
import { GapSyntaxError } from './errors.js';

describe('defaultGapFor', () => {
  it('uses 1 for numeric formats and 1h for time formats', () => {
    expect(defaultGapFor('uint')).toBe('1');
    expect(defaultGapFor('int')).toBe('1');
    expect(defaultGapFor('unix')).toBe('1h');
    expect(defaultGapFor('unix_ms')).toBe('1h');
    expect(defaultGapFor('rfc-3339')).toBe('1h');
  });
});

describe('isTimeFormat', () => {
  it('distinguishes time formats', () => {
    expect(isTimeFormat('rfc-3339')).toBe(true);
    expect(isTimeFormat('int')).toBe(false);
  });
});

describe('parseThreshold', () => {
  describe('numeric formats', () => {
    it('parses signed integers', () => {
      expect(parseThreshold('4', 'uint')).toEqual({ kind: 'number', value: 4n });
      expect(parseThreshold('-10', 'int')).toEqual({ kind: 'number', value: -10n });
    });

    it('rejects unit suffixes and garbage', () => {
      expect(() => parseThreshold('4h', 'uint')).toThrow(GapSyntaxError);
      expect(() => parseThreshold('', 'int')).toThrow("invalid numeric gap '': expected a signed integer");
    });
  });

  describe('time formats', () => {
    it('converts each unit to milliseconds', () => {
      expect(parseThreshold('12h', 'rfc-3339')).toEqual({
        kind: 'duration',
        amount: 12n,
        unit: 'h',
        millis: 43_200_000n,
      });
      expect(parseThreshold('2d', 'unix')).toMatchObject({ millis: 2n * UNIT_MILLIS.d });
      expect(parseThreshold('15m', 'unix_ms')).toMatchObject({ millis: 900_000n });
      expect(parseThreshold('90s', 'unix')).toMatchObject({ millis: 90_000n });
    });

    it('requires exactly one unit character', () => {
      expect(() => parseThreshold('12', 'rfc-3339')).toThrow(
        "invalid rfc-3339 gap '12': expected a signed integer followed by one of d, h, m, s",
      );
      expect(() => parseThreshold('12hh', 'unix')).toThrow(GapSyntaxError);
      expect(() => parseThreshold('h', 'unix')).toThrow(GapSyntaxError);
      expect(() => parseThreshold('1w', 'unix')).toThrow(GapSyntaxError);
      expect(() => parseThreshold('1.5h', 'unix')).toThrow(GapSyntaxError);
    });

    it('rejects negative time gaps unless allowed', () => {
      expect(() => parseThreshold('-5m', 'unix')).toThrow(
        "invalid unix gap '-5m': negative time gaps need --allow-negative-gap",
      );
      expect(parseThreshold('-5m', 'unix', { allowNegative: true })).toEqual({
        kind: 'duration',
        amount: -5n,
        unit: 'm',
        millis: -300_000n,
      });
    });

    it('carries the InvalidGapSyntax kind', () => {
      try {
        parseThreshold('soon', 'unix');
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(GapSyntaxError);
        expect((err as GapSyntaxError).kind).toBe('InvalidGapSyntax');
        expect((err as GapSyntaxError).gap).toBe('soon');
      }
    });
  });
});
