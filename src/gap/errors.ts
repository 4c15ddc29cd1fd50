import type { LineFailureKind } from '../types/gap.js';

// ============================================================================
// Gap Detection Errors
// ============================================================================
// Startup errors (configuration, threshold syntax) are always fatal.
// LineError describes a per-line data failure; whether it halts the scan
// depends on the allow flag.

/** Longest field text quoted verbatim in a diagnostic. */
export const MAX_QUOTED_FIELD = 32;

/**
 * Shorten text for diagnostics, ending with "..." when cut.
 */
export function abbreviate(text: string, max: number = MAX_QUOTED_FIELD): string {
  if (text.length <= max) return text;
  return `${text.slice(0, max - 3)}...`;
}

/**
 * Threshold string does not match the syntax of the active format.
 */
export class GapSyntaxError extends Error {
  override name = 'GapSyntaxError' as const;
  readonly kind = 'InvalidGapSyntax' as const;

  constructor(
    message: string,
    public readonly gap: string,
  ) {
    super(message);
  }
}

/**
 * Invalid or conflicting configuration, detected before scanning.
 *
 * `field` names the option or config file path at fault, when known.
 */
export class ConfigError extends Error {
  override name = 'ConfigError' as const;

  constructor(
    message: string,
    public readonly field?: string,
  ) {
    super(message);
  }
}

/**
 * A data line that could not be turned into a record.
 *
 * `field` is the offending field text, abbreviated, when one was extracted.
 */
export class LineError extends Error {
  override name = 'LineError' as const;
  readonly field?: string;

  constructor(
    public readonly lineNumber: number,
    public readonly kind: LineFailureKind,
    public readonly detail: string,
    field?: string,
  ) {
    super(`line ${lineNumber}: ${kind}: ${detail}`);
    if (field !== undefined) this.field = abbreviate(field);
  }
}
