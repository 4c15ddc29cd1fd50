/**
 * Shared types for gap detection.
 *
 * A run is configured once (format, relation, threshold, output mode) and
 * then streams lines through the engine. Every value parsed in a run
 * carries the same `ParsedValue` variant, so deltas and thresholds always
 * line up.
 */

// ============================================================================
// Formats and relations
// ============================================================================

/** Supported field formats. */
export const VALUE_FORMATS = ['uint', 'int', 'unix', 'unix_ms', 'rfc-3339'] as const;

export type ValueFormat = (typeof VALUE_FORMATS)[number];

/** Formats whose values are points in time. */
export type TimeFormat = Extract<ValueFormat, 'unix' | 'unix_ms' | 'rfc-3339'>;

/** Comparison applied as `delta <relation> threshold`. */
export const RELATIONS = ['gt', 'ge', 'lt', 'le'] as const;

export type Relation = (typeof RELATIONS)[number];

/** Unit suffixes accepted in time-based thresholds. */
export type TimeUnit = 'd' | 'h' | 'm' | 's';

// ============================================================================
// Values, deltas and thresholds
// ============================================================================

/**
 * A typed field value.
 *
 * Integers are kept as bigint to cover the full 64-bit ranges. Instants
 * are milliseconds since the Unix epoch, already normalized to UTC.
 */
export type ParsedValue =
  | { kind: 'uint'; value: bigint }
  | { kind: 'int'; value: bigint }
  | { kind: 'instant'; epochMs: bigint };

/** Difference between two consecutive values (current minus previous). */
export type GapDelta =
  | { kind: 'number'; value: bigint }
  | { kind: 'duration'; millis: bigint };

/** User-supplied threshold, parsed once at startup. */
export type GapThreshold =
  | { kind: 'number'; value: bigint }
  | { kind: 'duration'; amount: bigint; unit: TimeUnit; millis: bigint };

// ============================================================================
// Lines, records and events
// ============================================================================

/** One input line, terminator stripped. Line numbers start at 1. */
export interface RawLine {
  lineNumber: number;
  text: string;
}

/** A successfully parsed line, retained by the engine as "previous". */
export interface GapRecord {
  lineNumber: number;
  value: ParsedValue;
  /** Field text exactly as extracted from the line. */
  field: string;
  /** Full original line. */
  line: string;
}

/** Two consecutive records whose delta satisfied the relation. */
export interface GapEvent {
  previous: GapRecord;
  current: GapRecord;
  delta: GapDelta;
}

/** Per-line data failures. */
export type LineFailureKind = 'EmptyLine' | 'IndexOutOfRange' | 'EmptyField' | 'FormatError';

// ============================================================================
// Configuration
// ============================================================================

export type OutputMode =
  | { kind: 'diff'; delimiter: string }
  | { kind: 'filter' };

/**
 * Fully resolved scan configuration.
 *
 * `gap` stays a raw string here; it is parsed against `format` when the
 * scan is prepared.
 */
export interface ScanConfig {
  delimiter: string;
  /** 1-based field index. */
  index: number;
  format: ValueFormat;
  relation: Relation;
  gap: string;
  /** Comment marker; empty disables comment detection. */
  comment: string;
  /** Skip empty and invalid lines instead of halting. */
  allowEmpty: boolean;
  /** Accept negative time-based thresholds. */
  allowNegativeGap: boolean;
  mode: OutputMode;
  verbose: boolean;
}

/** A configuration whose threshold has been parsed. */
export interface PreparedScan {
  config: ScanConfig;
  threshold: GapThreshold;
}
