/**
 * Line engine: drives classification, extraction, parsing and comparison
 * across the input stream.
 *
 * The only mutable state of a scan is the last valid record. It is held
 * in an explicit `EngineState` value threaded through `stepLine`, so the
 * engine can be exercised line by line with synthetic input.
 *
 * State machine:
 * - awaiting-first: no valid record seen yet; the first one is stored
 *   without comparison.
 * - have-valid: each new record is compared against the stored one, then
 *   replaces it whether or not a gap was reported.
 *
 * Comments are always skipped. Empty and invalid lines are skipped when
 * `allowEmpty` is set (the stored record survives them); otherwise the
 * scan halts on the first one.
 *
 * @module gap/line-engine
 */

import type { GapEvent, GapRecord, PreparedScan, RawLine, ScanConfig } from '../types/gap.js';
import type { OutputSink } from '../io/output-sink.js';
import { LineError } from './errors.js';
import { classifyLine } from './line-classifier.js';
import { extractField } from './field-extractor.js';
import { parseValue } from './value-parser.js';
import { compareRecords } from './gap-comparator.js';
import { renderGapEvent } from './output-formatter.js';

// ============================================================================
// Types
// ============================================================================

export type EngineState =
  | { phase: 'awaiting-first' }
  | { phase: 'have-valid'; previous: GapRecord };

export const INITIAL_STATE: EngineState = { phase: 'awaiting-first' };

export type SkipReason = 'comment' | 'empty' | 'invalid';

export type StepResult =
  | { action: 'skip'; reason: SkipReason; state: EngineState }
  | { action: 'halt'; error: LineError }
  | { action: 'record'; state: EngineState; event: GapEvent | null };

/** Line sources may be synchronous (tests) or asynchronous (files, stdin). */
export type LineSource = Iterable<RawLine> | AsyncIterable<RawLine>;

export interface ScanStats {
  /** Lines read from the source. */
  lines: number;
  /** Lines that produced a valid record. */
  records: number;
  /** Comment, empty and invalid lines skipped. */
  skipped: number;
  /** Gap events written to the sink. */
  events: number;
}

export type ScanOutcome =
  | { status: 'completed'; stats: ScanStats }
  | { status: 'closed'; stats: ScanStats }
  | { status: 'halted'; error: LineError; stats: ScanStats };

// ============================================================================
// Single-line step
// ============================================================================

type RecordResult = { ok: true; record: GapRecord } | { ok: false; error: LineError };

/**
 * Extract and parse the configured field of a candidate line.
 */
export function readRecord(line: RawLine, config: ScanConfig): RecordResult {
  const extracted = extractField(line.text, config.delimiter, config.index);
  if (!extracted.ok) {
    const field = extracted.kind === 'EmptyField' ? '' : undefined;
    return { ok: false, error: new LineError(line.lineNumber, extracted.kind, extracted.detail, field) };
  }

  const parsed = parseValue(extracted.field, config.format);
  if (!parsed.ok) {
    return { ok: false, error: new LineError(line.lineNumber, parsed.kind, parsed.detail, extracted.field) };
  }

  return {
    ok: true,
    record: {
      lineNumber: line.lineNumber,
      value: parsed.value,
      field: extracted.field,
      line: line.text,
    },
  };
}

/**
 * Advance the engine by one line.
 */
export function stepLine(state: EngineState, line: RawLine, scan: PreparedScan): StepResult {
  const { config, threshold } = scan;

  switch (classifyLine(line.text, config.comment)) {
    case 'comment':
      return { action: 'skip', reason: 'comment', state };

    case 'empty':
      if (config.allowEmpty) return { action: 'skip', reason: 'empty', state };
      return { action: 'halt', error: new LineError(line.lineNumber, 'EmptyLine', 'line is empty') };

    case 'candidate':
      break;
  }

  const result = readRecord(line, config);
  if (!result.ok) {
    if (config.allowEmpty) return { action: 'skip', reason: 'invalid', state };
    return { action: 'halt', error: result.error };
  }

  const next: EngineState = { phase: 'have-valid', previous: result.record };
  if (state.phase === 'awaiting-first') {
    return { action: 'record', state: next, event: null };
  }

  const event = compareRecords(state.previous, result.record, config.relation, threshold);
  return { action: 'record', state: next, event };
}

// ============================================================================
// Stream scan
// ============================================================================

/**
 * Scan a line source to exhaustion, writing gap events to the sink.
 *
 * Stops early on the first fatal line error, or when the sink reports
 * that its consumer has gone away.
 */
export async function scanLines(
  scan: PreparedScan,
  source: LineSource,
  sink: OutputSink,
): Promise<ScanOutcome> {
  const stats: ScanStats = { lines: 0, records: 0, skipped: 0, events: 0 };
  let state: EngineState = INITIAL_STATE;

  for await (const line of source) {
    stats.lines++;
    const step = stepLine(state, line, scan);

    if (step.action === 'halt') {
      return { status: 'halted', error: step.error, stats };
    }

    state = step.state;
    if (step.action === 'skip') {
      stats.skipped++;
      continue;
    }

    stats.records++;
    if (step.event) {
      const status = await sink.write(renderGapEvent(step.event, scan.config.mode, stats.events));
      stats.events++;
      if (status === 'closed') return { status: 'closed', stats };
    }
  }

  return { status: 'completed', stats };
}
