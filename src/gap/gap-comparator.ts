/**
 * Gap comparison between two consecutive values.
 *
 * Deltas are current minus previous, in bigint arithmetic: plain integers
 * for numeric formats, milliseconds for instants. Negative deltas are
 * ordinary data and compare with signed semantics.
 *
 * @module gap/gap-comparator
 */

import type {
  GapDelta,
  GapEvent,
  GapRecord,
  GapThreshold,
  ParsedValue,
  Relation,
} from '../types/gap.js';

/**
 * Compute `current - previous`.
 *
 * @throws {TypeError} When the two values are of different kinds
 */
export function computeDelta(previous: ParsedValue, current: ParsedValue): GapDelta {
  if (previous.kind === 'instant' && current.kind === 'instant') {
    return { kind: 'duration', millis: current.epochMs - previous.epochMs };
  }
  if (previous.kind !== 'instant' && current.kind !== 'instant' && current.kind === previous.kind) {
    return { kind: 'number', value: current.value - previous.value };
  }
  throw new TypeError(`cannot subtract ${previous.kind} from ${current.kind}`);
}

export function relationHolds(left: bigint, relation: Relation, right: bigint): boolean {
  switch (relation) {
    case 'gt':
      return left > right;
    case 'ge':
      return left >= right;
    case 'lt':
      return left < right;
    case 'le':
      return left <= right;
  }
}

function magnitude(value: GapDelta | GapThreshold): bigint {
  return value.kind === 'number' ? value.value : value.millis;
}

/**
 * Evaluate `delta <relation> threshold`.
 *
 * @throws {TypeError} When a numeric delta meets a duration threshold or vice versa
 */
export function matchesThreshold(delta: GapDelta, relation: Relation, threshold: GapThreshold): boolean {
  if (delta.kind !== threshold.kind) {
    throw new TypeError(`cannot compare a ${delta.kind} delta with a ${threshold.kind} threshold`);
  }
  return relationHolds(magnitude(delta), relation, magnitude(threshold));
}

/**
 * Compare two consecutive records, returning the gap event on a match.
 */
export function compareRecords(
  previous: GapRecord,
  current: GapRecord,
  relation: Relation,
  threshold: GapThreshold,
): GapEvent | null {
  const delta = computeDelta(previous.value, current.value);
  return matchesThreshold(delta, relation, threshold) ? { previous, current, delta } : null;
}
