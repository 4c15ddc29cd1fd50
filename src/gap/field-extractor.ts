import type { LineFailureKind } from '../types/gap.js';

export type FieldResult =
  | { ok: true; field: string }
  | { ok: false; kind: Extract<LineFailureKind, 'IndexOutOfRange' | 'EmptyField'>; detail: string };

/**
 * Split a line by a literal delimiter and select the 1-based field.
 *
 * An empty delimiter makes the whole line field 1. No quoting or
 * escaping is recognized.
 */
export function extractField(line: string, delimiter: string, index: number): FieldResult {
  const fields = delimiter === '' ? [line] : line.split(delimiter);
  const field = fields[index - 1];

  if (index < 1 || field === undefined) {
    return {
      ok: false,
      kind: 'IndexOutOfRange',
      detail: `no field at index ${index} (line has ${fields.length})`,
    };
  }

  if (field.length === 0) {
    return { ok: false, kind: 'EmptyField', detail: `empty field at index ${index}` };
  }

  return { ok: true, field };
}
