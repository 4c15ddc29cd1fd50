import type { GapEvent, OutputMode } from '../types/gap.js';

/**
 * Render a gap event as output text, terminated by a newline.
 *
 * Diff mode prints the two original field texts joined by the output
 * delimiter. Filter mode prints both original lines unchanged; events
 * after the first are preceded by an empty separator line.
 *
 * @param ordinal - 0-based position of the event within the run
 */
export function renderGapEvent(event: GapEvent, mode: OutputMode, ordinal: number): string {
  if (mode.kind === 'diff') {
    return `${event.previous.field}${mode.delimiter}${event.current.field}\n`;
  }
  const separator = ordinal > 0 ? '\n' : '';
  return `${separator}${event.previous.line}\n${event.current.line}\n`;
}
