/**
 * Line classification: comment, empty, or candidate data.
 *
 * The comment marker is matched as an exact prefix of the line; leading
 * whitespace is not skipped. An empty marker disables comment detection.
 */
export type LineClass = 'comment' | 'empty' | 'candidate';

export function classifyLine(text: string, commentMarker: string): LineClass {
  if (commentMarker !== '' && text.startsWith(commentMarker)) return 'comment';
  if (text.length === 0) return 'empty';
  return 'candidate';
}
