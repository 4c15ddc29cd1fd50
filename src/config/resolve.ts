/**
 * Resolve layered options into a `ScanConfig`.
 *
 * Layers are merged left to right (later wins, undefined never
 * overrides), validated, and then completed with the defaults that
 * depend on other fields: the gap default follows the format, and the
 * diff output delimiter follows the input delimiter.
 *
 * @module config/resolve
 */

import type { OutputMode, ScanConfig } from '../types/gap.js';
import { ConfigError } from '../gap/errors.js';
import { defaultGapFor } from '../gap/threshold-parser.js';
import { ScanOptionsSchema, type ScanOptionsInput } from './schema.js';
import { formatIssues } from './reader.js';

/** The two-character sequence `\t` stands for a TAB. */
export function unescapeDelimiter(value: string): string {
  return value === '\\t' ? '\t' : value;
}

/**
 * Merge option layers, ignoring undefined values.
 */
export function mergeOptions(...layers: ScanOptionsInput[]): Record<string, unknown> {
  const merged: Record<string, unknown> = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) merged[key] = value;
    }
  }
  return merged;
}

/**
 * Validate and complete merged options.
 *
 * @throws {ConfigError} On invalid values or an index incompatible with an empty delimiter
 */
export function resolveScanConfig(...layers: ScanOptionsInput[]): ScanConfig {
  const result = ScanOptionsSchema.safeParse(mergeOptions(...layers));
  if (!result.success) {
    const errors = formatIssues(result.error.issues);
    throw new ConfigError(`Invalid options:\n${errors.join('\n')}`, result.error.issues[0]?.path.join('.'));
  }

  const options = result.data;
  const delimiter = unescapeDelimiter(options.delimiter);

  if (delimiter === '' && options.index !== 1) {
    throw new ConfigError(
      `field index ${options.index} needs a delimiter; an empty delimiter makes the whole line field 1`,
      'index',
    );
  }

  const mode: OutputMode =
    options.mode === 'filter'
      ? { kind: 'filter' }
      : { kind: 'diff', delimiter: options.outputDelimiter ? unescapeDelimiter(options.outputDelimiter) : delimiter };

  return {
    delimiter,
    index: options.index,
    format: options.format,
    relation: options.relation,
    gap: options.gap ?? defaultGapFor(options.format),
    comment: options.comment,
    allowEmpty: options.allowEmpty,
    allowNegativeGap: options.allowNegativeGap,
    mode,
    verbose: options.verbose,
  };
}
