/**
 * Scan entry point used by the CLI.
 *
 * `run` parses the threshold, scans the source into the sink, and maps
 * the outcome to an exit code. Diagnostics go to the supplied reporter,
 * one line per failure.
 *
 * @module gap/run
 */

import type { PreparedScan, ScanConfig } from '../types/gap.js';
import type { OutputSink } from '../io/output-sink.js';
import { GapSyntaxError } from './errors.js';
import { parseThreshold } from './threshold-parser.js';
import { scanLines, type LineSource } from './line-engine.js';

/** Process exit codes. */
export const EXIT_CODES = {
  success: 0,
  /** A data line halted the scan. */
  dataError: 1,
  /** Bad flags, configuration or threshold; unreadable input path. */
  usageError: 2,
  /** Read or write failure other than a closed consumer. */
  ioError: 3,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

/** Where diagnostics are reported. */
export interface DiagnosticReporter {
  error(message: string): void;
}

/**
 * Parse the configured threshold against the configured format.
 *
 * @throws {GapSyntaxError} When the threshold is malformed
 */
export function prepareScan(config: ScanConfig): PreparedScan {
  const threshold = parseThreshold(config.gap, config.format, {
    allowNegative: config.allowNegativeGap,
  });
  return { config, threshold };
}

export async function run(
  config: ScanConfig,
  source: LineSource,
  sink: OutputSink,
  reporter: DiagnosticReporter,
): Promise<ExitCode> {
  let scan: PreparedScan;
  try {
    scan = prepareScan(config);
  } catch (err) {
    if (err instanceof GapSyntaxError) {
      reporter.error(err.message);
      return EXIT_CODES.usageError;
    }
    throw err;
  }

  try {
    const outcome = await scanLines(scan, source, sink);
    if (outcome.status === 'halted') {
      reporter.error(outcome.error.message);
      return EXIT_CODES.dataError;
    }
    return EXIT_CODES.success;
  } catch (err) {
    if (err instanceof TypeError) throw err;
    const message = err instanceof Error ? err.message : String(err);
    reporter.error(`I/O error: ${message}`);
    return EXIT_CODES.ioError;
  }
}
