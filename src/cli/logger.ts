/**
 * Diagnostic logger for the command line.
 *
 * Writes one prefixed line per message to standard error, so standard
 * output carries nothing but scan results.
 *
 * @module cli/logger
 */

import pc from 'picocolors';
import type { Writable } from 'node:stream';

export interface Logger {
  error(message: string): void;
  warn(message: string): void;
}

export interface LoggerOptions {
  /** Destination stream (default: process.stderr). */
  stream?: Writable;
  /** Force colors on or off (default: terminal detection). */
  colors?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const stream = options.stream ?? process.stderr;
  const c = pc.createColors(options.colors ?? pc.isColorSupported);

  const emit = (prefix: string, message: string) => {
    stream.write(`${prefix} ${message}\n`);
  };

  return {
    error: (message) => emit(c.bold(c.red('error:')), message),
    warn: (message) => emit(c.yellow('warning:'), message),
  };
}

/**
 * Report an error that escaped a command. Goes to standard error like
 * every other diagnostic.
 */
export function reportFatal(err: unknown, logger: Logger = createLogger()): void {
  logger.error(err instanceof Error ? err.message : String(err));
}
