/**
 * Scan command: the whole gap-detect command line.
 *
 * Parses flags, layers an optional config file under them, opens the
 * input, and hands off to the engine. Returns the exit code rather than
 * exiting, so tests can drive it with in-memory streams.
 *
 * Usage:
 *   gap-detect [options] FILE
 */

import { createRequire } from 'node:module';
import type { Readable, Writable } from 'node:stream';
import * as p from '@clack/prompts';
import type { ScanConfig } from '../../types/gap.js';
import { ConfigError, EXIT_CODES, GapSyntaxError, prepareScan, run } from '../../gap/index.js';
import { readConfigFile, resolveScanConfig, type ConfigFileOptions } from '../../config/index.js';
import { openLineSource, type StreamLineSource } from '../../io/line-source.js';
import { StreamSink } from '../../io/output-sink.js';
import { parseArgs, type ParsedArgs } from '../args.js';
import { formatHelp } from '../help.js';
import { createLogger } from '../logger.js';

export interface CommandIO {
  stdin: Readable;
  stdout: Writable;
  stderr: Writable;
  /** Force diagnostic colors on or off. */
  colors?: boolean;
}

function defaultIO(): CommandIO {
  return { stdin: process.stdin, stdout: process.stdout, stderr: process.stderr };
}

function readVersion(): string {
  const require = createRequire(import.meta.url);
  const pkg = require('../../../package.json') as { version: string };
  return pkg.version;
}

/**
 * Render the resolved configuration shown by --verbose.
 */
export function describeConfig(config: ScanConfig, file: string): string {
  const mode =
    config.mode.kind === 'diff' ? `diff (output delimiter ${JSON.stringify(config.mode.delimiter)})` : 'filter';
  return [
    `input       ${file === '-' ? 'standard input' : file}`,
    `delimiter   ${config.delimiter === '' ? '(none, whole line)' : JSON.stringify(config.delimiter)}`,
    `index       ${config.index}`,
    `format      ${config.format}`,
    `comparison  ${config.relation} ${config.gap}`,
    `comment     ${config.comment === '' ? '(disabled)' : JSON.stringify(config.comment)}`,
    `allow empty ${config.allowEmpty ? 'yes' : 'no'}`,
    `mode        ${mode}`,
  ].join('\n');
}

/**
 * Scan command entry point.
 *
 * @param argv - Command-line arguments (without node and script path)
 * @param io - Streams to use (default: the process streams)
 * @returns Exit code (see EXIT_CODES)
 */
export async function scanCommand(argv: string[], io: CommandIO = defaultIO()): Promise<number> {
  const logger = createLogger({ stream: io.stderr, colors: io.colors });

  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(argv);
  } catch (err) {
    if (err instanceof ConfigError) {
      logger.error(`${err.message}\nRun gap-detect --help for usage.`);
      return EXIT_CODES.usageError;
    }
    throw err;
  }

  if (parsed.command === 'help') {
    io.stdout.write(formatHelp());
    return EXIT_CODES.success;
  }
  if (parsed.command === 'version') {
    io.stdout.write(`gap-detect ${readVersion()}\n`);
    return EXIT_CODES.success;
  }

  let config: ScanConfig;
  let source: StreamLineSource;
  try {
    const fileOptions: ConfigFileOptions = parsed.configPath ? await readConfigFile(parsed.configPath) : {};
    config = resolveScanConfig(fileOptions, parsed.options);

    if (config.mode.kind === 'filter' && (fileOptions.outputDelimiter ?? parsed.options.outputDelimiter) !== undefined) {
      logger.warn('output delimiter is ignored in filter mode');
    }
    if (config.verbose) {
      p.note(describeConfig(config, parsed.file), 'gap-detect');
    }

    // Threshold errors are reported before the input is opened
    prepareScan(config);
    source = await openLineSource(parsed.file, io.stdin);
  } catch (err) {
    if (err instanceof ConfigError || err instanceof GapSyntaxError) {
      logger.error(err.message);
      return EXIT_CODES.usageError;
    }
    throw err;
  }

  try {
    return await run(config, source, new StreamSink(io.stdout), logger);
  } finally {
    source.close();
  }
}
