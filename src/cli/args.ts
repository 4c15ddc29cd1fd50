/**
 * Command-line argument parsing for gap-detect.
 *
 * Long options take their value as `--name=value` or `--name value`,
 * short options as `-x value`. A lone `-` is the standard-input file
 * argument, and `--` ends option parsing. Values are taken verbatim, so
 * `-d -` and `--lt -5` work as expected.
 *
 * The diff delimiter is optional: `--diff=;`, `-D;` and `-D=;` always set
 * it, and `-D ; FILE` does when another positional argument follows.
 *
 * @module cli/args
 */

import type { Relation } from '../types/gap.js';
import { ConfigError } from '../gap/errors.js';
import { ValueFormatSchema, type ScanOptionsInput } from '../config/schema.js';

export type ParsedArgs =
  | { command: 'help' }
  | { command: 'version' }
  | { command: 'scan'; file: string; configPath?: string; options: ScanOptionsInput };

type StringOption = 'delimiter' | 'comment';
type BooleanOption = 'allowEmpty' | 'allowNegativeGap' | 'verbose';

const STRING_FLAGS: Record<string, StringOption> = {
  '-d': 'delimiter',
  '--delimiter': 'delimiter',
  '-c': 'comment',
  '--comment': 'comment',
};

const BOOLEAN_FLAGS: Record<string, BooleanOption> = {
  '-a': 'allowEmpty',
  '--allow-empty': 'allowEmpty',
  '--allow-negative-gap': 'allowNegativeGap',
  '-v': 'verbose',
  '--verbose': 'verbose',
};

const RELATION_FLAGS: Record<string, Relation> = {
  '--gt': 'gt',
  '--ge': 'ge',
  '--lt': 'lt',
  '--le': 'le',
};

/**
 * Parse argv (without the node and script entries).
 *
 * @throws {ConfigError} On unknown options, missing values, conflicts or a missing FILE
 */
export function parseArgs(argv: string[]): ParsedArgs {
  const options: ScanOptionsInput = {};
  const positionals: string[] = [];
  let configPath: string | undefined;
  let relationFlag: string | undefined;
  let diffFlag: string | undefined;
  let filterFlag: string | undefined;
  // Position among positionals of the argument right after a bare -D
  let diffValueAt: number | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i] ?? '';

    if (arg === '--') {
      positionals.push(...argv.slice(i + 1));
      break;
    }
    if (arg === '-h' || arg === '--help') return { command: 'help' };
    if (arg === '-V' || arg === '--version') return { command: 'version' };
    if (arg === '-' || !arg.startsWith('-')) {
      positionals.push(arg);
      continue;
    }

    let name: string;
    let inline: string | undefined;
    if (arg.startsWith('--')) {
      const eq = arg.indexOf('=');
      name = eq === -1 ? arg : arg.slice(0, eq);
      inline = eq === -1 ? undefined : arg.slice(eq + 1);
    } else if (arg.startsWith('-D') && arg.length > 2) {
      name = '-D';
      inline = arg.slice(arg[2] === '=' ? 3 : 2);
    } else {
      name = arg;
      inline = undefined;
    }

    const takeValue = (): string => {
      if (inline !== undefined) return inline;
      const next = argv[i + 1];
      if (next === undefined) {
        throw new ConfigError(`option ${name} needs a value`, name);
      }
      i++;
      return next;
    };

    const stringKey = STRING_FLAGS[name];
    const booleanKey = BOOLEAN_FLAGS[name];
    const relation = RELATION_FLAGS[name];

    if (stringKey) {
      options[stringKey] = takeValue();
    } else if (booleanKey) {
      if (inline !== undefined) throw new ConfigError(`option ${name} takes no value`, name);
      options[booleanKey] = true;
    } else if (relation) {
      if (relationFlag !== undefined && relationFlag !== name) {
        throw new ConfigError(`${name} conflicts with ${relationFlag}: give only one of --gt, --ge, --lt, --le`, name);
      }
      relationFlag = name;
      options.relation = relation;
      options.gap = takeValue();
    } else if (name === '-i' || name === '--index') {
      const value = takeValue();
      if (!/^\d+$/.test(value)) {
        throw new ConfigError(`invalid field index '${value}': expected a positive integer`, 'index');
      }
      options.index = Number(value);
    } else if (name === '-f' || name === '--format') {
      const value = takeValue();
      const format = ValueFormatSchema.safeParse(value);
      if (!format.success) {
        throw new ConfigError(
          `invalid format '${value}': expected one of ${ValueFormatSchema.options.join(', ')}`,
          'format',
        );
      }
      options.format = format.data;
    } else if (name === '-D' || name === '--diff') {
      diffFlag = name;
      options.mode = 'diff';
      if (inline !== undefined) {
        options.outputDelimiter = inline;
      } else {
        const next = argv[i + 1];
        if (next !== undefined && (next === '-' || !next.startsWith('-'))) diffValueAt = positionals.length;
      }
    } else if (name === '-F' || name === '--filter') {
      if (inline !== undefined) throw new ConfigError(`option ${name} takes no value`, name);
      filterFlag = name;
      options.mode = 'filter';
    } else if (name === '--config') {
      configPath = takeValue();
    } else {
      throw new ConfigError(`unknown option '${arg}'`, arg);
    }
  }

  if (diffFlag && filterFlag) {
    throw new ConfigError(`${filterFlag} conflicts with ${diffFlag}`, 'mode');
  }

  if (diffValueAt !== undefined && positionals.length > 1) {
    options.outputDelimiter = positionals.splice(diffValueAt, 1)[0];
  }

  if (positionals.length === 0) {
    throw new ConfigError('missing input FILE (use - for standard input)', 'FILE');
  }
  if (positionals.length > 1) {
    throw new ConfigError(`unexpected argument '${positionals[1]}': only one FILE is accepted`, 'FILE');
  }

  return { command: 'scan', file: positionals[0] ?? '-', configPath, options };
}
