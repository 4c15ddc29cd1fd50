/**
 * Config file reader with Zod validation.
 *
 * Reads a JSON file of scan options. Invalid JSON or a schema violation
 * is a `ConfigError` naming the file and the offending field path.
 *
 * @module config/reader
 */

import { readFile } from 'node:fs/promises';
import { ConfigError } from '../gap/errors.js';
import { ConfigFileSchema, type ConfigFileOptions } from './schema.js';

/**
 * Format zod issues as "path: message" lines.
 */
export function formatIssues(issues: ReadonlyArray<{ path: ReadonlyArray<PropertyKey>; message: string }>): string[] {
  return issues.map((issue) => {
    const path = issue.path.map(String).join('.') || '(root)';
    return `${path}: ${issue.message}`;
  });
}

/**
 * Validate already-parsed config file content (no I/O).
 */
export function validateConfigFile(
  raw: unknown,
): { valid: true; options: ConfigFileOptions } | { valid: false; errors: string[] } {
  const result = ConfigFileSchema.safeParse(raw);
  if (result.success) {
    return { valid: true, options: result.data };
  }
  return { valid: false, errors: formatIssues(result.error.issues) };
}

/**
 * Read and validate a config file.
 *
 * @throws {ConfigError} On a missing file, invalid JSON or validation failure
 */
export async function readConfigFile(configPath: string): Promise<ConfigFileOptions> {
  let content: string;
  try {
    content = await readFile(configPath, 'utf-8');
  } catch (err) {
    const code = (err as NodeJS.ErrnoException).code ?? 'unknown error';
    throw new ConfigError(`cannot read config file '${configPath}': ${code}`, 'config');
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ConfigError(`Invalid JSON in config file: ${configPath}`, 'config');
  }

  const validated = validateConfigFile(raw);
  if (!validated.valid) {
    throw new ConfigError(
      `Config validation failed (${configPath}):\n${validated.errors.join('\n')}`,
      validated.errors[0]?.split(':')[0],
    );
  }
  return validated.options;
}
