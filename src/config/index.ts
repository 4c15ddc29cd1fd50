/**
 * Configuration module: schemas, config file reader and option resolution.
 *
 * @module config
 */

export {
  ConfigFileSchema,
  ScanOptionsSchema,
  ValueFormatSchema,
  RelationSchema,
  ModeSchema,
  MAX_FIELD_INDEX,
} from './schema.js';
export type { ConfigFileOptions, ScanOptions, ScanOptionsInput } from './schema.js';

export { readConfigFile, validateConfigFile, formatIssues } from './reader.js';

export { resolveScanConfig, mergeOptions, unescapeDelimiter } from './resolve.js';
