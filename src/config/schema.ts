/**
 * Zod schemas for gap-detect configuration.
 *
 * `ConfigFileSchema` validates the optional JSON config file: every key is
 * optional and unknown keys are rejected. `ScanOptionsSchema` validates
 * the merged options before they are resolved into a `ScanConfig`.
 *
 * @module config/schema
 */

import { z } from 'zod';
import { RELATIONS, VALUE_FORMATS } from '../types/gap.js';

export const ValueFormatSchema = z.enum(VALUE_FORMATS);

export const RelationSchema = z.enum(RELATIONS);

export const ModeSchema = z.enum(['diff', 'filter']);

/** Largest accepted field index. */
export const MAX_FIELD_INDEX = 65_535;

const IndexSchema = z.number().int().min(1).max(MAX_FIELD_INDEX);

/**
 * Shape of the JSON config file.
 */
export const ConfigFileSchema = z
  .object({
    delimiter: z.string().optional(),
    index: IndexSchema.optional(),
    format: ValueFormatSchema.optional(),
    relation: RelationSchema.optional(),
    gap: z.string().min(1).optional(),
    comment: z.string().optional(),
    allowEmpty: z.boolean().optional(),
    allowNegativeGap: z.boolean().optional(),
    mode: ModeSchema.optional(),
    outputDelimiter: z.string().optional(),
    verbose: z.boolean().optional(),
  })
  .strict();

export type ConfigFileOptions = z.infer<typeof ConfigFileSchema>;

/**
 * Merged options with defaults applied. `gap` and `outputDelimiter` stay
 * optional; their defaults depend on other fields.
 */
export const ScanOptionsSchema = z.object({
  delimiter: z.string().default(','),
  index: IndexSchema.default(1),
  format: ValueFormatSchema.default('uint'),
  relation: RelationSchema.default('gt'),
  gap: z.string().min(1).optional(),
  comment: z.string().default('#'),
  allowEmpty: z.boolean().default(false),
  allowNegativeGap: z.boolean().default(false),
  mode: ModeSchema.default('diff'),
  outputDelimiter: z.string().optional(),
  verbose: z.boolean().default(false),
});

export type ScanOptions = z.infer<typeof ScanOptionsSchema>;

/** Options as given by a config file or the command line. */
export type ScanOptionsInput = z.input<typeof ScanOptionsSchema>;
