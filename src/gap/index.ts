/**
 * Gap detection engine.
 *
 * @module gap
 */

export { classifyLine } from './line-classifier.js';
export type { LineClass } from './line-classifier.js';
export { extractField } from './field-extractor.js';
export type { FieldResult } from './field-extractor.js';
export { parseValue, parseRfc3339, cleanFieldText } from './value-parser.js';
export type { ValueParseResult } from './value-parser.js';
export { parseThreshold, defaultGapFor, isTimeFormat } from './threshold-parser.js';
export { computeDelta, matchesThreshold, compareRecords } from './gap-comparator.js';
export { renderGapEvent } from './output-formatter.js';
export { stepLine, scanLines, readRecord, INITIAL_STATE } from './line-engine.js';
export type { EngineState, StepResult, LineSource, ScanOutcome, ScanStats } from './line-engine.js';
export { run, prepareScan, EXIT_CODES } from './run.js';
export type { ExitCode, DiagnosticReporter } from './run.js';
export { LineError, GapSyntaxError, ConfigError, abbreviate } from './errors.js';
