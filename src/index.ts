// Types
export type {
  ValueFormat,
  TimeFormat,
  Relation,
  TimeUnit,
  ParsedValue,
  GapDelta,
  GapThreshold,
  RawLine,
  GapRecord,
  GapEvent,
  LineFailureKind,
  OutputMode,
  ScanConfig,
  PreparedScan,
} from './types/gap.js';
export { VALUE_FORMATS, RELATIONS } from './types/gap.js';

// Engine
export {
  classifyLine,
  extractField,
  parseValue,
  parseRfc3339,
  cleanFieldText,
  parseThreshold,
  defaultGapFor,
  isTimeFormat,
  computeDelta,
  matchesThreshold,
  compareRecords,
  renderGapEvent,
  stepLine,
  scanLines,
  readRecord,
  INITIAL_STATE,
  run,
  prepareScan,
  EXIT_CODES,
  LineError,
  GapSyntaxError,
  ConfigError,
  abbreviate,
} from './gap/index.js';
export type {
  LineClass,
  FieldResult,
  ValueParseResult,
  EngineState,
  StepResult,
  LineSource,
  ScanOutcome,
  ScanStats,
  ExitCode,
  DiagnosticReporter,
} from './gap/index.js';

// Configuration
export { resolveScanConfig, readConfigFile, validateConfigFile } from './config/index.js';
export type { ConfigFileOptions, ScanOptionsInput } from './config/index.js';

// I/O
export { openLineSource, readLines, StreamLineSource, STDIN_PATH } from './io/line-source.js';
export { StreamSink, MemorySink } from './io/output-sink.js';
export type { OutputSink, SinkStatus } from './io/output-sink.js';

// Command line
export { scanCommand } from './cli/commands/scan.js';
export type { CommandIO } from './cli/commands/scan.js';
