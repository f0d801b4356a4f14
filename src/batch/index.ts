/**
 * Batch Module
 *
 * Plans, previews, applies and undoes batches of file moves for the filetidy CLI.
 */

export type {
  SourceFile,
  KeyResult,
  KeyProvider,
  TargetRule,
  OperationStatus,
  PlannedOperation,
  Plan,
  FileOps,
  EngineConfig,
  ApplyStatus,
  ApplyOutcome,
  OutcomeCallback,
  LogStatus,
  LogSchema,
  LogRecord,
  InvalidLogRow,
  ParsedLog,
  UndoStatus,
  UndoOutcome,
  UndoReport,
} from './types.js';

export * from './errors.js';
export {
  LOG_HEADERS,
  CsvLogWriter,
  createLogPath,
  writeLog,
  readLog,
  parseCsv,
  formatCsvRow,
  toLogRecord,
} from './csv-log.js';
export { splitBaseExt, extensionToken, isWithin, nodeFileOps } from './paths.js';
export { compactDateTime, logStamp } from './time.js';

// Operations
export * from './operations/index.js';
