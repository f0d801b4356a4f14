// ============================================================================
// Source Files & Naming Keys
// ============================================================================

/** A file picked up by the directory scan */
export interface SourceFile {
  /** Absolute path of the file */
  path: string;
  /** Base name including extension */
  name: string;
  /** Lowercased extension without the dot ('' when none, 'tar.gz' for compound archives) */
  extension: string;
  /** Name of the directory that contains the file */
  folderName: string;
  /** Containing directory relative to the scan root ('' at the root) */
  relativeDir: string;
}

/** Result of asking a key provider for a file's naming key */
export type KeyResult =
  | { ok: true; key: string; source?: string; timestampMs?: number }
  | { ok: false; error: string };

/** Maps a file to its naming key (timestamp string or category label) */
export type KeyProvider = (file: SourceFile) => KeyResult;

/** Builds the proposed (not yet collision-resolved) target path of a file */
export type TargetRule = (file: SourceFile, key: string) => string;

// ============================================================================
// Plans
// ============================================================================

export type OperationStatus = 'planned' | 'applied' | 'failed' | 'skipped';

/** One source file's move or rename */
export interface PlannedOperation {
  source: string;
  /** Final, collision-resolved target ('' when the key could not be resolved) */
  target: string;
  key: string;
  /** Which metadata resolver or table produced the key */
  keySource?: string;
  /** Epoch milliseconds behind a timestamp key */
  timestampMs?: number;
  status: OperationStatus;
  error?: string;
}

export interface Plan {
  /** Scan root the plan was built against */
  root: string;
  operations: PlannedOperation[];
  /** Files whose computed target equals their current path */
  unchanged: SourceFile[];
}

// ============================================================================
// Execution
// ============================================================================

/** Filesystem calls the executors make, swappable in tests */
export interface FileOps {
  exists(filePath: string): boolean;
  rename(from: string, to: string): void;
  mkdir(dirPath: string): void;
}

/** Immutable settings threaded through planning, applying and undoing */
export interface EngineConfig {
  /** Absolute directory the run operates on */
  root: string;
  /** false previews without touching the filesystem */
  apply: boolean;
  fileOps: FileOps;
  /** Largest numeric suffix tried before giving up on a name */
  maxSuffix: number;
  /** Treat a file's own path as free when it is renamed in place */
  renameInPlace: boolean;
  now: () => Date;
}

export type ApplyStatus = 'applied' | 'failed' | 'skipped';

export interface ApplyOutcome {
  operation: PlannedOperation;
  status: ApplyStatus;
  /** Where the file actually went (may differ from the plan after re-resolution) */
  target: string;
  error?: string;
}

export type OutcomeCallback = (outcome: ApplyOutcome) => void;

// ============================================================================
// Logs & Undo
// ============================================================================

export type LogStatus = 'ok' | 'failed' | 'skipped';

/** Log column layouts; rename logs also carry the timestamp and its source */
export type LogSchema = 'rename' | 'organize';

export interface LogRecord {
  oldPath: string;
  newPath: string;
  status: LogStatus;
  error: string;
  timestampMs?: number;
  source?: string;
}

export interface InvalidLogRow {
  /** 1-based line number in the log file */
  line: number;
  message: string;
}

export interface ParsedLog {
  schema: LogSchema;
  records: LogRecord[];
  invalid: InvalidLogRow[];
}

export type UndoStatus = 'restored' | 'missing' | 'failed' | 'skipped';

export interface UndoOutcome {
  record: LogRecord;
  status: UndoStatus;
  message?: string;
}

export interface UndoReport {
  logPath: string;
  applied: boolean;
  outcomes: UndoOutcome[];
  invalid: InvalidLogRow[];
  /** Log of the undo itself, written only when applied */
  undoLogPath?: string;
}
