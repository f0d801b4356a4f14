/**
 * CSV run logs - the durable record every undo is replayed from
 *
 * One file per run, header first, one row appended and flushed per processed
 * item in execution order. Fields are quoted per RFC 4180 when needed.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { describeError, LogParseError, LogUnreadableError } from './errors.js';
import { CollisionRegistry, resolveCollision } from './operations/collision.js';
import { logStamp } from './time.js';
import type {
  ApplyOutcome,
  ApplyStatus,
  InvalidLogRow,
  LogRecord,
  LogSchema,
  LogStatus,
  ParsedLog,
} from './types.js';

export const LOG_HEADERS: Record<LogSchema, readonly string[]> = {
  rename: ['old_path', 'new_path', 'timestamp_ms', 'source', 'status', 'error'],
  organize: ['old_path', 'new_path', 'status', 'error'],
};

const STATUS_BY_OUTCOME: Record<ApplyStatus, LogStatus> = {
  applied: 'ok',
  failed: 'failed',
  skipped: 'skipped',
};

const LOG_STATUSES: readonly string[] = ['ok', 'failed', 'skipped'];

function isLogStatus(value: string): value is LogStatus {
  return LOG_STATUSES.includes(value);
}

// ============================================================================
// CSV encoding
// ============================================================================

export function escapeCsvField(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

export function formatCsvRow(fields: readonly string[]): string {
  return fields.map(escapeCsvField).join(',') + '\n';
}

export interface CsvRow {
  /** 1-based line the row starts on */
  line: number;
  fields: string[];
}

/**
 * Split CSV text into rows. Quoted fields may contain commas, quotes and
 * newlines. Blank lines are dropped.
 */
export function parseCsv(content: string): CsvRow[] {
  const text = content.startsWith('\uFEFF') ? content.slice(1) : content;
  const rows: CsvRow[] = [];

  let fields: string[] = [];
  let field = '';
  let inQuotes = false;
  let line = 1;
  let rowStart = 1;

  const endRow = () => {
    fields.push(field);
    if (!(fields.length === 1 && fields[0] === '')) {
      rows.push({ line: rowStart, fields });
    }
    fields = [];
    field = '';
  };

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];

    if (inQuotes) {
      if (ch === '"') {
        if (text[i + 1] === '"') {
          field += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        if (ch === '\n') line++;
        field += ch;
      }
      continue;
    }

    if (ch === '"') {
      inQuotes = true;
    } else if (ch === ',') {
      fields.push(field);
      field = '';
    } else if (ch === '\r' && text[i + 1] === '\n') {
      // handled by the '\n' on the next iteration
    } else if (ch === '\n') {
      endRow();
      line++;
      rowStart = line;
    } else {
      field += ch;
    }
  }

  if (field !== '' || fields.length > 0) {
    endRow();
  }

  return rows;
}

// ============================================================================
// Records
// ============================================================================

export function toLogRecord(outcome: ApplyOutcome): LogRecord {
  const { operation } = outcome;
  return {
    oldPath: operation.source,
    newPath: outcome.target,
    status: STATUS_BY_OUTCOME[outcome.status],
    error: outcome.error ?? '',
    timestampMs: operation.timestampMs,
    source: operation.keySource,
  };
}

function recordFields(schema: LogSchema, record: LogRecord): string[] {
  if (schema === 'rename') {
    return [
      record.oldPath,
      record.newPath,
      record.timestampMs === undefined ? '' : String(record.timestampMs),
      record.source ?? '',
      record.status,
      record.error,
    ];
  }
  return [record.oldPath, record.newPath, record.status, record.error];
}

/**
 * Fresh log path `<dir>/<prefix>-YYYYMMDD-HHMMSS-mmm.csv`; an existing file of
 * that name gets a numeric suffix instead of being reused.
 */
export function createLogPath(dir: string, prefix: string, now: Date): string {
  const candidate = path.join(dir, `${prefix}-${logStamp(now)}.csv`);
  return resolveCollision(candidate, new CollisionRegistry(), (p) => fs.existsSync(p));
}

/**
 * Append-only writer for one run's log
 */
export class CsvLogWriter {
  private rows = 0;

  private constructor(
    readonly filePath: string,
    readonly schema: LogSchema
  ) {}

  /** Create the file with its header; refuses to reuse an existing file */
  static open(filePath: string, schema: LogSchema): CsvLogWriter {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, formatCsvRow(LOG_HEADERS[schema]), { encoding: 'utf-8', flag: 'wx' });
    return new CsvLogWriter(filePath, schema);
  }

  write(record: LogRecord): void {
    fs.appendFileSync(this.filePath, formatCsvRow(recordFields(this.schema, record)), 'utf-8');
    this.rows++;
  }

  writeOutcome(outcome: ApplyOutcome): void {
    this.write(toLogRecord(outcome));
  }

  get rowCount(): number {
    return this.rows;
  }
}

/** Write a complete log for already-finished outcomes */
export function writeLog(outcomes: readonly ApplyOutcome[], destination: string, schema: LogSchema): CsvLogWriter {
  const writer = CsvLogWriter.open(destination, schema);
  for (const outcome of outcomes) {
    writer.writeOutcome(outcome);
  }
  return writer;
}

// ============================================================================
// Reading
// ============================================================================

function parseRecord(row: CsvRow, columns: Map<string, number>): LogRecord {
  const get = (name: string): string | undefined => {
    const index = columns.get(name);
    return index === undefined ? undefined : row.fields[index];
  };

  if (row.fields.length !== columns.size) {
    throw new LogParseError(row.line, `expected ${columns.size} fields, found ${row.fields.length}`);
  }

  const oldPath = get('old_path') ?? '';
  const newPath = get('new_path') ?? '';
  // Logs without a status column only ever recorded completed moves
  const rawStatus = get('status') ?? 'ok';

  if (!isLogStatus(rawStatus)) {
    throw new LogParseError(row.line, `unknown status "${rawStatus}"`);
  }
  if (!oldPath) {
    throw new LogParseError(row.line, 'old_path is empty');
  }
  if (rawStatus === 'ok' && !newPath) {
    throw new LogParseError(row.line, 'new_path is empty');
  }

  const rawTimestamp = get('timestamp_ms');
  let timestampMs: number | undefined;
  if (rawTimestamp) {
    timestampMs = Number(rawTimestamp);
    if (!Number.isInteger(timestampMs)) {
      throw new LogParseError(row.line, `invalid timestamp_ms "${rawTimestamp}"`);
    }
  }

  const source = get('source');
  return {
    oldPath,
    newPath,
    status: rawStatus,
    error: get('error') ?? '',
    timestampMs,
    source: source || undefined,
  };
}

/**
 * Read a run log back. Malformed rows are reported in `invalid` and skipped.
 *
 * @throws LogUnreadableError when the file cannot be read or has no usable header
 */
export function readLog(logPath: string): ParsedLog {
  let content: string;
  try {
    content = fs.readFileSync(logPath, 'utf-8');
  } catch (error) {
    throw new LogUnreadableError(logPath, describeError(error));
  }

  const [header, ...rows] = parseCsv(content);
  if (!header) {
    throw new LogUnreadableError(logPath, 'file is empty');
  }

  const columns = new Map<string, number>();
  header.fields.forEach((name, index) => columns.set(name.trim(), index));
  if (!columns.has('old_path') || !columns.has('new_path')) {
    throw new LogUnreadableError(logPath, 'header must contain old_path and new_path');
  }

  const schema: LogSchema = columns.has('timestamp_ms') ? 'rename' : 'organize';
  const records: LogRecord[] = [];
  const invalid: InvalidLogRow[] = [];

  for (const row of rows) {
    try {
      records.push(parseRecord(row, columns));
    } catch (error) {
      if (error instanceof LogParseError) {
        invalid.push({ line: error.line, message: error.message });
        continue;
      }
      throw error;
    }
  }

  return { schema, records, invalid };
}
