/**
 * undo operations - Replay a run log backwards
 *
 * Rows are undone newest first so chains of suffixed names unwind cleanly.
 * Nothing is ever overwritten and the source log is left in place.
 */

import * as path from 'node:path';
import { CsvLogWriter, createLogPath, readLog } from '../csv-log.js';
import { FilesystemError, UndoConflictError } from '../errors.js';
import type { EngineConfig, LogRecord, LogStatus, UndoOutcome, UndoReport, UndoStatus } from '../types.js';

export type UndoConfig = Pick<EngineConfig, 'apply' | 'fileOps' | 'now'>;

export const UNDO_LOG_PREFIX = 'undo-log';

const LOG_STATUS_BY_UNDO: Record<UndoStatus, LogStatus> = {
  restored: 'ok',
  failed: 'failed',
  missing: 'skipped',
  skipped: 'skipped',
};

/**
 * Tracks what the undo has moved so far, so a preview sees the same
 * filesystem state an applied undo would
 */
class PathOverlay {
  private readonly occupied = new Set<string>();
  private readonly vacated = new Set<string>();

  constructor(private readonly exists: (filePath: string) => boolean) {}

  has(filePath: string): boolean {
    if (this.occupied.has(filePath)) return true;
    if (this.vacated.has(filePath)) return false;
    return this.exists(filePath);
  }

  move(from: string, to: string): void {
    this.occupied.delete(from);
    this.vacated.add(from);
    this.vacated.delete(to);
    this.occupied.add(to);
  }
}

function undoRecord(record: LogRecord, config: UndoConfig, overlay: PathOverlay): UndoOutcome {
  if (record.status !== 'ok') {
    return { record, status: 'skipped', message: `Not a completed move (status: ${record.status})` };
  }
  if (!overlay.has(record.newPath)) {
    return { record, status: 'missing', message: `Moved file no longer exists: ${record.newPath}` };
  }
  if (overlay.has(record.oldPath)) {
    return { record, status: 'failed', message: new UndoConflictError(record.oldPath).message };
  }

  if (config.apply) {
    const { fileOps } = config;
    const parent = path.dirname(record.oldPath);
    try {
      if (!fileOps.exists(parent)) {
        fileOps.mkdir(parent);
      }
    } catch (error) {
      return { record, status: 'failed', message: new FilesystemError('Create directory', parent, error).message };
    }
    try {
      fileOps.rename(record.newPath, record.oldPath);
    } catch (error) {
      return { record, status: 'failed', message: new FilesystemError('Restore', record.newPath, error).message };
    }
  }

  overlay.move(record.newPath, record.oldPath);
  return { record, status: 'restored' };
}

/**
 * Undo every successful move recorded in a log.
 *
 * With `apply: false` nothing is moved and `restored` means "would be restored".
 * With `apply: true` the undo writes its own log next to the source log.
 *
 * @throws LogUnreadableError when the log cannot be read
 */
export function undoFromLog(logPath: string, config: UndoConfig): UndoReport {
  const parsed = readLog(logPath);
  const overlay = new PathOverlay((filePath) => config.fileOps.exists(filePath));

  let writer: CsvLogWriter | undefined;
  if (config.apply) {
    writer = CsvLogWriter.open(createLogPath(path.dirname(logPath), UNDO_LOG_PREFIX, config.now()), 'organize');
  }

  const outcomes: UndoOutcome[] = [];
  for (const record of [...parsed.records].reverse()) {
    const outcome = undoRecord(record, config, overlay);
    outcomes.push(outcome);
    // Rows that were never moved keep their direction; new_path may be empty for them
    const [from, to] = record.status === 'ok' ? [record.newPath, record.oldPath] : [record.oldPath, record.newPath];
    writer?.write({
      oldPath: from,
      newPath: to,
      status: LOG_STATUS_BY_UNDO[outcome.status],
      error: outcome.message ?? '',
    });
  }

  return {
    logPath,
    applied: config.apply,
    outcomes,
    invalid: parsed.invalid,
    undoLogPath: writer?.filePath,
  };
}

export function countUndoOutcomes(report: UndoReport): Record<UndoStatus, number> {
  const counts: Record<UndoStatus, number> = { restored: 0, missing: 0, failed: 0, skipped: 0 };
  for (const outcome of report.outcomes) {
    counts[outcome.status]++;
  }
  return counts;
}
