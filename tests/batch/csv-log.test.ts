import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  CsvLogWriter,
  createLogPath,
  escapeCsvField,
  formatCsvRow,
  parseCsv,
  readLog,
  toLogRecord,
  writeLog,
} from '../../src/batch/csv-log.js';
import { LogUnreadableError } from '../../src/batch/errors.js';
import type { ApplyOutcome } from '../../src/batch/types.js';
import { makeTempDir } from '../helpers.js';

describe('CSV encoding', () => {
  it('leaves plain fields alone', () => {
    expect(escapeCsvField('/photos/a.jpg')).toBe('/photos/a.jpg');
  });

  it('quotes fields with commas, quotes or newlines', () => {
    expect(escapeCsvField('a,b.jpg')).toBe('"a,b.jpg"');
    expect(escapeCsvField('say "hi".jpg')).toBe('"say ""hi"".jpg"');
    expect(escapeCsvField('two\nlines')).toBe('"two\nlines"');
  });

  it('formats a row with a trailing newline', () => {
    expect(formatCsvRow(['a', 'b,c', ''])).toBe('a,"b,c",\n');
  });
});

describe('parseCsv', () => {
  it('splits rows and fields with their starting line', () => {
    expect(parseCsv('x,y\n1,2\n')).toEqual([
      { line: 1, fields: ['x', 'y'] },
      { line: 2, fields: ['1', '2'] },
    ]);
  });

  it('reads quoted fields containing separators', () => {
    expect(parseCsv('"a,b","say ""hi""","two\nlines"\nnext,row,here\n')).toEqual([
      { line: 1, fields: ['a,b', 'say "hi"', 'two\nlines'] },
      { line: 3, fields: ['next', 'row', 'here'] },
    ]);
  });

  it('accepts CRLF line endings, a byte order mark and a missing final newline', () => {
    expect(parseCsv('\uFEFFx,y\r\n1,2')).toEqual([
      { line: 1, fields: ['x', 'y'] },
      { line: 2, fields: ['1', '2'] },
    ]);
  });

  it('drops blank lines', () => {
    expect(parseCsv('x\n\n1\n')).toEqual([
      { line: 1, fields: ['x'] },
      { line: 3, fields: ['1'] },
    ]);
  });

  it('keeps empty fields', () => {
    expect(parseCsv('a,,c\n')).toEqual([{ line: 1, fields: ['a', '', 'c'] }]);
  });
});

describe('run logs', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = makeTempDir();
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  const outcome = (overrides: Partial<ApplyOutcome> = {}): ApplyOutcome => ({
    operation: {
      source: '/photos/a.jpg',
      target: '/photos/photos_20240101120000000.jpg',
      key: '20240101120000000',
      keySource: 'mtime',
      timestampMs: 1704110400000,
      status: 'applied',
    },
    status: 'applied',
    target: '/photos/photos_20240101120000000.jpg',
    ...overrides,
  });

  describe('createLogPath', () => {
    it('names the log after its prefix and the run time', () => {
      const now = new Date(2024, 0, 2, 3, 4, 5, 6);

      expect(createLogPath(tempDir, 'rename-log', now)).toBe(path.join(tempDir, 'rename-log-20240102-030405-006.csv'));
    });

    it('never reuses an existing log file name', () => {
      const now = new Date(2024, 0, 2, 3, 4, 5, 6);
      fs.writeFileSync(path.join(tempDir, 'sort-log-20240102-030405-006.csv'), '');

      expect(createLogPath(tempDir, 'sort-log', now)).toBe(path.join(tempDir, 'sort-log-20240102-030405-006_001.csv'));
    });
  });

  describe('CsvLogWriter', () => {
    it('writes the rename header and one row per outcome', () => {
      const logPath = path.join(tempDir, 'rename.csv');
      const writer = CsvLogWriter.open(logPath, 'rename');
      writer.writeOutcome(outcome());

      expect(writer.rowCount).toBe(1);
      expect(fs.readFileSync(logPath, 'utf-8')).toBe(
        'old_path,new_path,timestamp_ms,source,status,error\n' +
          '/photos/a.jpg,/photos/photos_20240101120000000.jpg,1704110400000,mtime,ok,\n'
      );
    });

    it('writes the organize header without timestamp columns', () => {
      const logPath = path.join(tempDir, 'nested', 'sort.csv');
      const writer = CsvLogWriter.open(logPath, 'organize');
      writer.write({ oldPath: '/d/a,b.txt', newPath: '/d/out/a,b.txt', status: 'ok', error: '' });

      expect(fs.readFileSync(logPath, 'utf-8')).toBe(
        'old_path,new_path,status,error\n"/d/a,b.txt","/d/out/a,b.txt",ok,\n'
      );
    });

    it('refuses to open a file that already exists', () => {
      const logPath = path.join(tempDir, 'taken.csv');
      fs.writeFileSync(logPath, 'keep me');

      expect(() => CsvLogWriter.open(logPath, 'organize')).toThrow();
      expect(fs.readFileSync(logPath, 'utf-8')).toBe('keep me');
    });
  });

  describe('toLogRecord', () => {
    it('maps a failed outcome with its error', () => {
      expect(toLogRecord(outcome({ status: 'failed', error: 'Move failed' }))).toEqual({
        oldPath: '/photos/a.jpg',
        newPath: '/photos/photos_20240101120000000.jpg',
        status: 'failed',
        error: 'Move failed',
        timestampMs: 1704110400000,
        source: 'mtime',
      });
    });
  });

  describe('readLog', () => {
    it('reads back what writeLog wrote', () => {
      const logPath = path.join(tempDir, 'rename.csv');
      writeLog(
        [outcome(), outcome({ status: 'failed', error: 'Move failed for "x", really' })],
        logPath,
        'rename'
      );

      const log = readLog(logPath);

      expect(log.schema).toBe('rename');
      expect(log.invalid).toEqual([]);
      expect(log.records).toEqual([
        {
          oldPath: '/photos/a.jpg',
          newPath: '/photos/photos_20240101120000000.jpg',
          status: 'ok',
          error: '',
          timestampMs: 1704110400000,
          source: 'mtime',
        },
        {
          oldPath: '/photos/a.jpg',
          newPath: '/photos/photos_20240101120000000.jpg',
          status: 'failed',
          error: 'Move failed for "x", really',
          timestampMs: 1704110400000,
          source: 'mtime',
        },
      ]);
    });

    it('treats rows of a log without a status column as completed moves', () => {
      const logPath = path.join(tempDir, 'legacy.csv');
      fs.writeFileSync(logPath, 'old_path,new_path,timestamp_ms,source\n/a/x.jpg,/a/a_1.jpg,1,mtime\n');

      const log = readLog(logPath);

      expect(log.records).toEqual([
        { oldPath: '/a/x.jpg', newPath: '/a/a_1.jpg', status: 'ok', error: '', timestampMs: 1, source: 'mtime' },
      ]);
    });

    it('collects malformed rows with their line numbers', () => {
      const logPath = path.join(tempDir, 'broken.csv');
      fs.writeFileSync(
        logPath,
        [
          'old_path,new_path,status,error',
          '/a/1,/b/1,ok,',
          '/a/2,/b/2',
          '/a/3,/b/3,done,',
          ',/b/4,ok,',
          '/a/5,,ok,',
          '/a/6,,failed,boom',
          '',
        ].join('\n')
      );

      const log = readLog(logPath);

      expect(log.schema).toBe('organize');
      expect(log.records.map((record) => record.oldPath)).toEqual(['/a/1', '/a/6']);
      expect(log.invalid).toEqual([
        { line: 3, message: 'Line 3: expected 4 fields, found 2' },
        { line: 4, message: 'Line 4: unknown status "done"' },
        { line: 5, message: 'Line 5: old_path is empty' },
        { line: 6, message: 'Line 6: new_path is empty' },
      ]);
    });

    it('rejects a non-numeric timestamp', () => {
      const logPath = path.join(tempDir, 'bad-ts.csv');
      fs.writeFileSync(logPath, 'old_path,new_path,timestamp_ms,source,status,error\n/a,/b,soon,mtime,ok,\n');

      expect(readLog(logPath).invalid).toEqual([{ line: 2, message: 'Line 2: invalid timestamp_ms "soon"' }]);
    });

    it('throws LogUnreadableError for a missing file', () => {
      expect(() => readLog(path.join(tempDir, 'nope.csv'))).toThrow(LogUnreadableError);
    });

    it('throws LogUnreadableError for an empty file', () => {
      const logPath = path.join(tempDir, 'empty.csv');
      fs.writeFileSync(logPath, '');

      expect(() => readLog(logPath)).toThrow(`Cannot read log ${logPath}: file is empty`);
    });

    it('throws LogUnreadableError when the header lacks the path columns', () => {
      const logPath = path.join(tempDir, 'other.csv');
      fs.writeFileSync(logPath, 'name,size\na,1\n');

      expect(() => readLog(logPath)).toThrow('header must contain old_path and new_path');
    });
  });
});
