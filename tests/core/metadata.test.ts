import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'node:fs';
import * as path from 'node:path';
import {
  birthTimeResolver,
  createTimestampKeyProvider,
  dateAddedResolver,
  formatTimestampKey,
  mtimeResolver,
  parseMdlsDate,
  renameTarget,
  resolverChain,
  resolveTimestamp,
  type TimestampResolver,
} from '../../src/core/metadata.js';
import { compactDateTime, logStamp } from '../../src/batch/time.js';
import { makeTempDir, sourceFiles, touch } from '../helpers.js';

const failing = (source: TimestampResolver['source'], reason: string): TimestampResolver => ({
  source,
  resolve: () => ({ ok: false, reason }),
});
const fixed = (source: TimestampResolver['source'], timestampMs: number): TimestampResolver => ({
  source,
  resolve: () => ({ ok: true, timestampMs }),
});

describe('time formatting', () => {
  it('formats local time with milliseconds', () => {
    expect(compactDateTime(new Date(2024, 0, 1, 12, 0, 0, 0))).toBe('20240101120000000');
    expect(compactDateTime(new Date(2023, 11, 31, 23, 59, 58, 7))).toBe('20231231235958007');
  });

  it('formats log stamps with separators', () => {
    expect(logStamp(new Date(2024, 0, 2, 3, 4, 5, 6))).toBe('20240102-030405-006');
  });
});

describe('parseMdlsDate', () => {
  it('parses a UTC date', () => {
    expect(parseMdlsDate('2025-12-16 02:23:45 +0000\n')).toBe(Date.UTC(2025, 11, 16, 2, 23, 45));
  });

  it('applies the offset and fractional seconds', () => {
    expect(parseMdlsDate('2025-12-16 10:23:45.123 +08:00')).toBe(Date.UTC(2025, 11, 16, 2, 23, 45, 123));
    expect(parseMdlsDate('2025-12-15 21:23:45 -0500')).toBe(Date.UTC(2025, 11, 16, 2, 23, 45));
  });

  it('returns undefined when the attribute is missing', () => {
    expect(parseMdlsDate('(null)')).toBeUndefined();
    expect(parseMdlsDate('')).toBeUndefined();
  });
});

describe('resolverChain', () => {
  it('prefers Date Added, then birth time, then mtime', () => {
    expect(resolverChain('auto')).toEqual([dateAddedResolver, birthTimeResolver, mtimeResolver]);
    expect(resolverChain('date-added')).toEqual([dateAddedResolver, birthTimeResolver, mtimeResolver]);
    expect(resolverChain('birthtime')).toEqual([birthTimeResolver, mtimeResolver]);
    expect(resolverChain('mtime')).toEqual([mtimeResolver]);
  });
});

describe('resolveTimestamp', () => {
  it('takes the first resolver that succeeds', () => {
    const result = resolveTimestamp('/x.jpg', [failing('date_added', 'no attribute'), fixed('birth_time', 5), fixed('mtime', 9)]);

    expect(result).toEqual({ ok: true, timestampMs: 5, source: 'birth_time' });
  });

  it('collects every reason when all resolvers fail', () => {
    const result = resolveTimestamp('/x.jpg', [failing('date_added', 'no attribute'), failing('mtime', 'gone')]);

    expect(result).toEqual({ ok: false, error: 'date_added: no attribute; mtime: gone' });
  });

  it('treats a throwing resolver as a failure and moves on', () => {
    const throwing: TimestampResolver = {
      source: 'birth_time',
      resolve: () => {
        throw new Error('stat exploded');
      },
    };

    expect(resolveTimestamp('/x.jpg', [throwing, fixed('mtime', 1)])).toEqual({ ok: true, timestampMs: 1, source: 'mtime' });
    expect(resolveTimestamp('/x.jpg', [throwing])).toEqual({ ok: false, error: 'birth_time: stat exploded' });
  });

  it('fails with an empty chain', () => {
    expect(resolveTimestamp('/x.jpg', [])).toEqual({ ok: false, error: 'no timestamp resolvers' });
  });
});

describe('timestamp keys', () => {
  let root: string;

  beforeEach(() => {
    root = path.join(makeTempDir(), 'trip');
    fs.mkdirSync(root);
  });

  afterEach(() => {
    fs.rmSync(path.dirname(root), { recursive: true, force: true });
  });

  const noon = new Date(2024, 0, 1, 12, 0, 0, 0).getTime();

  it('formats keys as local date-time or epoch milliseconds', () => {
    expect(formatTimestampKey(noon, 'datetime-ms')).toBe('20240101120000000');
    expect(formatTimestampKey(1704110400123, 'epoch-ms')).toBe('1704110400123');
  });

  it('builds keys from the resolver chain', () => {
    touch(root, 'a.jpg');
    const keyFn = createTimestampKeyProvider({ format: 'datetime-ms', resolvers: [failing('date_added', 'n/a'), fixed('mtime', noon)] });

    expect(keyFn(sourceFiles(root, 'a.jpg')[0])).toEqual({
      ok: true,
      key: '20240101120000000',
      source: 'mtime',
      timestampMs: noon,
    });
  });

  it('reports an unresolvable timestamp', () => {
    touch(root, 'a.jpg');
    const keyFn = createTimestampKeyProvider({ format: 'epoch-ms', resolvers: [failing('mtime', 'gone')] });

    expect(keyFn(sourceFiles(root, 'a.jpg')[0])).toEqual({ ok: false, error: 'mtime: gone' });
  });

  it('reads mtime from the file', () => {
    const [filePath] = touch(root, 'a.jpg');
    const when = new Date(2024, 0, 1, 12, 0, 0);
    fs.utimesSync(filePath, when, when);

    expect(mtimeResolver.resolve(filePath)).toEqual({ ok: true, timestampMs: when.getTime() });
  });

  it('names the target after the folder and keeps the extension case', () => {
    touch(root, 'IMG_001.JPG', 'backup.tar.gz');
    const [photo, archive] = sourceFiles(root, 'IMG_001.JPG', 'backup.tar.gz');

    expect(renameTarget(photo, '20240101120000000')).toBe(path.join(root, 'trip_20240101120000000.JPG'));
    expect(renameTarget(archive, '1')).toBe(path.join(root, 'trip_1.tar.gz'));
  });
});
