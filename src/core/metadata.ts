/**
 * Timestamp keys for the rename command
 *
 * A file's timestamp comes from the first resolver in an ordered chain that
 * succeeds: Finder's "Date Added" (via mdls), then birth time, then mtime.
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { spawnSync } from 'node:child_process';
import { describeError } from '../batch/errors.js';
import { splitBaseExt } from '../batch/paths.js';
import { compactDateTime } from '../batch/time.js';
import type { KeyProvider, TargetRule } from '../batch/types.js';

export type TimeSource = 'auto' | 'date-added' | 'birthtime' | 'mtime';
export type TimestampFormat = 'datetime-ms' | 'epoch-ms';

/** Names recorded in the log's `source` column */
export type MetadataSource = 'date_added' | 'birth_time' | 'mtime';

export const TIME_SOURCES: readonly TimeSource[] = ['auto', 'date-added', 'birthtime', 'mtime'];
export const TIMESTAMP_FORMATS: readonly TimestampFormat[] = ['datetime-ms', 'epoch-ms'];

export const DEFAULT_IMAGE_EXTENSIONS = ['jpg', 'jpeg', 'png', 'gif', 'heic', 'heif', 'webp', 'tif', 'tiff', 'bmp'];

export type ResolverResult = { ok: true; timestampMs: number } | { ok: false; reason: string };

export interface TimestampResolver {
  source: MetadataSource;
  resolve(filePath: string): ResolverResult;
}

// ============================================================================
// Resolvers
// ============================================================================

/**
 * Parse `mdls -raw` date output such as `2025-12-16 02:23:45 +0000` or
 * `2025-12-16 02:23:45.123 +08:00`. Returns epoch milliseconds.
 */
export function parseMdlsDate(raw: string): number | undefined {
  const match = raw
    .trim()
    .match(/^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})(?:\.(\d{1,6}))? ([+-])(\d{2}):?(\d{2})$/);
  if (!match) return undefined;

  const [, year, month, day, hour, minute, second, fraction = '', sign, offsetHours, offsetMinutes] = match;
  const millis = Number(fraction.padEnd(3, '0').slice(0, 3));
  const utc = Date.UTC(
    Number(year),
    Number(month) - 1,
    Number(day),
    Number(hour),
    Number(minute),
    Number(second),
    millis
  );
  const offset = (Number(offsetHours) * 60 + Number(offsetMinutes)) * 60_000;
  return sign === '+' ? utc - offset : utc + offset;
}

export const dateAddedResolver: TimestampResolver = {
  source: 'date_added',
  resolve(filePath) {
    const proc = spawnSync('mdls', ['-name', 'kMDItemDateAdded', '-raw', filePath], { encoding: 'utf-8' });
    if (proc.error) {
      return { ok: false, reason: `mdls unavailable: ${proc.error.message}` };
    }
    if (proc.status !== 0) {
      return { ok: false, reason: `mdls exited with ${proc.status}` };
    }
    const parsed = parseMdlsDate(proc.stdout);
    return parsed === undefined
      ? { ok: false, reason: 'no Date Added attribute' }
      : { ok: true, timestampMs: parsed };
  },
};

export const birthTimeResolver: TimestampResolver = {
  source: 'birth_time',
  resolve(filePath) {
    const { birthtimeMs } = fs.statSync(filePath);
    // Filesystems without birth time report 0
    if (!Number.isFinite(birthtimeMs) || birthtimeMs <= 0) {
      return { ok: false, reason: 'birth time not supported' };
    }
    return { ok: true, timestampMs: Math.round(birthtimeMs) };
  },
};

export const mtimeResolver: TimestampResolver = {
  source: 'mtime',
  resolve(filePath) {
    return { ok: true, timestampMs: Math.round(fs.statSync(filePath).mtimeMs) };
  },
};

export function resolverChain(timeSource: TimeSource): TimestampResolver[] {
  switch (timeSource) {
    case 'auto':
    case 'date-added':
      return [dateAddedResolver, birthTimeResolver, mtimeResolver];
    case 'birthtime':
      return [birthTimeResolver, mtimeResolver];
    case 'mtime':
      return [mtimeResolver];
  }
}

export type TimestampResult =
  | { ok: true; timestampMs: number; source: MetadataSource }
  | { ok: false; error: string };

/** Try each resolver in order; the first success wins */
export function resolveTimestamp(filePath: string, chain: readonly TimestampResolver[]): TimestampResult {
  const reasons: string[] = [];

  for (const resolver of chain) {
    let result: ResolverResult;
    try {
      result = resolver.resolve(filePath);
    } catch (error) {
      result = { ok: false, reason: describeError(error) };
    }

    if (result.ok) {
      return { ok: true, timestampMs: result.timestampMs, source: resolver.source };
    }
    reasons.push(`${resolver.source}: ${result.reason}`);
  }

  return { ok: false, error: reasons.length > 0 ? reasons.join('; ') : 'no timestamp resolvers' };
}

// ============================================================================
// Keys & Targets
// ============================================================================

export function formatTimestampKey(timestampMs: number, format: TimestampFormat): string {
  return format === 'epoch-ms' ? String(timestampMs) : compactDateTime(new Date(timestampMs));
}

export interface TimestampKeyOptions {
  format: TimestampFormat;
  resolvers: readonly TimestampResolver[];
}

export function createTimestampKeyProvider(options: TimestampKeyOptions): KeyProvider {
  return (file) => {
    const result = resolveTimestamp(file.path, options.resolvers);
    if (!result.ok) {
      return { ok: false, error: result.error };
    }
    return {
      ok: true,
      key: formatTimestampKey(result.timestampMs, options.format),
      source: result.source,
      timestampMs: result.timestampMs,
    };
  };
}

/** `<dir>/<folder>_<timestamp><ext>`, renamed in place */
export const renameTarget: TargetRule = (file, key) =>
  path.join(path.dirname(file.path), `${file.folderName}_${key}${splitBaseExt(file.name).ext}`);
