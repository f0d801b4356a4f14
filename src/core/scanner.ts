/**
 * Directory scanning - produce SourceFile records for the planner
 *
 * Scans are lazy and restartable: iterating the returned sequence again walks
 * the directory again. Hidden entries are never returned. Directories are
 * skipped unless their extension marks them as a package (an iWork document,
 * an .app bundle), in which case they are returned whole and never entered.
 */

import * as path from 'node:path';
import { globIterateSync, type IgnoreLike } from 'glob';
import { extensionToken, isWithin } from '../batch/paths.js';
import type { SourceFile } from '../batch/types.js';

export type FilePredicate = (file: SourceFile) => boolean;

export interface ScanOptions {
  recursive?: boolean;
  /** Directories never descended into (e.g. a previous run's output) */
  excludeDirs?: string[];
  /** Extensions of directories returned as single entries */
  packageExtensions?: Iterable<string>;
  filter?: FilePredicate;
}

export function toSourceFile(root: string, filePath: string): SourceFile {
  const dir = path.dirname(filePath);
  const name = path.basename(filePath);
  return {
    path: filePath,
    name,
    extension: extensionToken(name),
    folderName: path.basename(dir),
    relativeDir: path.relative(root, dir),
  };
}

// ============================================================================
// Predicates
// ============================================================================

export function excludeSubtree(dir: string): FilePredicate {
  const resolved = path.resolve(dir);
  return (file) => !isWithin(file.path, resolved);
}

function normalizeExtensions(extensions: Iterable<string>): Set<string> {
  return new Set(Array.from(extensions, (ext) => ext.trim().toLowerCase().replace(/^\./, '')));
}

/** Accepts files whose extension is listed; entries may carry a leading dot */
export function extensionAllowList(extensions: Iterable<string>): FilePredicate {
  const allowed = normalizeExtensions(extensions);
  return (file) => allowed.has(file.extension);
}

export function allOf(...predicates: FilePredicate[]): FilePredicate {
  return (file) => predicates.every((predicate) => predicate(file));
}

// ============================================================================
// Scanning
// ============================================================================

function subtreeIgnore(dirs: string[], packages: ReadonlySet<string>): IgnoreLike {
  const resolved = dirs.map((dir) => path.resolve(dir));
  const inside = (fullpath: string) => resolved.some((dir) => isWithin(fullpath, dir));
  return {
    ignored: (p) => inside(p.fullpath()),
    childrenIgnored: (p) => inside(p.fullpath()) || packages.has(extensionToken(p.name)),
  };
}

function* matchPaths(root: string, pattern: string, ignore: IgnoreLike, packages: ReadonlySet<string>): Generator<string> {
  if (packages.size === 0) {
    yield* globIterateSync(pattern, { cwd: root, absolute: true, nodir: true, dot: false, ignore });
    return;
  }

  for (const entry of globIterateSync(pattern, { cwd: root, withFileTypes: true, dot: false, ignore })) {
    if (!entry.isDirectory() || packages.has(extensionToken(entry.name))) {
      yield entry.fullpath();
    }
  }
}

/**
 * Files under `root` (only its direct children unless `recursive`), minus
 * excluded subtrees and anything `filter` rejects. Package directories are
 * included when `packageExtensions` names their extension.
 */
export function scanFiles(root: string, options: ScanOptions = {}): Iterable<SourceFile> {
  const absoluteRoot = path.resolve(root);
  const excludeDirs = options.excludeDirs ?? [];
  const filter = allOf(...excludeDirs.map(excludeSubtree), options.filter ?? (() => true));
  const packages = normalizeExtensions(options.packageExtensions ?? []);

  return {
    *[Symbol.iterator]() {
      const pattern = options.recursive ? '**/*' : '*';
      const ignore = subtreeIgnore(excludeDirs, packages);

      for (const match of matchPaths(absoluteRoot, pattern, ignore, packages)) {
        const file = toSourceFile(absoluteRoot, match);
        if (filter(file)) {
          yield file;
        }
      }
    },
  };
}
