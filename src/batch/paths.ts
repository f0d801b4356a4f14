/**
 * Path helpers shared by the scanner, the planner and the collision resolver
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import type { FileOps } from './types.js';

// Longest first so '.tar.gz' wins over '.gz'
const COMPOUND_EXTENSIONS = ['.tar.zst', '.tar.bz2', '.tar.gz', '.tar.xz', '.tbz2', '.tgz', '.txz'];

/**
 * Split a file name into base and extension, keeping compound archive
 * extensions together. The extension keeps its original case and its dot.
 */
export function splitBaseExt(name: string): { base: string; ext: string } {
  const lower = name.toLowerCase();
  for (const compound of COMPOUND_EXTENSIONS) {
    if (lower.endsWith(compound) && lower.length > compound.length) {
      return { base: name.slice(0, -compound.length), ext: name.slice(-compound.length) };
    }
  }

  const ext = path.extname(name);
  if (!ext) {
    return { base: name, ext: '' };
  }
  return { base: name.slice(0, -ext.length), ext };
}

/** Lowercased extension without the leading dot */
export function extensionToken(name: string): string {
  return splitBaseExt(name).ext.slice(1).toLowerCase();
}

/** Whether `candidate` is `dir` itself or lies somewhere below it */
export function isWithin(candidate: string, dir: string): boolean {
  const relative = path.relative(dir, candidate);
  if (relative === '') return true;
  const escapes = relative === '..' || relative.startsWith(`..${path.sep}`);
  return !escapes && !path.isAbsolute(relative);
}

export const nodeFileOps: FileOps = {
  // lstat so a dangling symlink still counts as taken
  exists: (filePath) => fs.lstatSync(filePath, { throwIfNoEntry: false }) !== undefined,
  rename: (from, to) => fs.renameSync(from, to),
  mkdir: (dirPath) => {
    fs.mkdirSync(dirPath, { recursive: true });
  },
};
