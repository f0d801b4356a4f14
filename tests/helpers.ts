import * as fs from 'node:fs';
import * as path from 'node:path';
import * as os from 'node:os';
import type { FileOps, SourceFile } from '../src/batch/types.js';
import { toSourceFile } from '../src/core/scanner.js';
import { nodeFileOps } from '../src/batch/paths.js';

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'filetidy-test-'));
}

/** Create files (with parent folders) below `root`; returns their absolute paths */
export function touch(root: string, ...relativePaths: string[]): string[] {
  return relativePaths.map((relativePath) => {
    const filePath = path.join(root, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, `content of ${relativePath}`);
    return filePath;
  });
}

/** Sorted paths of every file below `root`, relative to it */
export function listTree(root: string): string[] {
  const out: string[] = [];
  const walk = (dir: string) => {
    for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
      const full = path.join(dir, entry.name);
      if (entry.isDirectory()) {
        walk(full);
      } else {
        out.push(path.relative(root, full));
      }
    }
  };
  walk(root);
  return out.sort();
}

export function sourceFiles(root: string, ...relativePaths: string[]): SourceFile[] {
  return relativePaths.map((relativePath) => toSourceFile(root, path.join(root, relativePath)));
}

/** Real filesystem operations, except renames of the listed sources fail with EACCES */
export function lockedFileOps(...lockedSources: string[]): FileOps {
  const locked = new Set(lockedSources);
  return {
    exists: nodeFileOps.exists,
    mkdir: nodeFileOps.mkdir,
    rename: (from, to) => {
      if (locked.has(from)) {
        throw Object.assign(new Error(`EACCES: permission denied, rename '${from}' -> '${to}'`), { code: 'EACCES' });
      }
      nodeFileOps.rename(from, to);
    },
  };
}
