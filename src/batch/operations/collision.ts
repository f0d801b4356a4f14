/**
 * Collision resolution - pick a target path nobody else has claimed
 *
 * Candidates that are taken get `_001`, `_002`, ... appended before the
 * extension. Suffixes widen past 999 instead of failing.
 */

import * as path from 'node:path';
import { CollisionExhaustedError } from '../errors.js';
import { splitBaseExt } from '../paths.js';

export const DEFAULT_MAX_SUFFIX = 99_999;
const SUFFIX_WIDTH = 3;

/**
 * Target paths already handed out during one planning or applying run
 */
export class CollisionRegistry {
  private readonly claimed = new Set<string>();

  constructor(initial: Iterable<string> = []) {
    for (const entry of initial) {
      this.claimed.add(entry);
    }
  }

  has(filePath: string): boolean {
    return this.claimed.has(filePath);
  }

  claim(filePath: string): void {
    this.claimed.add(filePath);
  }

  get size(): number {
    return this.claimed.size;
  }
}

/** Returns true when something already exists at the path */
export type ExistsCheck = (filePath: string) => boolean;

export interface ResolveOptions {
  /** Path the file currently occupies; it never collides with itself */
  self?: string;
  maxSuffix?: number;
}

export function suffixedPath(candidate: string, index: number): string {
  const dir = path.dirname(candidate);
  const { base, ext } = splitBaseExt(path.basename(candidate));
  return path.join(dir, `${base}_${String(index).padStart(SUFFIX_WIDTH, '0')}${ext}`);
}

/**
 * Return `candidate` or the first free suffixed variant of it, and claim it.
 *
 * @throws CollisionExhaustedError when no suffix up to `maxSuffix` is free
 */
export function resolveCollision(
  candidate: string,
  registry: CollisionRegistry,
  exists: ExistsCheck,
  options: ResolveOptions = {}
): string {
  const maxSuffix = options.maxSuffix ?? DEFAULT_MAX_SUFFIX;

  const isFree = (filePath: string): boolean => {
    if (registry.has(filePath)) return false;
    if (filePath === options.self) return true;
    return !exists(filePath);
  };

  if (isFree(candidate)) {
    registry.claim(candidate);
    return candidate;
  }

  for (let i = 1; i <= maxSuffix; i++) {
    const next = suffixedPath(candidate, i);
    if (isFree(next)) {
      registry.claim(next);
      return next;
    }
  }

  throw new CollisionExhaustedError(candidate, maxSuffix);
}
