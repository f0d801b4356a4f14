import { describe, it, expect } from 'vitest';
import * as path from 'node:path';
import {
  CollisionRegistry,
  resolveCollision,
  suffixedPath,
} from '../../src/batch/operations/collision.js';
import { CollisionExhaustedError } from '../../src/batch/errors.js';

const dir = path.join(path.sep, 'photos');
const p = (name: string) => path.join(dir, name);

describe('suffixedPath', () => {
  it('inserts a zero-padded suffix before the extension', () => {
    expect(suffixedPath(p('a.jpg'), 1)).toBe(p('a_001.jpg'));
    expect(suffixedPath(p('a.jpg'), 42)).toBe(p('a_042.jpg'));
  });

  it('widens past 999', () => {
    expect(suffixedPath(p('a.jpg'), 1000)).toBe(p('a_1000.jpg'));
  });

  it('keeps compound archive extensions together', () => {
    expect(suffixedPath(p('backup.tar.gz'), 2)).toBe(p('backup_002.tar.gz'));
  });

  it('handles names without an extension', () => {
    expect(suffixedPath(p('Makefile'), 1)).toBe(p('Makefile_001'));
  });
});

describe('resolveCollision', () => {
  const nothingOnDisk = () => false;

  it('returns a free candidate unchanged and claims it', () => {
    const registry = new CollisionRegistry();

    expect(resolveCollision(p('a.jpg'), registry, nothingOnDisk)).toBe(p('a.jpg'));
    expect(registry.has(p('a.jpg'))).toBe(true);
  });

  it('assigns _001, _002 in order for repeated candidates', () => {
    const registry = new CollisionRegistry();

    const results = [1, 2, 3].map(() => resolveCollision(p('x.jpg'), registry, nothingOnDisk));

    expect(results).toEqual([p('x.jpg'), p('x_001.jpg'), p('x_002.jpg')]);
    expect(registry.size).toBe(3);
  });

  it('skips names that exist on disk', () => {
    const onDisk = new Set([p('x.jpg'), p('x_001.jpg')]);
    const registry = new CollisionRegistry();

    expect(resolveCollision(p('x.jpg'), registry, (f) => onDisk.has(f))).toBe(p('x_002.jpg'));
  });

  it('treats the file own path as free', () => {
    const registry = new CollisionRegistry();

    expect(resolveCollision(p('x.jpg'), registry, () => true, { self: p('x.jpg') })).toBe(p('x.jpg'));
  });

  it('does not let self override a claim from earlier in the batch', () => {
    const registry = new CollisionRegistry([p('x.jpg')]);

    expect(resolveCollision(p('x.jpg'), registry, nothingOnDisk, { self: p('x.jpg') })).toBe(p('x_001.jpg'));
  });

  it('is deterministic for the same registry state', () => {
    const onDisk = new Set([p('x.jpg')]);
    const first = resolveCollision(p('x.jpg'), new CollisionRegistry(), (f) => onDisk.has(f));
    const second = resolveCollision(p('x.jpg'), new CollisionRegistry(), (f) => onDisk.has(f));

    expect(first).toBe(second);
  });

  it('throws CollisionExhaustedError once maxSuffix is used up', () => {
    expect(() => resolveCollision(p('x.jpg'), new CollisionRegistry(), () => true, { maxSuffix: 3 })).toThrow(
      CollisionExhaustedError
    );
  });
});
