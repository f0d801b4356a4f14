/**
 * plan operations - Turn a scanned file list into an ordered, collision-free plan
 */

import { describeError, ResolutionError } from '../errors.js';
import type {
  EngineConfig,
  KeyProvider,
  KeyResult,
  Plan,
  PlannedOperation,
  SourceFile,
  TargetRule,
} from '../types.js';
import { CollisionRegistry, resolveCollision } from './collision.js';

export type PlanConfig = Pick<EngineConfig, 'root' | 'fileOps' | 'maxSuffix' | 'renameInPlace'>;

/** Plain code-unit ordering so plans never depend on the host locale */
export function compareByPath(a: SourceFile, b: SourceFile): number {
  if (a.path < b.path) return -1;
  if (a.path > b.path) return 1;
  return 0;
}

function keyFor(keyFn: KeyProvider, file: SourceFile): KeyResult {
  try {
    return keyFn(file);
  } catch (error) {
    return { ok: false, error: describeError(error) };
  }
}

function failed(file: SourceFile, error: string, key = '', keySource?: string): PlannedOperation {
  return { source: file.path, target: '', key, keySource, status: 'failed', error };
}

/**
 * Build the plan for a batch.
 *
 * Files are visited in path order; each one's candidate target is resolved
 * against the paths claimed so far and against what exists on disk. Per-file
 * failures become failed operations, the rest of the batch is still planned.
 */
export function buildPlan(
  files: Iterable<SourceFile>,
  keyFn: KeyProvider,
  targetRule: TargetRule,
  config: PlanConfig
): Plan {
  const ordered = Array.from(files).sort(compareByPath);
  const registry = new CollisionRegistry();
  const exists = (filePath: string) => config.fileOps.exists(filePath);

  const operations: PlannedOperation[] = [];
  const unchanged: SourceFile[] = [];

  for (const file of ordered) {
    const resolved = keyFor(keyFn, file);
    if (!resolved.ok) {
      operations.push(failed(file, new ResolutionError(file.path, resolved.error).message));
      continue;
    }

    let target: string;
    try {
      target = resolveCollision(targetRule(file, resolved.key), registry, exists, {
        self: config.renameInPlace ? file.path : undefined,
        maxSuffix: config.maxSuffix,
      });
    } catch (error) {
      operations.push(failed(file, describeError(error), resolved.key, resolved.source));
      continue;
    }

    if (target === file.path) {
      unchanged.push(file);
      continue;
    }

    operations.push({
      source: file.path,
      target,
      key: resolved.key,
      keySource: resolved.source,
      timestampMs: resolved.timestampMs,
      status: 'planned',
    });
  }

  return { root: config.root, operations, unchanged };
}

/** Mark operations the user declined so they are logged as skipped */
export function declineOperations(plan: Plan, declined: ReadonlySet<string>): Plan {
  return {
    ...plan,
    operations: plan.operations.map((op): PlannedOperation =>
      op.status === 'planned' && declined.has(op.source) ? { ...op, status: 'skipped' } : op
    ),
  };
}
