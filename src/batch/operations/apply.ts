/**
 * apply operations - Execute a plan one file at a time
 *
 * Each move is a single rename call. A failure is recorded on that item and
 * the batch moves on; sources are never deleted or copied.
 */

import * as path from 'node:path';
import { describeError, FilesystemError } from '../errors.js';
import type { ApplyOutcome, EngineConfig, OutcomeCallback, Plan, PlannedOperation } from '../types.js';
import { CollisionRegistry, resolveCollision } from './collision.js';

export type ApplyConfig = Pick<EngineConfig, 'fileOps' | 'maxSuffix'>;

function moveOne(op: PlannedOperation, config: ApplyConfig, registry: CollisionRegistry): string {
  const { fileOps } = config;

  // The directory may have changed since planning
  let target = op.target;
  if (registry.has(target) || fileOps.exists(target)) {
    target = resolveCollision(target, registry, (p) => fileOps.exists(p), { maxSuffix: config.maxSuffix });
  } else {
    registry.claim(target);
  }

  const targetDir = path.dirname(target);
  if (!fileOps.exists(targetDir)) {
    try {
      fileOps.mkdir(targetDir);
    } catch (error) {
      throw new FilesystemError('Create directory', targetDir, error);
    }
  }

  try {
    fileOps.rename(op.source, target);
  } catch (error) {
    throw new FilesystemError('Move', op.source, error);
  }

  return target;
}

/**
 * Apply every operation of a plan in order.
 *
 * Operations that already failed during planning, or that were declined, are
 * not attempted but still produce an outcome so they end up in the log.
 * An error thrown by `onOutcome` propagates and ends the batch.
 */
export function applyPlan(plan: Plan, config: ApplyConfig, onOutcome?: OutcomeCallback): ApplyOutcome[] {
  const registry = new CollisionRegistry();
  const outcomes: ApplyOutcome[] = [];

  const emit = (outcome: ApplyOutcome) => {
    outcomes.push(outcome);
    onOutcome?.(outcome);
  };

  for (const op of plan.operations) {
    if (op.status === 'failed') {
      emit({ operation: op, status: 'failed', target: op.target, error: op.error });
      continue;
    }
    if (op.status === 'skipped') {
      emit({ operation: op, status: 'skipped', target: op.target });
      continue;
    }

    let target: string;
    try {
      target = moveOne(op, config, registry);
    } catch (error) {
      op.status = 'failed';
      op.error = describeError(error);
      emit({ operation: op, status: 'failed', target: op.target, error: op.error });
      continue;
    }

    // Moved; the item stays applied even if onOutcome throws
    op.status = 'applied';
    op.target = target;
    emit({ operation: op, status: 'applied', target });
  }

  return outcomes;
}

export function hasFailures(outcomes: ReadonlyArray<{ status: string }>): boolean {
  return outcomes.some((outcome) => outcome.status === 'failed');
}
