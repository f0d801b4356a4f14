/**
 * preview operations - Render a plan as text without touching the filesystem
 */

import * as path from 'node:path';
import type { Plan, PlannedOperation } from '../types.js';

export interface PlanSummary {
  total: number;
  planned: number;
  failed: number;
  skipped: number;
  unchanged: number;
  /** Planned operation counts per key source (metadata resolver or category) */
  byGroup: Record<string, number>;
}

export interface RenderOptions {
  /** Most operation lines to print before collapsing the rest */
  maxLines?: number;
  /** Append the naming key and where it came from to each line */
  showKeys?: boolean;
  /** Heading for the per-group counts */
  groupLabel?: string;
  /** Groups always listed, in this order, even with a zero count */
  groupOrder?: readonly string[];
  /** When given, target folders it reports missing are listed as folders to create */
  dirExists?: (dir: string) => boolean;
}

export function summarizePlan(plan: Plan): PlanSummary {
  const summary: PlanSummary = {
    total: plan.operations.length + plan.unchanged.length,
    planned: 0,
    failed: 0,
    skipped: 0,
    unchanged: plan.unchanged.length,
    byGroup: {},
  };

  for (const op of plan.operations) {
    if (op.status === 'failed') {
      summary.failed++;
      continue;
    }
    if (op.status === 'skipped') {
      summary.skipped++;
      continue;
    }
    summary.planned++;
    const group = op.keySource ?? op.key;
    summary.byGroup[group] = (summary.byGroup[group] ?? 0) + 1;
  }

  return summary;
}

function display(root: string, filePath: string): string {
  return filePath ? path.relative(root, filePath) : '(unresolved)';
}

function renderOperation(root: string, op: PlannedOperation, showKeys: boolean): string {
  if (op.status === 'failed') {
    return `[FAILED] ${display(root, op.source)}: ${op.error ?? 'unknown error'}`;
  }

  const prefix = op.status === 'skipped' ? '[SKIP] ' : '';
  const line = `${prefix}${display(root, op.source)} -> ${display(root, op.target)}`;
  if (!showKeys) return line;

  const via = op.keySource && op.keySource !== op.key ? ` via ${op.keySource}` : '';
  return `${line}  [${op.key}${via}]`;
}

function groupNames(byGroup: Record<string, number>, order: readonly string[] = []): string[] {
  const listed = new Set(order);
  const rest = Object.keys(byGroup)
    .filter((group) => !listed.has(group))
    .sort();
  return [...order, ...rest];
}

/** Distinct target folders that do not exist yet, in path order */
export function foldersToCreate(plan: Plan, dirExists: (dir: string) => boolean): string[] {
  const dirs = new Set<string>();
  for (const op of plan.operations) {
    if (op.status !== 'planned') continue;
    const dir = path.dirname(op.target);
    if (!dirs.has(dir) && !dirExists(dir)) {
      dirs.add(dir);
    }
  }
  return [...dirs].sort();
}

/**
 * Lines of a human-readable preview: one `old -> new` line per operation,
 * then a blank line and the summary counts. Paths are relative to the plan root.
 */
export function renderPlan(plan: Plan, options: RenderOptions = {}): string[] {
  const maxLines = options.maxLines ?? Number.POSITIVE_INFINITY;
  const lines: string[] = [];

  const shown = plan.operations.slice(0, maxLines);
  for (const op of shown) {
    lines.push(renderOperation(plan.root, op, options.showKeys ?? false));
  }
  if (plan.operations.length > shown.length) {
    lines.push(`... (${plan.operations.length - shown.length} more)`);
  }

  const summary = summarizePlan(plan);
  lines.push('');
  lines.push(`Planned: ${summary.planned}`);
  lines.push(`Failed: ${summary.failed}`);
  if (summary.skipped > 0) {
    lines.push(`Skipped: ${summary.skipped}`);
  }
  lines.push(`Unchanged: ${summary.unchanged}`);

  const groups = groupNames(summary.byGroup, options.groupOrder);
  if (groups.length > 0) {
    lines.push(`${options.groupLabel ?? 'By source'}:`);
    for (const group of groups) {
      lines.push(`  ${group}: ${summary.byGroup[group] ?? 0}`);
    }
  }

  if (options.dirExists) {
    const dirs = foldersToCreate(plan, options.dirExists);
    if (dirs.length > 0) {
      lines.push('Folders to create on apply:');
      for (const dir of dirs.slice(0, maxLines)) {
        lines.push(`  ${display(plan.root, dir)}`);
      }
      if (dirs.length > maxLines) {
        lines.push(`  ... (${dirs.length - maxLines} more)`);
      }
    }
  }

  return lines;
}
