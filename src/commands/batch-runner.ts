/**
 * Shared preview → confirm → apply → log flow of the rename and organize
 * commands, plus the undo flow both of them expose through --undo
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import chalk from 'chalk';
import ora, { type Ora } from 'ora';
import inquirer from 'inquirer';
import {
  applyPlan,
  BatchError,
  countUndoOutcomes,
  createLogPath,
  CsvLogWriter,
  declineOperations,
  describeError,
  hasFailures,
  nodeFileOps,
  renderPlan,
  summarizePlan,
  TargetDirectoryError,
  undoFromLog,
  DEFAULT_MAX_SUFFIX,
  type ApplyOutcome,
  type FileOps,
  type LogSchema,
  type Plan,
  type UndoReport,
} from '../batch/index.js';
import { recordRun, type RunCommand, type RunEntry } from './history.js';

export const EXIT_OK = 0;
export const EXIT_ITEM_FAILURES = 1;
export const EXIT_ENVIRONMENT = 2;

export interface BatchRunOptions {
  command: Exclude<RunCommand, 'undo'>;
  schema: LogSchema;
  /** Explicit log file, otherwise a fresh `<logDir>/<logPrefix>-<stamp>.csv` */
  logPath?: string;
  logDir: string;
  logPrefix: string;
  apply: boolean;
  yes?: boolean;
  interactive?: boolean;
  json?: boolean;
  maxPreview: number;
  showKeys?: boolean;
  groupLabel?: string;
  /** Groups the preview always lists, zero counts included */
  groupOrder?: readonly string[];
  /** Preview the target folders an apply would create */
  showNewFolders?: boolean;
  fileOps?: FileOps;
  now?: () => Date;
}

export interface UndoRunOptions {
  apply?: boolean;
  json?: boolean;
  fileOps?: FileOps;
  now?: () => Date;
}

/**
 * Absolute path of the directory to work on
 *
 * @throws TargetDirectoryError when it is missing or not a directory
 */
export function resolveTargetDir(target: string): string {
  const root = path.resolve(target);
  if (!fs.existsSync(root) || !fs.statSync(root).isDirectory()) {
    throw new TargetDirectoryError(root);
  }
  return root;
}

/** Message for invalid flag combinations, if any */
export function modeConflict(options: { dryRun?: boolean; apply?: boolean }): string | undefined {
  return options.dryRun && options.apply ? '--dry-run and --apply cannot be combined.' : undefined;
}

function startSpinner(json: boolean | undefined, text: string): Ora | null {
  return json ? null : ora(text).start();
}

/** Print an environment-level failure and return its exit code */
export function reportFatal(error: unknown, spinner?: Ora | null): number {
  if (spinner?.isSpinning) {
    spinner.fail();
  }
  const label = error instanceof BatchError ? 'Error' : 'Unexpected error';
  console.error(chalk.red(`\n${label}: ${describeError(error)}\n`));
  return EXIT_ENVIRONMENT;
}

/** Record a finished run. History errors only warn. */
function saveHistory(entry: RunEntry): void {
  try {
    recordRun(entry);
  } catch (error) {
    console.warn(chalk.yellow(`\nWarning: run not recorded in history: ${describeError(error)}`));
  }
}

function openRunLog(options: BatchRunOptions, now: () => Date): CsvLogWriter {
  const logPath = options.logPath ? path.resolve(options.logPath) : createLogPath(options.logDir, options.logPrefix, now());
  return CsvLogWriter.open(logPath, options.schema);
}

function colorPreviewLine(line: string): string {
  if (line.startsWith('[FAILED]')) return chalk.red(line);
  if (line.startsWith('[SKIP]')) return chalk.yellow(line);
  if (line.startsWith('...')) return chalk.gray(line);
  if (line.includes(' -> ')) return chalk.white(line);
  return chalk.gray(line);
}

function displayPreview(plan: Plan, options: BatchRunOptions, fileOps: FileOps): void {
  console.log(chalk.cyan(`\nTarget directory: ${plan.root}`));
  console.log(chalk.white.bold('\nPreview (old -> new):\n'));
  for (const line of renderPlan(plan, {
    maxLines: options.maxPreview,
    showKeys: options.showKeys,
    groupLabel: options.groupLabel,
    groupOrder: options.groupOrder,
    dirExists: options.showNewFolders ? (dir) => fileOps.exists(dir) : undefined,
  })) {
    console.log(`  ${colorPreviewLine(line)}`);
  }
  console.log('');
}

async function interactiveApproval(plan: Plan): Promise<Set<string>> {
  const declined = new Set<string>();

  console.log(chalk.cyan('\n=== Interactive Approval ===\n'));
  console.log(chalk.gray('Review each move. Press Enter to approve, n to skip.\n'));

  for (const op of plan.operations) {
    if (op.status !== 'planned') continue;

    const { approve } = await inquirer.prompt<{ approve: boolean }>([
      {
        type: 'confirm',
        name: 'approve',
        message: `Move ${chalk.red(path.relative(plan.root, op.source))} → ${chalk.green(path.relative(plan.root, op.target))}?`,
        default: true,
      },
    ]);

    if (!approve) {
      declined.add(op.source);
    }
  }

  return declined;
}

function countOutcomes(outcomes: readonly ApplyOutcome[]): { applied: number; failed: number; skipped: number } {
  return {
    applied: outcomes.filter((o) => o.status === 'applied').length,
    failed: outcomes.filter((o) => o.status === 'failed').length,
    skipped: outcomes.filter((o) => o.status === 'skipped').length,
  };
}

function displayOutcomes(plan: Plan, outcomes: readonly ApplyOutcome[], logPath: string): void {
  const counts = countOutcomes(outcomes);

  console.log(chalk.green('\n=== Done ===\n'));
  console.log(chalk.gray(`  Applied:  ${chalk.green(counts.applied)}`));
  console.log(chalk.gray(`  Failed:   ${counts.failed > 0 ? chalk.red(counts.failed) : chalk.green(0)}`));
  console.log(chalk.gray(`  Skipped:  ${chalk.yellow(counts.skipped)}`));

  const failures = outcomes.filter((o) => o.status === 'failed');
  if (failures.length > 0) {
    console.log(chalk.red('\nFailures:'));
    for (const failure of failures) {
      console.log(chalk.red(`  ✗ ${path.relative(plan.root, failure.operation.source)}: ${failure.error ?? 'unknown error'}`));
    }
  }

  console.log(chalk.gray(`\nLog saved to: ${logPath}`));
  console.log(chalk.gray(`To undo: rerun with --undo "${logPath}" --apply\n`));
}

/**
 * Preview a plan and, in apply mode, confirm and execute it with a log.
 * Returns the process exit code.
 */
export async function runBatch(plan: Plan, options: BatchRunOptions): Promise<number> {
  const fileOps = options.fileOps ?? nodeFileOps;
  const now = options.now ?? (() => new Date());
  const summary = summarizePlan(plan);

  if (options.json && !options.apply) {
    console.log(JSON.stringify({ mode: 'dry-run', plan, summary }, null, 2));
    return EXIT_OK;
  }

  if (plan.operations.length === 0) {
    // An applied run always leaves a log, even a header-only one
    const writer = options.apply ? openRunLog(options, now) : undefined;
    if (writer) {
      saveHistory({
        command: options.command,
        root: plan.root,
        logPath: writer.filePath,
        date: now().toISOString(),
        applied: 0,
        failed: 0,
        skipped: 0,
      });
    }

    if (options.json) {
      console.log(JSON.stringify({ mode: 'apply', logPath: writer?.filePath, plan, summary, outcomes: [] }, null, 2));
    } else {
      console.log(chalk.yellow('\nNothing to do.'));
      if (summary.unchanged > 0) {
        console.log(chalk.gray(`${summary.unchanged} file(s) already have their target name.`));
      }
      if (writer) {
        console.log(chalk.gray(`Log saved to: ${writer.filePath}`));
      }
      console.log('');
    }
    return EXIT_OK;
  }

  if (!options.json) {
    displayPreview(plan, options, fileOps);
  }

  if (!options.apply) {
    console.log(chalk.gray('Dry run - no changes made. Re-run with --apply to execute.\n'));
    return EXIT_OK;
  }

  let toApply = plan;
  if (options.interactive && !options.yes && !options.json) {
    toApply = declineOperations(plan, await interactiveApproval(plan));
  } else if (!options.yes && !options.json) {
    const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
      {
        type: 'confirm',
        name: 'confirm',
        message: `Apply ${chalk.cyan(summary.planned)} ${options.command === 'rename' ? 'renames' : 'moves'}?`,
        default: true,
      },
    ]);

    if (!confirm) {
      console.log(chalk.gray('\nCancelled. No changes made.\n'));
      return EXIT_OK;
    }
  }

  const writer = openRunLog(options, now);
  const logPath = writer.filePath;

  const spinner = startSpinner(options.json, 'Applying changes...');
  let outcomes: ApplyOutcome[];
  try {
    outcomes = applyPlan(toApply, { fileOps, maxSuffix: DEFAULT_MAX_SUFFIX }, (outcome) => {
      writer.writeOutcome(outcome);
      if (spinner) {
        spinner.text = `Applying changes... (${writer.rowCount}/${toApply.operations.length})`;
      }
    });
  } catch (error) {
    const code = reportFatal(error, spinner);
    console.error(chalk.yellow(`Stopped after ${writer.rowCount} item(s); moves so far are logged in ${logPath}\n`));
    return code;
  }

  const counts = countOutcomes(outcomes);
  if (counts.failed > 0) {
    spinner?.warn(`Applied with ${counts.failed} failure(s)`);
  } else {
    spinner?.succeed('All changes applied');
  }

  saveHistory({
    command: options.command,
    root: plan.root,
    logPath,
    date: now().toISOString(),
    ...counts,
  });

  if (options.json) {
    console.log(JSON.stringify({ mode: 'apply', logPath, summary: counts, outcomes }, null, 2));
  } else {
    displayOutcomes(toApply, outcomes, logPath);
  }

  return hasFailures(outcomes) ? EXIT_ITEM_FAILURES : EXIT_OK;
}

function displayUndo(report: UndoReport): void {
  const verb = report.applied ? 'UNDO' : 'WOULD UNDO';

  console.log(chalk.cyan(`\nUndo from log: ${report.logPath}\n`));
  for (const outcome of report.outcomes) {
    const { record } = outcome;
    switch (outcome.status) {
      case 'restored':
        console.log(chalk.green(`  [${verb}] ${record.newPath} -> ${record.oldPath}`));
        break;
      case 'missing':
        console.log(chalk.yellow(`  [MISSING] ${outcome.message ?? record.newPath}`));
        break;
      case 'failed':
        console.log(chalk.red(`  [FAILED] ${outcome.message ?? record.oldPath}`));
        break;
      case 'skipped':
        console.log(chalk.gray(`  [SKIP] ${record.oldPath}: ${outcome.message ?? ''}`));
        break;
    }
  }

  for (const row of report.invalid) {
    console.log(chalk.yellow(`  [INVALID] ${row.message}`));
  }

  const counts = countUndoOutcomes(report);
  console.log('');
  console.log(chalk.gray(`  Restored: ${counts.restored}  Missing: ${counts.missing}  Failed: ${counts.failed}  Skipped: ${counts.skipped}  Invalid rows: ${report.invalid.length}`));

  if (report.undoLogPath) {
    console.log(chalk.gray(`\nUndo log saved to: ${report.undoLogPath}\n`));
  } else {
    console.log(chalk.gray('\nDry run - nothing restored. Re-run with --apply to undo.\n'));
  }
}

/**
 * Undo a previous run from its log. Returns the process exit code.
 */
export async function runUndo(logPath: string, options: UndoRunOptions = {}): Promise<number> {
  const fileOps = options.fileOps ?? nodeFileOps;
  const now = options.now ?? (() => new Date());
  const spinner = startSpinner(options.json, options.apply ? 'Undoing...' : 'Checking undo...');

  let report: UndoReport;
  try {
    report = undoFromLog(path.resolve(logPath), { apply: options.apply === true, fileOps, now });
  } catch (error) {
    return reportFatal(error, spinner);
  }
  spinner?.stop();

  const counts = countUndoOutcomes(report);
  if (report.applied && report.undoLogPath) {
    saveHistory({
      command: 'undo',
      root: path.dirname(report.logPath),
      logPath: report.undoLogPath,
      date: now().toISOString(),
      applied: counts.restored,
      failed: counts.failed,
      skipped: counts.skipped + counts.missing,
    });
  }

  if (options.json) {
    console.log(JSON.stringify({ ...report, summary: counts }, null, 2));
  } else {
    displayUndo(report);
  }

  return counts.failed > 0 ? EXIT_ITEM_FAILURES : EXIT_OK;
}
