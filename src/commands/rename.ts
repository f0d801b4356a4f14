/**
 * rename command - Rename images to `<folder>_<timestamp>.<ext>`
 *
 * Timestamps come from Finder's "Date Added", falling back to birth time and
 * then modification time. Dry-run unless --apply; every apply writes a CSV log
 * that --undo can replay.
 */

import chalk from 'chalk';
import ora from 'ora';
import { buildPlan, nodeFileOps, DEFAULT_MAX_SUFFIX, type FileOps } from '../batch/index.js';
import {
  createTimestampKeyProvider,
  extensionAllowList,
  loadProjectConfig,
  mergeWithDefaults,
  renameTarget,
  resolverChain,
  scanFiles,
  type TimeSource,
  type TimestampFormat,
  type TimestampResolver,
} from '../core/index.js';
import {
  EXIT_ENVIRONMENT,
  EXIT_OK,
  modeConflict,
  reportFatal,
  resolveTargetDir,
  runBatch,
  runUndo,
} from './batch-runner.js';

export interface RenameCommandOptions {
  path?: string;
  dryRun?: boolean;
  apply?: boolean;
  recursive?: boolean;
  ext?: string[];
  timeSource?: TimeSource;
  format?: TimestampFormat;
  log?: string;
  maxPreview?: number;
  undo?: string;
  yes?: boolean;
  interactive?: boolean;
  json?: boolean;
  /** Test seams */
  fileOps?: FileOps;
  resolvers?: TimestampResolver[];
  now?: () => Date;
}

export const RENAME_LOG_PREFIX = 'rename-log';

async function runRename(options: RenameCommandOptions): Promise<number> {
  const conflict = modeConflict(options);
  if (conflict) {
    console.error(chalk.red(`\nError: ${conflict}\n`));
    return EXIT_ENVIRONMENT;
  }

  if (options.undo) {
    return runUndo(options.undo, options);
  }

  if (!options.path) {
    console.error(chalk.red('\nError: --path is required unless --undo is given.\n'));
    return EXIT_ENVIRONMENT;
  }

  const spinner = options.json ? null : ora('Scanning for images...').start();

  try {
    const root = resolveTargetDir(options.path);
    const config = mergeWithDefaults(loadProjectConfig(root));
    const extensions = options.ext && options.ext.length > 0 ? options.ext : config.extensions;
    const timeSource = options.timeSource ?? config.timeSource;
    const format = options.format ?? config.format;
    const fileOps = options.fileOps ?? nodeFileOps;

    const files = scanFiles(root, {
      recursive: options.recursive ?? config.recursive,
      filter: extensionAllowList(extensions),
    });

    const plan = buildPlan(
      files,
      createTimestampKeyProvider({ format, resolvers: options.resolvers ?? resolverChain(timeSource) }),
      renameTarget,
      { root, fileOps, maxSuffix: DEFAULT_MAX_SUFFIX, renameInPlace: true }
    );
    spinner?.succeed(`Found ${plan.operations.length + plan.unchanged.length} image(s)`);

    if (!options.json) {
      console.log(chalk.gray(`Time source: ${timeSource}; format: ${format}; recursive: ${options.recursive ?? config.recursive}`));
    }

    return await runBatch(plan, {
      command: 'rename',
      schema: 'rename',
      logPath: options.log,
      logDir: root,
      logPrefix: RENAME_LOG_PREFIX,
      apply: options.apply === true,
      yes: options.yes,
      interactive: options.interactive,
      json: options.json,
      maxPreview: options.maxPreview ?? config.maxPreview,
      showKeys: true,
      groupLabel: 'By time source',
      fileOps,
      now: options.now,
    });
  } catch (error) {
    return reportFatal(error, spinner);
  }
}

export async function renameCommand(options: RenameCommandOptions): Promise<void> {
  const code = await runRename(options);
  if (code !== EXIT_OK) {
    process.exit(code);
  }
}
