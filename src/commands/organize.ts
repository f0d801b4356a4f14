/**
 * organize command - Sort a folder's files into category folders by extension
 *
 * Output goes to `<target>/分类结果/<category>/`; apply logs land in
 * `<target>/分类结果/_logs/`. The output folder is never rescanned.
 */

import * as path from 'node:path';
import chalk from 'chalk';
import ora from 'ora';
import { buildPlan, nodeFileOps, DEFAULT_MAX_SUFFIX, type FileOps, type SourceFile } from '../batch/index.js';
import {
  categoryTarget,
  classifyFile,
  createCategoryKeyProvider,
  loadCategoryTable,
  loadProjectConfig,
  mergeWithDefaults,
  scanFiles,
  APP_BUNDLE_EXTENSION,
  IWORK_PACKAGE_EXTENSIONS,
  LOG_DIR_NAME,
  type CategoryTable,
  type UnclassifiedPolicy,
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

export interface OrganizeCommandOptions {
  path?: string;
  dryRun?: boolean;
  apply?: boolean;
  recursive?: boolean;
  resultDirName?: string;
  keepStructure?: boolean;
  unclassified?: UnclassifiedPolicy;
  /** Move .pages/.numbers/.key document folders as single items */
  includePackages?: boolean;
  /** Move .app bundles as single items */
  includeApp?: boolean;
  maxPreview?: number;
  undo?: string;
  yes?: boolean;
  interactive?: boolean;
  json?: boolean;
  /** Test seams */
  fileOps?: FileOps;
  now?: () => Date;
}

export const ORGANIZE_LOG_PREFIX = 'sort-log';

function partition(files: Iterable<SourceFile>, table: CategoryTable): { classified: SourceFile[]; unclassified: SourceFile[] } {
  const classified: SourceFile[] = [];
  const unclassified: SourceFile[] = [];
  for (const file of files) {
    (classifyFile(file, table) ? classified : unclassified).push(file);
  }
  return { classified, unclassified };
}

function packageExtensions(includePackages: boolean, includeApp: boolean): string[] {
  return [...(includePackages ? IWORK_PACKAGE_EXTENSIONS : []), ...(includeApp ? [APP_BUNDLE_EXTENSION] : [])];
}

function displayUnclassified(root: string, files: SourceFile[], maxPreview: number): void {
  if (files.length === 0) return;

  console.log(chalk.yellow(`\nUnclassified (left in place): ${files.length}`));
  for (const file of files.slice(0, maxPreview)) {
    console.log(chalk.gray(`  ${path.relative(root, file.path)}`));
  }
  if (files.length > maxPreview) {
    console.log(chalk.gray(`  ... (${files.length - maxPreview} more)`));
  }
}

async function runOrganize(options: OrganizeCommandOptions): Promise<number> {
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

  const spinner = options.json ? null : ora('Scanning folder...').start();

  try {
    const root = resolveTargetDir(options.path);
    const config = mergeWithDefaults(loadProjectConfig(root));
    const resultDir = path.join(root, options.resultDirName ?? config.resultDirName);
    const recursive = options.recursive ?? config.recursive;
    const keepStructure = options.keepStructure ?? config.keepStructure;
    const unclassifiedPolicy = options.unclassified ?? config.unclassified;
    const maxPreview = options.maxPreview ?? config.maxPreview;
    const includePackages = options.includePackages ?? config.includePackages;
    const includeApp = options.includeApp ?? config.includeApp;
    const fileOps = options.fileOps ?? nodeFileOps;
    const table = loadCategoryTable();

    const files = scanFiles(root, {
      recursive,
      excludeDirs: [resultDir],
      packageExtensions: packageExtensions(includePackages, includeApp),
    });
    const { classified, unclassified } =
      unclassifiedPolicy === 'report' ? partition(files, table) : { classified: Array.from(files), unclassified: [] };

    const plan = buildPlan(classified, createCategoryKeyProvider(table), categoryTarget(resultDir, keepStructure), {
      root,
      fileOps,
      maxSuffix: DEFAULT_MAX_SUFFIX,
      renameInPlace: false,
    });
    spinner?.succeed(`Found ${classified.length + unclassified.length} file(s)`);

    if (!options.json) {
      console.log(chalk.gray(`Result dir: ${resultDir}`));
      console.log(
        chalk.gray(
          `Mode: ${recursive ? 'recursive' : 'non-recursive'}; ${keepStructure ? 'keep-structure' : 'flatten'}; unclassified: ${unclassifiedPolicy}`
        )
      );
      console.log(chalk.gray(`Include packages: ${includePackages}; include .app: ${includeApp}`));
      displayUnclassified(root, unclassified, maxPreview);
    }

    return await runBatch(plan, {
      command: 'organize',
      schema: 'organize',
      logDir: path.join(resultDir, LOG_DIR_NAME),
      logPrefix: ORGANIZE_LOG_PREFIX,
      apply: options.apply === true,
      yes: options.yes,
      interactive: options.interactive,
      json: options.json,
      maxPreview,
      groupLabel: 'By category',
      groupOrder: [...table.order, table.fallback],
      showNewFolders: true,
      fileOps,
      now: options.now,
    });
  } catch (error) {
    return reportFatal(error, spinner);
  }
}

export async function organizeCommand(options: OrganizeCommandOptions): Promise<void> {
  const code = await runOrganize(options);
  if (code !== EXIT_OK) {
    process.exit(code);
  }
}
