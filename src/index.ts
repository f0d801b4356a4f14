#!/usr/bin/env node

import { Command, InvalidArgumentError, Option } from 'commander';
import chalk from 'chalk';
import { renameCommand, organizeCommand, logsCommand } from './commands/index.js';
import { TIME_SOURCES, TIMESTAMP_FORMATS } from './core/index.js';

function positiveInt(value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

const program = new Command();

program
  .name('filetidy')
  .description(
    chalk.green('filetidy') +
      ' - Safe, reversible batch renaming and sorting\n' +
      chalk.gray('Preview first, apply with a log, undo from the log')
  )
  .version('1.0.0');

// =============================================================================
// BATCH COMMANDS
// =============================================================================

program
  .command('rename')
  .description('Rename images to <folder>_<timestamp> using Date Added / birth time / mtime')
  .option('-p, --path <dir>', 'Directory to rename images in')
  .option('--dry-run', 'Preview only (default)')
  .option('--apply', 'Actually rename files and write a log')
  .option('-r, --recursive', 'Include sub-folders')
  .option('--ext <extensions...>', 'Extensions to include (default: common images)')
  .addOption(new Option('--time-source <source>', 'Timestamp source preference').choices(TIME_SOURCES))
  .addOption(new Option('--format <format>', 'Timestamp format in file names').choices(TIMESTAMP_FORMATS))
  .option('--log <file>', 'CSV log path (default: in the target directory)')
  .option('--max-preview <n>', 'Max preview lines', positiveInt)
  .option('--undo <log>', 'Undo using a previous CSV log (with --apply to execute)')
  .option('--interactive', 'Approve each rename individually')
  .option('-y, --yes', 'Skip confirmation prompts')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    await renameCommand(options);
  });

program
  .command('organize')
  .description('Sort files into category folders (表格, 代码, 视频, 图片, ...) by extension')
  .option('-p, --path <dir>', 'Directory to organize')
  .option('--dry-run', 'Preview only (default)')
  .option('--apply', 'Actually move files and write a log')
  .option('-r, --recursive', 'Include sub-folders (the result folder is always skipped)')
  .option('--result-dir-name <name>', 'Result folder name (default: 分类结果)')
  .option('--keep-structure', 'Keep sub-folder structure under each category')
  .addOption(
    new Option('--unclassified <policy>', 'Move unclassified files to 其他, or only report them').choices([
      'move',
      'report',
    ])
  )
  .option('--include-packages', 'Also move iWork documents (.pages/.numbers/.key folders) as single items')
  .option('--include-app', 'Also move .app bundles (use with caution)')
  .option('--max-preview <n>', 'Max preview lines', positiveInt)
  .option('--undo <log>', 'Undo using a previous CSV log (with --apply to execute)')
  .option('--interactive', 'Approve each move individually')
  .option('-y, --yes', 'Skip confirmation prompts')
  .option('--json', 'Output as JSON')
  .action(async (options) => {
    await organizeCommand(options);
  });

program
  .command('logs')
  .description('List recent apply and undo runs with their log files')
  .option('--clear', 'Forget the run history (log files stay on disk)')
  .option('--json', 'Output as JSON')
  .action(async (options: { clear?: boolean; json?: boolean }) => {
    await logsCommand(options);
  });

// =============================================================================
// HELP TEXT
// =============================================================================

program.addHelpText(
  'after',
  `
${chalk.green.bold('Get Started:')}
  ${chalk.white('$')} filetidy rename --path ~/Pictures/trip        ${chalk.gray('# 1. Preview new names')}
  ${chalk.white('$')} filetidy rename --path ~/Pictures/trip --apply ${chalk.gray('# 2. Rename, writes a log')}
  ${chalk.white('$')} filetidy rename --undo <log.csv> --apply      ${chalk.gray('# 3. Changed your mind')}

${chalk.cyan('Sort a Folder:')}
  ${chalk.white('$')} filetidy organize --path ~/Downloads          ${chalk.gray('# Preview categories')}
  ${chalk.white('$')} filetidy organize --path ~/Downloads --apply  ${chalk.gray('# Move into 分类结果/')}
  ${chalk.white('$')} filetidy logs                                 ${chalk.gray('# Find a log to undo')}
`
);

// Handle unknown commands
program.on('command:*', () => {
  console.error(chalk.red(`\nUnknown command: ${program.args.join(' ')}`));
  console.log(chalk.gray(`Run ${chalk.white('filetidy --help')} for usage.\n`));
  process.exit(1);
});

await program.parseAsync();
