import chalk from 'chalk';
import Conf from 'conf';

export type RunCommand = 'rename' | 'organize' | 'undo';

export interface RunEntry {
  command: RunCommand;
  root: string;
  logPath: string;
  /** ISO timestamp */
  date: string;
  applied: number;
  failed: number;
  skipped: number;
}

interface HistoryData {
  runs: RunEntry[];
}

export type HistoryStore = Conf<HistoryData>;

const MAX_RUNS = 50;

let globalHistory: HistoryStore | undefined;

function defaultStore(): HistoryStore {
  globalHistory ??= new Conf<HistoryData>({
    projectName: 'filetidy',
    configName: 'history',
    defaults: { runs: [] },
  });
  return globalHistory;
}

export function recordRun(entry: RunEntry, store: HistoryStore = defaultStore()): void {
  const runs = [entry, ...store.get('runs')].slice(0, MAX_RUNS);
  store.set('runs', runs);
}

/** Most recent first */
export function listRuns(store: HistoryStore = defaultStore()): RunEntry[] {
  return store.get('runs');
}

export function clearRuns(store: HistoryStore = defaultStore()): void {
  store.set('runs', []);
}

interface LogsOptions {
  json?: boolean;
  clear?: boolean;
}

export async function logsCommand(options: LogsOptions = {}, store?: HistoryStore): Promise<void> {
  if (options.clear) {
    clearRuns(store);
    console.log(chalk.yellow('\nRun history cleared. Log files on disk were left in place.\n'));
    return;
  }

  const runs = listRuns(store);

  if (options.json) {
    console.log(JSON.stringify(runs, null, 2));
    return;
  }

  if (runs.length === 0) {
    console.log(chalk.gray('\nNo runs recorded yet.\n'));
    return;
  }

  console.log(chalk.cyan('\nRecent runs:\n'));
  for (const run of runs) {
    const failed = run.failed > 0 ? chalk.red(`${run.failed} failed`) : chalk.gray('0 failed');
    console.log(chalk.white(`  ${run.date}  ${run.command}  ${run.root}`));
    console.log(chalk.gray(`    ${run.applied} applied, `) + failed + chalk.gray(`, ${run.skipped} skipped`));
    console.log(chalk.gray(`    Log: ${run.logPath}`));
  }
  console.log('');
}
