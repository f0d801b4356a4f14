export { renameCommand, RENAME_LOG_PREFIX } from './rename.js';
export type { RenameCommandOptions } from './rename.js';
export { organizeCommand, ORGANIZE_LOG_PREFIX } from './organize.js';
export type { OrganizeCommandOptions } from './organize.js';
export { logsCommand, recordRun, listRuns, clearRuns } from './history.js';
export type { RunEntry, RunCommand, HistoryStore } from './history.js';
export {
  runBatch,
  runUndo,
  resolveTargetDir,
  EXIT_OK,
  EXIT_ITEM_FAILURES,
  EXIT_ENVIRONMENT,
} from './batch-runner.js';
