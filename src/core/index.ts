// Core exports
export { loadProjectConfig, mergeWithDefaults } from './config.js';
export type { FiletidyConfig, ResolvedConfig, UnclassifiedPolicy } from './config.js';
export {
  scanFiles,
  toSourceFile,
  excludeSubtree,
  extensionAllowList,
  allOf,
} from './scanner.js';
export type { FilePredicate, ScanOptions } from './scanner.js';
export {
  TIME_SOURCES,
  TIMESTAMP_FORMATS,
  DEFAULT_IMAGE_EXTENSIONS,
  parseMdlsDate,
  dateAddedResolver,
  birthTimeResolver,
  mtimeResolver,
  resolverChain,
  resolveTimestamp,
  formatTimestampKey,
  createTimestampKeyProvider,
  renameTarget,
} from './metadata.js';
export type {
  TimeSource,
  TimestampFormat,
  MetadataSource,
  TimestampResolver,
  ResolverResult,
  TimestampResult,
} from './metadata.js';
export {
  RESULT_DIR_NAME,
  LOG_DIR_NAME,
  IWORK_PACKAGE_EXTENSIONS,
  APP_BUNDLE_EXTENSION,
  loadCategoryTable,
  parseCategoryTable,
  classifyFile,
  createCategoryKeyProvider,
  categoryTarget,
} from './categories.js';
export type { CategoryTable } from './categories.js';
