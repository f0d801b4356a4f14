import * as fs from 'node:fs';
import * as path from 'node:path';
import { DEFAULT_IMAGE_EXTENSIONS, TIME_SOURCES, TIMESTAMP_FORMATS, type TimeSource, type TimestampFormat } from './metadata.js';
import { RESULT_DIR_NAME } from './categories.js';

export type UnclassifiedPolicy = 'move' | 'report';
const UNCLASSIFIED_POLICIES: readonly UnclassifiedPolicy[] = ['move', 'report'];

export interface FiletidyConfig {
  // Extensions the rename command picks up (default: common images)
  extensions?: string[];

  // Where rename timestamps come from
  timeSource?: TimeSource;

  // datetime-ms or epoch-ms
  format?: TimestampFormat;

  // Organize output folder name
  resultDirName?: string;

  // Move unclassified files to the fallback category, or only report them
  unclassified?: UnclassifiedPolicy;

  // Keep sub-folder structure under each category
  keepStructure?: boolean;

  // Scan sub-folders
  recursive?: boolean;

  // Preview lines before collapsing
  maxPreview?: number;

  // Organize: also move iWork documents (.pages, .numbers, .key folders)
  includePackages?: boolean;

  // Organize: also move .app bundles
  includeApp?: boolean;
}

export interface ResolvedConfig {
  extensions: string[];
  timeSource: TimeSource;
  format: TimestampFormat;
  resultDirName: string;
  unclassified: UnclassifiedPolicy;
  keepStructure: boolean;
  recursive: boolean;
  maxPreview: number;
  includePackages: boolean;
  includeApp: boolean;
}

/** Looked up in this order; the first one that parses wins */
const CONFIG_FILES = ['.filetidyrc', '.filetidyrc.json', 'filetidy.config.json'];
const PACKAGE_SECTION = 'filetidy';

type JsonRead = { ok: true; value: unknown } | { ok: false; error: unknown };

function readJsonFile(filePath: string): JsonRead {
  try {
    return { ok: true, value: JSON.parse(fs.readFileSync(filePath, 'utf-8')) };
  } catch (error) {
    return { ok: false, error };
  }
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isOneOf<T extends string>(value: unknown, allowed: readonly T[]): value is T {
  return allowed.some((candidate) => candidate === value);
}

/** Keeps the known keys whose values have the right type */
function toConfig(raw: Record<string, unknown>): FiletidyConfig {
  const config: FiletidyConfig = {};
  const { extensions, timeSource, format, resultDirName, unclassified, maxPreview } = raw;

  if (Array.isArray(extensions)) {
    config.extensions = extensions.filter((ext): ext is string => typeof ext === 'string');
  }
  if (isOneOf(timeSource, TIME_SOURCES)) config.timeSource = timeSource;
  if (isOneOf(format, TIMESTAMP_FORMATS)) config.format = format;
  if (typeof resultDirName === 'string') config.resultDirName = resultDirName;
  if (isOneOf(unclassified, UNCLASSIFIED_POLICIES)) config.unclassified = unclassified;
  if (typeof maxPreview === 'number') config.maxPreview = maxPreview;

  for (const flag of ['keepStructure', 'recursive', 'includePackages', 'includeApp'] as const) {
    const value = raw[flag];
    if (typeof value === 'boolean') config[flag] = value;
  }
  return config;
}

/** Settings in a folder's package.json under `filetidy`, if any */
function packageSection(rootDir: string): FiletidyConfig | undefined {
  const pkgPath = path.join(rootDir, 'package.json');
  if (!fs.existsSync(pkgPath)) return undefined;

  // package.json belongs to another tool; a broken one is not reported here
  const read = readJsonFile(pkgPath);
  if (!read.ok || !isObject(read.value)) return undefined;

  const section = read.value[PACKAGE_SECTION];
  return isObject(section) ? toConfig(section) : undefined;
}

/** Project settings for the target folder, from the first config file found */
export function loadProjectConfig(rootDir: string): FiletidyConfig {
  for (const configFile of CONFIG_FILES) {
    const configPath = path.join(rootDir, configFile);
    if (!fs.existsSync(configPath)) continue;

    const read = readJsonFile(configPath);
    if (!read.ok) {
      console.warn(`Warning: Failed to parse ${configFile}: ${read.error}`);
      continue;
    }
    if (isObject(read.value)) {
      return toConfig(read.value);
    }
    console.warn(`Warning: ${configFile} does not hold a JSON object, ignoring it`);
  }

  return packageSection(rootDir) ?? {};
}

function oneOf<T extends string>(value: unknown, allowed: readonly T[], fallback: T): T {
  return isOneOf(value, allowed) ? value : fallback;
}

export function mergeWithDefaults(config: FiletidyConfig): ResolvedConfig {
  const maxPreview = config.maxPreview;
  return {
    extensions: config.extensions && config.extensions.length > 0 ? config.extensions : DEFAULT_IMAGE_EXTENSIONS,
    timeSource: oneOf(config.timeSource, TIME_SOURCES, 'auto'),
    format: oneOf(config.format, TIMESTAMP_FORMATS, 'datetime-ms'),
    resultDirName: config.resultDirName || RESULT_DIR_NAME,
    unclassified: oneOf(config.unclassified, UNCLASSIFIED_POLICIES, 'move'),
    keepStructure: config.keepStructure === true,
    recursive: config.recursive === true,
    maxPreview: typeof maxPreview === 'number' && maxPreview > 0 ? maxPreview : 80,
    includePackages: config.includePackages === true,
    includeApp: config.includeApp === true,
  };
}
