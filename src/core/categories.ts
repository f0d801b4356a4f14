/**
 * Extension → category lookup for the organize command
 */

import * as fs from 'node:fs';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';
import type { KeyProvider, SourceFile, TargetRule } from '../batch/types.js';

export const RESULT_DIR_NAME = '分类结果';
export const LOG_DIR_NAME = '_logs';

/** iWork documents are folders on disk; organize can move them as single items */
export const IWORK_PACKAGE_EXTENSIONS: readonly string[] = ['pages', 'numbers', 'key'];
export const APP_BUNDLE_EXTENSION = 'app';

const DEFAULT_TABLE_PATH = fileURLToPath(new URL('../../data/categories.json', import.meta.url));

export interface CategoryTable {
  /** Categories in display order, fallback excluded */
  order: string[];
  /** Category for files nothing else matches */
  fallback: string;
  byExtension: Map<string, string>;
  /** Category for extensionless build files such as Dockerfile */
  codeCategory: string;
  codeFileNames: Set<string>;
  codeFilePrefixes: string[];
}

function stringArray(value: unknown, field: string): string[] {
  if (!Array.isArray(value) || !value.every((item): item is string => typeof item === 'string')) {
    throw new Error(`Category table: "${field}" must be an array of strings`);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseCategoryTable(raw: unknown): CategoryTable {
  if (
    !isRecord(raw) ||
    !isRecord(raw.extensions) ||
    typeof raw.fallback !== 'string' ||
    typeof raw.codeCategory !== 'string'
  ) {
    throw new Error('Category table must have "extensions", "fallback" and "codeCategory"');
  }

  const order = stringArray(raw.order, 'order');
  const byExtension = new Map<string, string>();
  for (const category of order) {
    for (const ext of stringArray(raw.extensions[category] ?? [], `extensions.${category}`)) {
      // first category listed wins
      if (!byExtension.has(ext)) {
        byExtension.set(ext, category);
      }
    }
  }

  return {
    order,
    fallback: raw.fallback,
    byExtension,
    codeCategory: raw.codeCategory,
    codeFileNames: new Set(stringArray(raw.codeFileNames ?? [], 'codeFileNames')),
    codeFilePrefixes: stringArray(raw.codeFilePrefixes ?? [], 'codeFilePrefixes'),
  };
}

let defaultTable: CategoryTable | undefined;

export function loadCategoryTable(filePath?: string): CategoryTable {
  if (!filePath && defaultTable) return defaultTable;

  const table = parseCategoryTable(JSON.parse(fs.readFileSync(filePath ?? DEFAULT_TABLE_PATH, 'utf-8')));
  if (!filePath) {
    defaultTable = table;
  }
  return table;
}

/** Category of a file, or undefined when no rule matches */
export function classifyFile(file: SourceFile, table: CategoryTable): string | undefined {
  const lowerName = file.name.toLowerCase();
  if (table.codeFileNames.has(lowerName) || table.codeFilePrefixes.some((prefix) => lowerName.startsWith(prefix))) {
    return table.codeCategory;
  }

  if (!file.extension) return undefined;
  return table.byExtension.get(file.extension);
}

export function createCategoryKeyProvider(table: CategoryTable): KeyProvider {
  return (file) => {
    const category = classifyFile(file, table) ?? table.fallback;
    return { ok: true, key: category, source: category };
  };
}

/**
 * `<resultDir>/<category>/<name>`, or with `keepStructure` the file's
 * directory relative to the scan root is kept below the category
 */
export function categoryTarget(resultDir: string, keepStructure: boolean): TargetRule {
  return (file, category) =>
    keepStructure
      ? path.join(resultDir, category, file.relativeDir, file.name)
      : path.join(resultDir, category, file.name);
}
