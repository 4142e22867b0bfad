import { readdirSync } from 'node:fs';
import { extname, join } from 'node:path';
import type { Diagnostic } from './diagnostics.js';
import { LEVEL_FILE_EXTENSIONS, loadLevelFromFile } from './level-assets.js';
import type { LevelDef } from './types.js';

const compareCodeUnits = (a: string, b: string): number => (a < b ? -1 : a > b ? 1 : 0);

export interface LevelCatalog {
  readonly levels: readonly LevelDef[];
  readonly sourcePaths: readonly string[];
  readonly diagnostics: readonly Diagnostic[];
}

/**
 * Loads every level document in `directory` (files read in lexicographic order)
 * and orders the accepted levels by `metadata.number`. Levels that fail to load,
 * or repeat an earlier id, are left out and reported.
 */
export function loadLevelCatalog(directory: string): LevelCatalog {
  let levelFiles: readonly string[];
  try {
    levelFiles = readdirSync(directory, { withFileTypes: true })
      .filter((entry) => entry.isFile() && LEVEL_FILE_EXTENSIONS.includes(extname(entry.name).toLowerCase()))
      .map((entry) => join(directory, entry.name))
      .sort(compareCodeUnits);
  } catch (error) {
    return {
      levels: [],
      sourcePaths: [],
      diagnostics: [
        {
          code: 'LEVEL_CATALOG_UNREADABLE',
          path: 'catalog',
          severity: 'error',
          message: `Cannot read level directory: ${error instanceof Error ? error.message : String(error)}.`,
          assetPath: directory,
        },
      ],
    };
  }

  if (levelFiles.length === 0) {
    return {
      levels: [],
      sourcePaths: [],
      diagnostics: [
        {
          code: 'LEVEL_CATALOG_EMPTY',
          path: 'catalog',
          severity: 'error',
          message: 'No level files found.',
          suggestion: 'Add .json, .yaml, or .yml level documents to the directory.',
          assetPath: directory,
        },
      ],
    };
  }

  const diagnostics: Diagnostic[] = [];
  const levels: LevelDef[] = [];
  const sourceById = new Map<string, string>();
  const sourceByNumber = new Map<number, string>();

  for (const filePath of levelFiles) {
    const result = loadLevelFromFile(filePath);
    diagnostics.push(...result.diagnostics);
    if (result.level === null) {
      continue;
    }

    const { metadata } = result.level;
    const firstWithId = sourceById.get(metadata.id);
    if (firstWithId !== undefined) {
      diagnostics.push({
        code: 'LEVEL_CATALOG_DUPLICATE_ID',
        path: 'document.metadata.id',
        severity: 'error',
        message: `Level id "${metadata.id}" is already used by ${firstWithId}.`,
        assetPath: filePath,
        entityId: metadata.id,
      });
      continue;
    }
    sourceById.set(metadata.id, filePath);

    const firstWithNumber = sourceByNumber.get(metadata.number);
    if (firstWithNumber === undefined) {
      sourceByNumber.set(metadata.number, filePath);
    } else {
      diagnostics.push({
        code: 'LEVEL_CATALOG_DUPLICATE_NUMBER',
        path: 'document.metadata.number',
        severity: 'warning',
        message: `Level number ${metadata.number} is also used by ${firstWithNumber}; file order decides.`,
        assetPath: filePath,
        entityId: metadata.id,
      });
    }
    levels.push(result.level);
  }

  return {
    levels: [...levels].sort((left, right) => left.metadata.number - right.metadata.number),
    sourcePaths: levelFiles,
    diagnostics,
  };
}
