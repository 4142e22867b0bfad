import { readFileSync } from 'node:fs';
import { extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { hasErrorDiagnostics, type Diagnostic } from './diagnostics.js';
import { LevelDocumentSchema } from './schemas.js';
import type { LevelDef } from './types.js';
import { validateLevelConfig } from './validate-level.js';

export const LEVEL_FILE_EXTENSIONS: readonly string[] = ['.json', '.yaml', '.yml'];

export interface LoadLevelResult {
  readonly level: LevelDef | null;
  readonly diagnostics: readonly Diagnostic[];
}

export interface ValidateLevelDocumentOptions {
  readonly assetPath?: string;
}

export function loadLevelFromFile(assetPath: string): LoadLevelResult {
  const fileResult = readLevelFile(assetPath);
  if (fileResult.diagnostic !== undefined) {
    return {
      level: null,
      diagnostics: [fileResult.diagnostic],
    };
  }
  return validateLevelDocument(fileResult.value, { assetPath });
}

/**
 * Structural check through the level document schema, then the semantic level
 * checks. Warnings are returned alongside an accepted level.
 */
export function validateLevelDocument(value: unknown, options: ValidateLevelDocumentOptions = {}): LoadLevelResult {
  const { assetPath } = options;
  const documentResult = LevelDocumentSchema.safeParse(value);
  if (!documentResult.success) {
    const entityId = readLevelId(value);
    return {
      level: null,
      diagnostics: documentResult.error.issues.map((issue) => ({
        code: 'LEVEL_SCHEMA_INVALID',
        path: issue.path.length > 0 ? `document.${issue.path.join('.')}` : 'document',
        severity: 'error',
        message: issue.message,
        ...(assetPath === undefined ? {} : { assetPath }),
        ...(entityId === undefined ? {} : { entityId }),
      })),
    };
  }

  const { metadata, level: config } = documentResult.data;
  const diagnostics = validateLevelConfig(config, {
    pathPrefix: 'document.level',
    entityId: metadata.id,
    ...(assetPath === undefined ? {} : { assetPath }),
  });
  if (hasErrorDiagnostics(diagnostics)) {
    return { level: null, diagnostics };
  }

  return {
    level: { metadata, config },
    diagnostics,
  };
}

function readLevelFile(assetPath: string): { readonly value: unknown; readonly diagnostic?: Diagnostic } {
  const extension = extname(assetPath).toLowerCase();
  if (!LEVEL_FILE_EXTENSIONS.includes(extension)) {
    return {
      value: null,
      diagnostic: {
        code: 'LEVEL_FILE_FORMAT_UNSUPPORTED',
        path: 'document.file',
        severity: 'error',
        message: `Unsupported level file format "${extension || '(none)'}".`,
        suggestion: 'Use .json, .yaml, or .yml level files.',
        assetPath,
      },
    };
  }

  try {
    const source = readFileSync(assetPath, 'utf8');
    const value: unknown = extension === '.json' ? JSON.parse(source) : parseYaml(source);
    return { value };
  } catch (error) {
    return {
      value: null,
      diagnostic: {
        code: 'LEVEL_FILE_PARSE_ERROR',
        path: 'document.file',
        severity: 'error',
        message: `Failed to read level file: ${formatError(error)}.`,
        suggestion: 'Fix file syntax and try loading again.',
        assetPath,
      },
    };
  }
}

const isRecord = (value: unknown): value is Readonly<Record<string, unknown>> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function readLevelId(value: unknown): string | undefined {
  const metadata = isRecord(value) ? value.metadata : undefined;
  if (!isRecord(metadata)) {
    return undefined;
  }
  const { id } = metadata;
  return typeof id === 'string' && id.trim() !== '' ? id : undefined;
}

function formatError(error: unknown): string {
  if (error instanceof Error && error.message.trim() !== '') {
    return error.message;
  }
  return String(error);
}
