import path from 'path';

import type { FileKitError, Result } from '@filekit/errors';
import type { Logger } from '@filekit/logging';

import type { FileSystemPrimitives } from './operations.js';

export type Branded<T, Brand extends string> = T & { readonly __brand: Brand };

export type AbsolutePath = Branded<string, 'AbsolutePath'>;

export function isAbsolutePath(value: string): value is AbsolutePath {
  return value.length > 0 && path.isAbsolute(value);
}

export function createAbsolutePath(value: string): AbsolutePath {
  const resolved = path.resolve(value);
  if (!isAbsolutePath(resolved)) {
    throw new Error(`Invalid absolute path: ${value}`);
  }
  return resolved;
}

/**
 * Dependencies an EnhancedFile delegates to
 */
export interface EnhancedFileOptions {
  /** Filesystem primitives, Node's `fs` unless overridden */
  fs?: FileSystemPrimitives;
  /** Receives diagnostics for soft failures */
  logger?: Logger;
}

/**
 * Outcome of a soft-failing operation. Failures carry the diagnostic as the
 * error message.
 */
export type FileOperationResult<T = void> = Result<T, FileKitError>;

/** Codes carried by soft failures */
export const FileOperationCode = {
  INVALID_NAME: 'INVALID_NAME',
  ALREADY_EXISTS: 'ALREADY_EXISTS',
  RENAME_FAILED: 'RENAME_FAILED',
  DELETE_FAILED: 'DELETE_FAILED',
  IO_ERROR: 'IO_ERROR',
} as const;
