/**
 * File utilities module - a path value with validated delete, move and rename
 *
 * Features:
 * - Absolute path values built from strings, parent/child pairs, URLs and other values
 * - Soft-failing delete and rename with diagnostics, or Result values via try* variants
 * - Atomic move into a directory, throwing typed filesystem errors
 * - Narrow, swappable filesystem primitives
 */

export {
  EnhancedFile,
  getDefaultLogger,
  resetDefaultLogger,
  type PathLike,
} from './enhanced-file.js';

export { nodeFileSystem, type FileSystemPrimitives } from './operations.js';

export {
  FileOperationCode,
  isAbsolutePath,
  createAbsolutePath,
  type AbsolutePath,
  type Branded,
  type EnhancedFileOptions,
  type FileOperationResult,
} from './types.js';
