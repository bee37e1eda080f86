import path from 'path';
import { fileURLToPath } from 'url';

import { loadConfigFromEnv } from '@filekit/configuration';
import {
  ErrorFactory,
  errnoCode,
  failure,
  runWithErrorContext,
  safe,
  success,
  toError,
} from '@filekit/errors';
import { LogLevel, LoggerFactory, type Logger } from '@filekit/logging';

import { nodeFileSystem, type FileSystemPrimitives } from './operations.js';
import {
  createAbsolutePath,
  FileOperationCode,
  type AbsolutePath,
  type EnhancedFileOptions,
  type FileOperationResult,
} from './types.js';

/**
 * Anything an EnhancedFile can be built from or moved to
 */
export type PathLike = string | URL | EnhancedFile;

const COMPONENT = 'EnhancedFile';

let defaultLogger: Logger | undefined;

/**
 * Logger used when none is passed in, configured from `FILEKIT_*` variables.
 * Invalid configuration falls back to WARN-level text on stderr and is
 * reported once through that logger.
 */
export function getDefaultLogger(): Logger {
  if (!defaultLogger) {
    const config = safe(() => loadConfigFromEnv());

    if (config.success) {
      defaultLogger = LoggerFactory.fromConfig(COMPONENT, {
        level: config.data.log_level,
        format: config.data.log_format,
        colors: config.data.log_colors,
      });
    } else {
      defaultLogger = LoggerFactory.createConsoleLogger(COMPONENT, LogLevel.WARN);
      defaultLogger.warn(`Using default logging settings: ${config.error.message}`);
    }
  }
  return defaultLogger;
}

/**
 * Drop the cached default logger so the next diagnostic re-reads the environment
 */
export function resetDefaultLogger(): void {
  defaultLogger = undefined;
}

function isPathLike(value: unknown): value is PathLike {
  return typeof value === 'string' || value instanceof URL || value instanceof EnhancedFile;
}

function inheritedOptions(value: PathLike): EnhancedFileOptions {
  return value instanceof EnhancedFile ? value.dependencies() : {};
}

function toPathString(value: PathLike): string {
  if (value instanceof EnhancedFile) {
    return value.path;
  }
  if (value instanceof URL) {
    if (value.protocol !== 'file:') {
      throw ErrorFactory.validation(`Not a file URL: ${value.href}`, {
        code: FileOperationCode.INVALID_NAME,
      });
    }
    return fileURLToPath(value);
  }
  return value;
}

/**
 * An absolute filesystem path with validated delete, move and rename.
 *
 * The value itself is immutable: operations act on the filesystem and return
 * new instances where a path changes. Soft failures (delete, rename) return
 * `false` and log a diagnostic; the `try*` variants return the failure instead.
 * Hard failures (move) throw.
 *
 * Nothing here is coordinated with other processes. `rename` checks for an
 * existing target and then renames, which can race.
 */
export class EnhancedFile {
  readonly path: AbsolutePath;
  private readonly fs: FileSystemPrimitives;
  private readonly logger: Logger | undefined;

  /** The current working directory */
  constructor(options?: EnhancedFileOptions);
  /** A path string, `file:` URL or another EnhancedFile, resolved to absolute */
  constructor(target: PathLike, options?: EnhancedFileOptions);
  /** `<parent>/<child>`, resolved to absolute */
  constructor(parent: PathLike, child: string, options?: EnhancedFileOptions);
  constructor(
    first?: PathLike | EnhancedFileOptions,
    second?: string | EnhancedFileOptions,
    third?: EnhancedFileOptions
  ) {
    let composed = '';
    let options: EnhancedFileOptions = {};

    if (isPathLike(first)) {
      composed = toPathString(first);
      if (typeof second === 'string') {
        // Always '/': Node's resolve accepts it on every platform
        composed = `${composed}/${second}`;
        options = third ?? inheritedOptions(first);
      } else {
        options = second ?? inheritedOptions(first);
      }
    } else {
      options = first ?? {};
    }

    this.path = createAbsolutePath(composed);
    this.fs = options.fs ?? nodeFileSystem;
    this.logger = options.logger;
  }

  /** Final path segment */
  get name(): string {
    return path.basename(this.path);
  }

  /** Absolute path of the containing directory */
  get parent(): AbsolutePath {
    return createAbsolutePath(path.dirname(this.path));
  }

  exists(): boolean {
    return this.fs.exists(this.path);
  }

  isDirectory(): boolean {
    return this.fs.isDirectory(this.path);
  }

  isFile(): boolean {
    return this.fs.isFile(this.path);
  }

  equals(other: PathLike): boolean {
    return this.path === createAbsolutePath(toPathString(other));
  }

  /**
   * Remove the entry (a file, or an empty directory). Returns `false` and logs
   * `<path> was not deleted.` when that fails; never throws.
   */
  delete(): boolean {
    const result = this.tryDelete();
    if (!result.success) {
      this.getLogger().error(result.error.message, result.error.metadata.cause, {
        path: this.path,
        errno: result.error.metadata.data?.['errno'],
      });
    }
    return result.success;
  }

  tryDelete(): FileOperationResult {
    return runWithErrorContext(
      (): FileOperationResult => {
        try {
          this.fs.remove(this.path);
          return success(undefined);
        } catch (error) {
          return failure(
            ErrorFactory.filesystem(`${this.path} was not deleted.`, {
              code: FileOperationCode.DELETE_FAILED,
              cause: toError(error),
              data: { path: this.path, errno: errnoCode(error) },
            })
          );
        }
      },
      { operation: 'delete', component: COMPONENT, metadata: { path: this.path } }
    );
  }

  /**
   * Move the entry into `destination`, keeping its name.
   *
   * @throws FileNotFoundError when `destination` does not exist
   * @throws FileSystemError (`IO_ERROR`) when it is not a directory, or when the
   * atomic rename fails, e.g. across volumes
   */
  moveTo(destination: PathLike): boolean {
    this.movedTo(destination);
    return true;
  }

  /**
   * Same as {@link moveTo}, returning the entry's new location
   */
  movedTo(destination: PathLike): EnhancedFile {
    const folder = new EnhancedFile(destination, this.dependencies());

    return runWithErrorContext(
      () => {
        if (!this.fs.exists(folder.path)) {
          throw ErrorFactory.notFound(`${folder.path} does not exist.`, {
            data: { path: folder.path },
          });
        }
        if (!this.fs.isDirectory(folder.path)) {
          throw ErrorFactory.filesystem(`Can't move ${this.path}`, {
            code: FileOperationCode.IO_ERROR,
            data: { source: this.path, destination: folder.path },
          });
        }

        const target = new EnhancedFile(folder, this.name, this.dependencies());
        try {
          this.fs.rename(this.path, target.path);
        } catch (error) {
          throw ErrorFactory.filesystem(`Can't move ${this.path} to ${folder.path}`, {
            code: FileOperationCode.IO_ERROR,
            cause: toError(error),
            data: { source: this.path, destination: folder.path, errno: errnoCode(error) },
          });
        }

        return target;
      },
      { operation: 'move', component: COMPONENT, metadata: { path: this.path } }
    );
  }

  /**
   * Rename the entry within its parent directory. Blank names are refused
   * silently; an existing target is refused with `<target> already exist.`
   */
  rename(newName: string | null | undefined): boolean {
    const result = this.tryRename(newName);
    if (!result.success) {
      const { error } = result;
      if (error.code === FileOperationCode.ALREADY_EXISTS) {
        this.getLogger().warn(error.message);
      } else if (error.code !== FileOperationCode.INVALID_NAME) {
        this.getLogger().error(error.message, error.metadata.cause);
      }
    }
    return result.success;
  }

  tryRename(newName: string | null | undefined): FileOperationResult<EnhancedFile> {
    if (newName === null || newName === undefined || newName.trim().length === 0) {
      return failure(
        ErrorFactory.validation('New name must not be blank', {
          code: FileOperationCode.INVALID_NAME,
        })
      );
    }

    const candidate = new EnhancedFile(this.parent, newName, this.dependencies());

    return runWithErrorContext(
      (): FileOperationResult<EnhancedFile> => {
        if (this.fs.exists(candidate.path)) {
          return failure(
            ErrorFactory.filesystem(`${candidate.path} already exist.`, {
              code: FileOperationCode.ALREADY_EXISTS,
              data: { path: candidate.path },
            })
          );
        }

        try {
          this.fs.rename(this.path, candidate.path);
          return success(candidate);
        } catch (error) {
          return failure(
            ErrorFactory.filesystem(`${this.path} was not renamed to ${candidate.path}.`, {
              code: FileOperationCode.RENAME_FAILED,
              cause: toError(error),
              data: { path: this.path, target: candidate.path, errno: errnoCode(error) },
            })
          );
        }
      },
      { operation: 'rename', component: COMPONENT, metadata: { path: this.path } }
    );
  }

  toString(): string {
    return this.path;
  }

  toJSON(): string {
    return this.path;
  }

  /** The fs and logger this value was built with, handed on to derived values */
  dependencies(): EnhancedFileOptions {
    return this.logger ? { fs: this.fs, logger: this.logger } : { fs: this.fs };
  }

  private getLogger(): Logger {
    return this.logger ?? getDefaultLogger();
  }
}
