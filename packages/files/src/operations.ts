import { existsSync, lstatSync, renameSync, rmdirSync, statSync, unlinkSync } from 'fs';

/**
 * Blocking filesystem primitives EnhancedFile is built on. Checks never throw;
 * mutations throw the underlying fs error.
 */
export interface FileSystemPrimitives {
  exists(filePath: string): boolean;
  isDirectory(filePath: string): boolean;
  isFile(filePath: string): boolean;
  /** Unlink a file or remove an empty directory */
  remove(filePath: string): void;
  /** Atomic rename(2); fails across volumes with EXDEV */
  rename(from: string, to: string): void;
}

export const nodeFileSystem: FileSystemPrimitives = {
  exists(filePath) {
    return existsSync(filePath);
  },

  isDirectory(filePath) {
    return statSync(filePath, { throwIfNoEntry: false })?.isDirectory() ?? false;
  },

  isFile(filePath) {
    return statSync(filePath, { throwIfNoEntry: false })?.isFile() ?? false;
  },

  remove(filePath) {
    // lstat so a symlink to a directory is unlinked, not its target removed
    if (lstatSync(filePath).isDirectory()) {
      rmdirSync(filePath);
    } else {
      unlinkSync(filePath);
    }
  },

  rename(from, to) {
    renameSync(from, to);
  },
};
