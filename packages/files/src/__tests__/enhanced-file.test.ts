import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import path from 'path';
import { pathToFileURL } from 'url';

import { FileNotFoundError, FileSystemError, ValidationError } from '@filekit/errors';
import { LogLevel, LoggerFactory, type Logger, type MemoryTransport } from '@filekit/logging';
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import {
  EnhancedFile,
  FileOperationCode,
  isAbsolutePath,
  nodeFileSystem,
  resetDefaultLogger,
  type FileSystemPrimitives,
} from '../index.js';

function fsError(code: string): Error {
  return Object.assign(new Error(`${code}: operation failed`), { code });
}

describe('EnhancedFile', () => {
  let dir: string;
  let logger: Logger;
  let transport: MemoryTransport;

  const file = (name: string, content = name): string => {
    const filePath = path.join(dir, name);
    writeFileSync(filePath, content);
    return filePath;
  };

  beforeEach(() => {
    dir = mkdtempSync(path.join(tmpdir(), 'filekit-'));
    ({ logger, transport } = LoggerFactory.createMemoryLogger('EnhancedFile'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  describe('construction', () => {
    it('should resolve to the working directory without arguments', () => {
      expect(new EnhancedFile().path).toBe(process.cwd());
    });

    it('should resolve relative path strings', () => {
      const relative = new EnhancedFile('notes/todo.txt');

      expect(relative.path).toBe(path.resolve('notes/todo.txt'));
      expect(isAbsolutePath(relative.path)).toBe(true);
    });

    it('should join parent and child with a single separator', () => {
      expect(new EnhancedFile(dir, 'a.txt').path).toBe(path.join(dir, 'a.txt'));
      expect(new EnhancedFile(`${dir}/`, 'a.txt').path).toBe(path.join(dir, 'a.txt'));
      expect(new EnhancedFile('notes', 'todo.txt').path).toBe(path.resolve('notes', 'todo.txt'));
    });

    it('should accept another EnhancedFile as parent or copy source', () => {
      const parent = new EnhancedFile(dir);

      expect(new EnhancedFile(parent, 'a.txt').path).toBe(path.join(dir, 'a.txt'));
      expect(new EnhancedFile(parent).path).toBe(dir);
    });

    it('should hand fs and logger on to children of an EnhancedFile parent', () => {
      const parent = new EnhancedFile(dir, { logger });
      const child = new EnhancedFile(parent, 'nofile.txt');

      expect(child.dependencies().logger).toBe(logger);
      expect(child.delete()).toBe(false);
      expect(transport.getMessages(LogLevel.ERROR)).toEqual([
        `${path.join(dir, 'nofile.txt')} was not deleted.`,
      ]);
    });

    it('should prefer explicit options over inherited ones', () => {
      const parent = new EnhancedFile(dir, { logger });
      const other = LoggerFactory.createMemoryLogger('other');

      expect(new EnhancedFile(parent, 'a.txt', { logger: other.logger }).dependencies().logger).toBe(
        other.logger
      );
    });

    it('should accept file URLs', () => {
      const url = pathToFileURL(path.join(dir, 'a.txt'));

      expect(new EnhancedFile(url).path).toBe(path.join(dir, 'a.txt'));
    });

    it('should reject URLs of other schemes', () => {
      expect(() => new EnhancedFile(new URL('https://example.com/a.txt'))).toThrow(
        ValidationError
      );
    });

    it('should derive name, parent and string forms from the path', () => {
      const value = new EnhancedFile(dir, 'a.txt');

      expect(value.name).toBe('a.txt');
      expect(value.parent).toBe(dir);
      expect(value.toString()).toBe(path.join(dir, 'a.txt'));
      expect(`${value}`).toBe(path.join(dir, 'a.txt'));
      expect(JSON.stringify({ value })).toBe(JSON.stringify({ value: path.join(dir, 'a.txt') }));
    });

    it('should compare by path', () => {
      const value = new EnhancedFile(dir, 'a.txt');

      expect(value.equals(path.join(dir, 'a.txt'))).toBe(true);
      expect(value.equals(new EnhancedFile(dir, 'b.txt'))).toBe(false);
    });

    it('should report entry type', () => {
      const filePath = file('a.txt');

      expect(new EnhancedFile(filePath).isFile()).toBe(true);
      expect(new EnhancedFile(filePath).isDirectory()).toBe(false);
      expect(new EnhancedFile(dir).isDirectory()).toBe(true);
      expect(new EnhancedFile(dir, 'missing').exists()).toBe(false);
    });
  });

  describe('delete', () => {
    it('should return false and log a diagnostic for a missing path', () => {
      const missing = new EnhancedFile(dir, 'nofile.txt', { logger });

      expect(missing.delete()).toBe(false);

      const [entry] = transport.getEntries(LogLevel.ERROR);
      expect(entry?.message).toBe(`${path.join(dir, 'nofile.txt')} was not deleted.`);
      expect(entry?.data).toMatchObject({ errno: 'ENOENT' });
    });

    it('should remove an existing file', () => {
      const filePath = file('a.txt');

      expect(new EnhancedFile(filePath, { logger }).delete()).toBe(true);
      expect(existsSync(filePath)).toBe(false);
      expect(transport.getEntries()).toHaveLength(0);
    });

    it('should remove an empty directory', () => {
      const sub = path.join(dir, 'empty');
      mkdirSync(sub);

      expect(new EnhancedFile(sub, { logger }).delete()).toBe(true);
      expect(existsSync(sub)).toBe(false);
    });

    it('should refuse a non-empty directory', () => {
      const sub = path.join(dir, 'full');
      mkdirSync(sub);
      writeFileSync(path.join(sub, 'x.txt'), 'x');

      expect(new EnhancedFile(sub, { logger }).delete()).toBe(false);
      expect(existsSync(path.join(sub, 'x.txt'))).toBe(true);
    });

    it('should return the failure from tryDelete without logging', () => {
      const result = new EnhancedFile(dir, 'nofile.txt', { logger }).tryDelete();

      expect(result.success).toBe(false);
      expect(result.error?.code).toBe(FileOperationCode.DELETE_FAILED);
      expect(transport.getEntries()).toHaveLength(0);
    });
  });

  describe('moveTo', () => {
    it('should fail with FileNotFoundError when the destination is missing', () => {
      const source = file('a.txt');
      const folder = path.join(dir, 'nowhere');

      const move = (): boolean => new EnhancedFile(source, { logger }).moveTo(folder);

      expect(move).toThrow(FileNotFoundError);
      expect(move).toThrow(`${folder} does not exist.`);
      expect(existsSync(source)).toBe(true);
    });

    it('should fail with an I/O error when the destination is a file', () => {
      const source = file('a.txt');
      const notAFolder = file('b.txt');
      let caught: unknown;

      try {
        new EnhancedFile(source, { logger }).moveTo(notAFolder);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(FileSystemError);
      expect(caught).not.toBeInstanceOf(FileNotFoundError);
      expect(caught).toMatchObject({ code: 'IO_ERROR', message: `Can't move ${source}` });
      expect(readFileSync(source, 'utf8')).toBe('a.txt');
      expect(readFileSync(notAFolder, 'utf8')).toBe('b.txt');
    });

    it('should move the entry into the destination directory', () => {
      const source = file('a.txt', 'hello');
      const folder = path.join(dir, 'archive');
      mkdirSync(folder);

      expect(new EnhancedFile(source, { logger }).moveTo(folder)).toBe(true);
      expect(existsSync(source)).toBe(false);
      expect(readFileSync(path.join(folder, 'a.txt'), 'utf8')).toBe('hello');
    });

    it('should accept URL and EnhancedFile destinations', () => {
      const first = file('a.txt');
      const second = file('b.txt');
      const folder = path.join(dir, 'archive');
      mkdirSync(folder);

      new EnhancedFile(first, { logger }).moveTo(pathToFileURL(folder));
      new EnhancedFile(second, { logger }).moveTo(new EnhancedFile(folder));

      expect(existsSync(path.join(folder, 'a.txt'))).toBe(true);
      expect(existsSync(path.join(folder, 'b.txt'))).toBe(true);
    });

    it('should return the new location from movedTo', () => {
      const source = file('a.txt');
      const folder = path.join(dir, 'archive');
      mkdirSync(folder);

      const moved = new EnhancedFile(source, { logger }).movedTo(folder);

      expect(moved.path).toBe(path.join(folder, 'a.txt'));
      expect(moved.isFile()).toBe(true);
    });

    it('should propagate a failing rename as an I/O error', () => {
      const fs: FileSystemPrimitives = {
        ...nodeFileSystem,
        exists: () => true,
        isDirectory: () => true,
        rename: vi.fn(() => {
          throw fsError('EXDEV');
        }),
      };
      let caught: unknown;

      try {
        new EnhancedFile('/data/a.txt', { fs, logger }).moveTo('/mnt/usb');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(FileSystemError);
      if (!(caught instanceof FileSystemError)) return;
      expect(caught.code).toBe('IO_ERROR');
      expect(caught.message).toBe(
        `Can't move ${path.resolve('/data/a.txt')} to ${path.resolve('/mnt/usb')}`
      );
      expect(caught.metadata.data?.['errno']).toBe('EXDEV');
      expect(caught.metadata.cause?.message).toBe('EXDEV: operation failed');
      expect(caught.metadata.context.operation).toBe('move');
      expect(fs.rename).toHaveBeenCalledWith(
        path.resolve('/data/a.txt'),
        path.resolve('/mnt/usb/a.txt')
      );
    });
  });

  describe('rename', () => {
    it.each([[''], ['   '], [null], [undefined]])('should refuse %j without side effects', name => {
      const source = file('a.txt');

      expect(new EnhancedFile(source, { logger }).rename(name)).toBe(false);
      expect(existsSync(source)).toBe(true);
      expect(transport.getEntries()).toHaveLength(0);
    });

    it('should refuse to overwrite an existing entry', () => {
      const source = file('a.txt');
      const taken = file('b.txt');

      expect(new EnhancedFile(source, { logger }).rename('b.txt')).toBe(false);
      expect(readFileSync(source, 'utf8')).toBe('a.txt');
      expect(readFileSync(taken, 'utf8')).toBe('b.txt');
      expect(transport.getMessages(LogLevel.WARN)).toEqual([`${taken} already exist.`]);
    });

    it('should rename within the parent directory', () => {
      const source = file('a.txt', 'hello');

      expect(new EnhancedFile(dir, 'a.txt', { logger }).rename('b.txt')).toBe(true);
      expect(existsSync(source)).toBe(false);
      expect(readFileSync(path.join(dir, 'b.txt'), 'utf8')).toBe('hello');
    });

    it('should return the renamed value from tryRename', () => {
      file('a.txt');

      const result = new EnhancedFile(dir, 'a.txt', { logger }).tryRename('c.txt');

      expect(result.success).toBe(true);
      expect(result.data?.path).toBe(path.join(dir, 'c.txt'));
    });

    it('should report a failing rename primitive as a soft failure', () => {
      const fs: FileSystemPrimitives = {
        ...nodeFileSystem,
        exists: () => false,
        rename: () => {
          throw fsError('EACCES');
        },
      };
      const source = path.resolve('/data/a.txt');

      expect(new EnhancedFile(source, { fs, logger }).rename('b.txt')).toBe(false);
      expect(transport.getMessages(LogLevel.ERROR)).toEqual([
        `${source} was not renamed to ${path.resolve('/data/b.txt')}.`,
      ]);
    });
  });

  describe('default diagnostics', () => {
    beforeEach(() => {
      resetDefaultLogger();
    });

    afterEach(() => {
      vi.unstubAllEnvs();
      resetDefaultLogger();
    });

    it('should write to stderr when no logger is given', () => {
      vi.stubEnv('FILEKIT_LOG_LEVEL', 'WARN');
      const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      file('a.txt');
      const taken = file('b.txt');

      expect(new EnhancedFile(dir, 'a.txt').rename('b.txt')).toBe(false);

      expect(stderr).toHaveBeenCalledTimes(1);
      expect(String(stderr.mock.calls[0]?.[0])).toContain(`${taken} already exist.`);
    });

    it('should still return false from delete when logging settings are invalid', () => {
      vi.stubEnv('FILEKIT_LOG_LEVEL', 'verbose');
      const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const missing = path.join(dir, 'nofile.txt');

      expect(new EnhancedFile(missing).delete()).toBe(false);

      expect(stderr).toHaveBeenCalledTimes(2);
      expect(String(stderr.mock.calls[0]?.[0])).toContain(
        'Using default logging settings: Invalid filekit configuration: log_level:'
      );
      expect(String(stderr.mock.calls[1]?.[0])).toContain(`${missing} was not deleted.`);
    });

    it('should refuse a colliding rename without throwing when logging settings are invalid', () => {
      vi.stubEnv('FILEKIT_LOG_LEVEL', 'verbose');
      vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const source = file('a.txt');
      file('b.txt');

      expect(new EnhancedFile(source).rename('b.txt')).toBe(false);
      expect(readFileSync(source, 'utf8')).toBe('a.txt');
    });

    it('should report a completed move as success when logging settings are invalid', () => {
      vi.stubEnv('FILEKIT_LOG_LEVEL', 'verbose');
      const stderr = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
      const source = file('a.txt', 'hello');
      const folder = path.join(dir, 'archive');
      mkdirSync(folder);

      expect(new EnhancedFile(source).moveTo(folder)).toBe(true);

      expect(existsSync(source)).toBe(false);
      expect(readFileSync(path.join(folder, 'a.txt'), 'utf8')).toBe('hello');
      expect(stderr).not.toHaveBeenCalled();
    });
  });
});
