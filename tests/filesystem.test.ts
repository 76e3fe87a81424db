import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { FileSystemUtils, ensureDir, exists, remove, readFile, getFileSize, createTempDir } from '../src/utils/filesystem.js';
import { promises as fs } from 'fs';
import { basename, join } from 'path';
import { tmpdir } from 'os';

describe('FileSystemUtils', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(join(tmpdir(), 'fs-test-'));
  });

  afterEach(async () => {
    await fs.rm(testDir, { recursive: true, force: true });
  });

  describe('ensureDir', () => {
    it('should create nested directories', async () => {
      const dirPath = join(testDir, 'level1', 'level2', 'level3');

      expect(await exists(dirPath)).toBe(false);
      await ensureDir(dirPath);
      expect(await exists(dirPath)).toBe(true);
    });

    it('should not throw if directory already exists', async () => {
      const dirPath = join(testDir, 'existing-dir');
      await fs.mkdir(dirPath);

      await expect(ensureDir(dirPath)).resolves.toBeUndefined();
    });

    it('should throw when a file is in the way', async () => {
      const filePath = join(testDir, 'blocker');
      await fs.writeFile(filePath, 'x');

      await expect(ensureDir(join(filePath, 'child'))).rejects.toThrow();
    });
  });

  describe('exists', () => {
    it('should return true for existing file', async () => {
      const filePath = join(testDir, 'test.txt');
      await fs.writeFile(filePath, 'test content');

      expect(await exists(filePath)).toBe(true);
    });

    it('should return false for non-existing path', async () => {
      expect(await exists(join(testDir, 'non-existing.txt'))).toBe(false);
    });
  });

  describe('remove', () => {
    it('should remove directory recursively', async () => {
      const dirPath = join(testDir, 'test-dir');
      await fs.mkdir(dirPath);
      await fs.writeFile(join(dirPath, 'test.txt'), 'test content');

      await remove(dirPath);
      expect(await exists(dirPath)).toBe(false);
    });

    it('should not throw if path does not exist', async () => {
      await expect(remove(join(testDir, 'non-existing.txt'))).resolves.toBeUndefined();
    });
  });

  describe('readFile', () => {
    it('should read file content as bytes', async () => {
      const filePath = join(testDir, 'test.bin');
      await fs.writeFile(filePath, Buffer.from([0x01, 0x02, 0xff]));

      const result = await readFile(filePath);
      expect([...result]).toEqual([0x01, 0x02, 0xff]);
    });

    it('should throw if file does not exist', async () => {
      await expect(readFile(join(testDir, 'non-existing.txt'))).rejects.toThrow();
    });
  });

  describe('getFileSize', () => {
    it('should return file size in bytes', async () => {
      const filePath = join(testDir, 'test.txt');
      await fs.writeFile(filePath, 'Hello, World!');

      expect(await getFileSize(filePath)).toBe(13);
    });

    it('should throw for non-existing file', async () => {
      await expect(getFileSize(join(testDir, 'non-existing.txt'))).rejects.toThrow();
    });
  });

  describe('createTempDir', () => {
    it('should create temporary directory', async () => {
      const tempDir = await FileSystemUtils.createTempDir();

      expect(await exists(tempDir)).toBe(true);
      expect(basename(tempDir).startsWith('splitfetch-')).toBe(true);

      await fs.rm(tempDir, { recursive: true });
    });

    it('should create temporary directory with custom prefix', async () => {
      const tempDir = await createTempDir('custom-');

      expect(await exists(tempDir)).toBe(true);
      expect(basename(tempDir).startsWith('custom-')).toBe(true);

      await fs.rm(tempDir, { recursive: true });
    });
  });
});
