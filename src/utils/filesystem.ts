import { promises as fs } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { logger } from './logger.js';

export class FileSystemUtils {
  /**
   * Ensure directory exists, create if not
   */
  public static async ensureDir(dirPath: string): Promise<void> {
    try {
      await fs.mkdir(dirPath, { recursive: true });
    } catch (error) {
      logger().error(`Failed to create directory: ${dirPath}`, { error });
      throw error;
    }
  }

  public static async exists(path: string): Promise<boolean> {
    try {
      await fs.access(path);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Remove file or directory recursively; a missing path is not an error
   */
  public static async remove(path: string): Promise<void> {
    try {
      await fs.rm(path, { recursive: true, force: true });
      logger().debug(`Removed: ${path}`);
    } catch (error) {
      logger().error(`Failed to remove: ${path}`, { error });
      throw error;
    }
  }

  public static async readFile(filePath: string): Promise<Buffer> {
    try {
      return await fs.readFile(filePath);
    } catch (error) {
      logger().error(`Failed to read file: ${filePath}`, { error });
      throw error;
    }
  }

  public static async getFileSize(filePath: string): Promise<number> {
    try {
      const stats = await fs.stat(filePath);
      return stats.size;
    } catch (error) {
      logger().error(`Failed to get file size: ${filePath}`, { error });
      throw error;
    }
  }

  public static async createTempDir(prefix = 'splitfetch-'): Promise<string> {
    try {
      const tempDir = await fs.mkdtemp(join(tmpdir(), prefix));
      logger().debug(`Created temp directory: ${tempDir}`);
      return tempDir;
    } catch (error) {
      logger().error('Failed to create temp directory', { error });
      throw error;
    }
  }
}

export const ensureDir = FileSystemUtils.ensureDir.bind(FileSystemUtils);
export const exists = FileSystemUtils.exists.bind(FileSystemUtils);
export const remove = FileSystemUtils.remove.bind(FileSystemUtils);
export const readFile = FileSystemUtils.readFile.bind(FileSystemUtils);
export const getFileSize = FileSystemUtils.getFileSize.bind(FileSystemUtils);
export const createTempDir = FileSystemUtils.createTempDir.bind(FileSystemUtils);
