import fs from 'fs-extra';
import path from 'path';
import { FileSystemError } from '../core/errors';

/**
 * Filesystem helpers that surface failures as FileSystemError
 */
export class FileSystem {
  static async ensureDirectory(dir: string): Promise<void> {
    try {
      await fs.ensureDir(dir);
    } catch (error) {
      throw new FileSystemError(`Failed to create directory ${dir}`, dir, error);
    }
  }

  /**
   * Write a text file, creating parent directories and replacing any existing content
   */
  static async writeText(filePath: string, content: string): Promise<void> {
    try {
      await fs.outputFile(filePath, content, 'utf-8');
    } catch (error) {
      throw new FileSystemError(`Failed to write ${filePath}`, filePath, error);
    }
  }

  static async copyFile(src: string, dest: string): Promise<void> {
    if (!(await fs.pathExists(src))) {
      throw new FileSystemError(`Required file not found: ${src}`, src);
    }

    try {
      await fs.copyFile(src, dest);
    } catch (error) {
      throw new FileSystemError(`Failed to copy ${src} to ${dest}`, dest, error);
    }
  }

  /**
   * Remove a file if present. Returns true when something was removed.
   */
  static async removeFileIfExists(filePath: string): Promise<boolean> {
    if (!(await fs.pathExists(filePath))) {
      return false;
    }

    try {
      await fs.remove(filePath);
      return true;
    } catch (error) {
      throw new FileSystemError(`Failed to remove ${filePath}`, filePath, error);
    }
  }

  /**
   * Path of `file` relative to `base`, with forward slashes
   */
  static relativePath(base: string, file: string): string {
    return path.relative(base, file).split(path.sep).join('/');
  }
}
