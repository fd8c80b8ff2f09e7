/**
 * FileSystemAdapter - Cross-platform file system implementation
 * Uses Node.js fs/promises
 */

import fs from 'fs/promises';
import { constants } from 'fs';
import type { IFileSystem } from '@gpgpipe/core';

export class FileSystemAdapter implements IFileSystem {
  async readFile(path: string, encoding: BufferEncoding = 'utf-8'): Promise<string> {
    return fs.readFile(path, encoding);
  }

  async writeFile(
    path: string,
    content: string,
    encoding: BufferEncoding = 'utf-8'
  ): Promise<void> {
    await fs.writeFile(path, content, encoding);
  }

  async exists(path: string): Promise<boolean> {
    try {
      await fs.access(path);
      return true;
    } catch {
      return false;
    }
  }

  async isExecutable(path: string): Promise<boolean> {
    try {
      const stats = await fs.stat(path);
      if (!stats.isFile()) {
        return false;
      }
      // Windows has no execute bit; X_OK degrades to an existence check there
      await fs.access(path, constants.X_OK);
      return true;
    } catch {
      return false;
    }
  }

  async mkdir(path: string, options?: { recursive?: boolean }): Promise<void> {
    await fs.mkdir(path, options);
  }
}
