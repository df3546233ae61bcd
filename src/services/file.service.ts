import * as fs from 'fs';
import * as path from 'path';
import { errorMessage } from '../utils/errors';
import { Logger } from './logger.service';

export class FileService {
  constructor(private logger: Logger) {}

  /**
   * Check if a file exists and get its size
   */
  public async getFileInfo(filePath: string): Promise<{ exists: boolean, size: number }> {
    try {
      const stats = await fs.promises.stat(filePath);
      return { exists: stats.isFile(), size: stats.isFile() ? stats.size : 0 };
    } catch {
      return { exists: false, size: 0 };
    }
  }

  public async ensureDirectory(dirPath: string): Promise<void> {
    try {
      await fs.promises.mkdir(dirPath, { recursive: true });
    } catch (error) {
      this.logger.error(`Error creating directory ${dirPath}: ${errorMessage(error)}`);
      throw error;
    }
  }

  /**
   * Delete a file if it exists. Returns whether something was removed.
   */
  public async deleteFile(filePath: string): Promise<boolean> {
    try {
      await fs.promises.unlink(filePath);
      return true;
    } catch (error) {
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      this.logger.warn(`Could not delete ${filePath}: ${errorMessage(error)}`);
      return false;
    }
  }

  public async moveFile(sourcePath: string, destPath: string): Promise<void> {
    try {
      await fs.promises.rename(sourcePath, destPath);
    } catch (error) {
      // Cross-device rename: copy then delete
      if (isErrnoException(error) && error.code === 'EXDEV') {
        await fs.promises.copyFile(sourcePath, destPath);
        await this.deleteFile(sourcePath);
      } else {
        throw error;
      }
    }
  }

  /**
   * Names of the regular files in a directory, sorted. Empty when it is missing.
   */
  public async listFiles(dirPath: string): Promise<string[]> {
    try {
      const entries = await fs.promises.readdir(dirPath, { withFileTypes: true });
      return entries
        .filter(entry => entry.isFile())
        .map(entry => entry.name)
        .sort();
    } catch {
      return [];
    }
  }

  /**
   * First file in `dirPath` whose name starts with `prefix`, ends with
   * `extension` and passes `accept`.
   */
  public async findByPrefix(
    dirPath: string,
    prefix: string,
    extension: string,
    accept: (name: string) => boolean = () => true
  ): Promise<string | null> {
    const files = await this.listFiles(dirPath);
    const match = files.find(name => name.startsWith(prefix) && name.endsWith(extension) && accept(name));
    return match ? path.join(dirPath, match) : null;
  }

  /**
   * Remove every `{baseName}.*` file in `dirPath` except `keep` (partial and
   * intermediate downloads). Returns how many files were deleted.
   */
  public async removeSiblings(dirPath: string, baseName: string, keep?: string): Promise<number> {
    const files = await this.listFiles(dirPath);
    let removed = 0;

    for (const name of files) {
      const filePath = path.join(dirPath, name);
      if (!name.startsWith(`${baseName}.`) || filePath === keep) continue;

      if (await this.deleteFile(filePath)) {
        this.logger.debug(`Removed leftover file ${name}`);
        removed++;
      }
    }

    return removed;
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
