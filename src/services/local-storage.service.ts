import { mkdir, readFile, stat, writeFile } from 'fs/promises';
import path from 'path';

import { createChildLogger } from '../utils/logger.js';
import { ValidationError } from '../utils/errors.js';

const logger = createChildLogger({ service: 'local-storage' });

export interface LocalStorageRoots {
  /** Composites waiting to be uploaded to the generation service */
  mergedDir: string;
  /** Images fetched from the generation service, served by filename */
  finalDir: string;
}

/**
 * Assert a name is a single path segment before it touches the filesystem.
 * Final image names come from the generation service and from URLs.
 */
export function assertPlainFilename(filename: string): string {
  if (
    !filename ||
    filename === '.' ||
    filename === '..' ||
    filename.includes('\0') ||
    path.basename(filename) !== filename ||
    filename.includes('\\')
  ) {
    throw new ValidationError(`Invalid filename: ${JSON.stringify(filename)}`);
  }
  return filename;
}

/**
 * LocalImageStorage - the two local image directories, with injectable roots
 */
export class LocalImageStorage {
  readonly mergedDir: string;
  readonly finalDir: string;

  constructor(roots: LocalStorageRoots) {
    this.mergedDir = path.resolve(roots.mergedDir);
    this.finalDir = path.resolve(roots.finalDir);
  }

  /**
   * Create both roots if missing
   */
  async ensureDirectories(): Promise<void> {
    await mkdir(this.mergedDir, { recursive: true });
    await mkdir(this.finalDir, { recursive: true });
    logger.debug({ mergedDir: this.mergedDir, finalDir: this.finalDir }, 'Storage directories ready');
  }

  mergedImagePath(filename: string): string {
    return path.join(this.mergedDir, assertPlainFilename(filename));
  }

  finalImagePath(filename: string): string {
    return path.join(this.finalDir, assertPlainFilename(filename));
  }

  async writeMergedImage(filename: string, data: Buffer): Promise<string> {
    const filePath = this.mergedImagePath(filename);
    await writeFile(filePath, data);
    logger.info({ path: filePath, size: data.length }, 'Merged image saved');
    return filePath;
  }

  async readMergedImage(filename: string): Promise<Buffer> {
    return readFile(this.mergedImagePath(filename));
  }

  async writeFinalImage(filename: string, data: Buffer): Promise<string> {
    const filePath = this.finalImagePath(filename);
    await writeFile(filePath, data);
    logger.info({ path: filePath, size: data.length }, 'Final image saved');
    return filePath;
  }

  /**
   * Whether a regular file with this name exists under the final root
   */
  async hasFinalImage(filename: string): Promise<boolean> {
    try {
      const stats = await stat(this.finalImagePath(filename));
      return stats.isFile();
    } catch (error) {
      if (error instanceof ValidationError) {
        throw error;
      }
      if (isErrnoException(error) && error.code === 'ENOENT') {
        return false;
      }
      throw error;
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
