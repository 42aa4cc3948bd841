/**
 * Upload Store
 *
 * Saves uploaded documents into the uploads directory under a collision-free
 * name (`<8 hex chars>_<original basename>`), lists them and deletes them.
 * Only formats the document loader can read are accepted.
 */

import * as fs from 'fs';
import * as path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { UploadedFileEntry, UploadedFileInfo } from '../../shared/types';
import { createLogger } from '../utils/logger';
import { SUPPORTED_EXTENSIONS, UnsupportedFormatError } from './documentLoader';

const logger = createLogger('uploadStore');

export const MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

export interface IncomingFile {
  originalName: string;
  content: Buffer;
}

export class UploadTooLargeError extends Error {
  constructor(public readonly fileName: string, public readonly maxBytes: number) {
    super(`File too large (max ${Math.round(maxBytes / (1024 * 1024))} MB): ${fileName}`);
    this.name = 'UploadTooLargeError';
  }
}

export class UploadStore {
  constructor(
    private readonly uploadDir: string,
    private readonly maxBytes: number = MAX_UPLOAD_BYTES
  ) {}

  getUploadDir(): string {
    return this.uploadDir;
  }

  /**
   * Checks every file before writing any, so a rejected batch saves nothing.
   *
   * @throws UnsupportedFormatError or UploadTooLargeError
   */
  async saveFiles(files: IncomingFile[]): Promise<UploadedFileInfo[]> {
    for (const file of files) {
      const extension = path.extname(file.originalName).toLowerCase();
      if (!SUPPORTED_EXTENSIONS.includes(extension)) {
        throw new UnsupportedFormatError(extension, file.originalName);
      }
      if (file.content.length > this.maxBytes) {
        throw new UploadTooLargeError(file.originalName, this.maxBytes);
      }
    }

    await fs.promises.mkdir(this.uploadDir, { recursive: true });

    const saved: UploadedFileInfo[] = [];
    for (const file of files) {
      const safeName = `${uuidv4().replace(/-/g, '').slice(0, 8)}_${path.basename(file.originalName)}`;
      const destination = path.join(this.uploadDir, safeName);
      await fs.promises.writeFile(destination, file.content);

      saved.push({
        originalName: file.originalName,
        savedPath: destination,
        size: file.content.length,
      });
      logger.info(`Uploaded file: ${file.originalName} -> ${destination} (${file.content.length} bytes)`);
    }

    return saved;
  }

  /**
   * Files in the upload directory, by name.
   */
  async listFiles(): Promise<UploadedFileEntry[]> {
    if (!fs.existsSync(this.uploadDir)) {
      return [];
    }

    const names = (await fs.promises.readdir(this.uploadDir)).sort();
    const entries: UploadedFileEntry[] = [];

    for (const name of names) {
      const filePath = path.join(this.uploadDir, name);
      const stats = await fs.promises.stat(filePath);
      if (stats.isFile()) {
        entries.push({
          name,
          path: filePath,
          size: stats.size,
          modifiedAt: stats.mtime.toISOString(),
        });
      }
    }

    return entries;
  }

  /**
   * Deletes one upload. Any directory part of the name is ignored.
   *
   * @returns the name deleted, or null when there was no such file
   */
  async deleteFile(fileName: string): Promise<string | null> {
    const safeName = path.basename(fileName);
    const target = path.join(this.uploadDir, safeName);

    const stats = await fs.promises.stat(target).catch(() => null);
    if (!stats?.isFile()) {
      return null;
    }

    await fs.promises.unlink(target);
    logger.info(`Deleted uploaded file: ${target}`);
    return safeName;
  }
}

export function createUploadStore(uploadDir: string, maxBytes?: number): UploadStore {
  return new UploadStore(uploadDir, maxBytes);
}
