import { access, copyFile, mkdir, open, readFile, rename } from 'node:fs/promises';
import { join } from 'node:path';
import type { Storage } from './storage.js';
import type { Logger } from '../types/index.js';

/**
 * Configuration for JSONStorage.
 */
export interface JSONStorageConfig {
  /** Base directory for storage files */
  basePath: string;
  /** Keep the previous file as `<key>.backup.json` (default: true) */
  createBackup?: boolean;
  /** File extension (default: '.json') */
  extension?: string;
  /** Logger for warnings (optional) */
  logger?: Logger;
}

/**
 * JSON file-based storage implementation.
 *
 * - Writes go to a temp file through an explicitly closed handle, are
 *   flushed to disk, then renamed over the target. A crash mid-write
 *   leaves the previous file intact.
 * - The previous file is copied aside as a backup before the rename.
 * - A primary file that fails to parse falls back to the backup.
 */
export class JSONStorage implements Storage {
  private readonly basePath: string;
  private readonly createBackup: boolean;
  private readonly extension: string;
  private readonly logger: Logger | undefined;

  constructor(config: JSONStorageConfig) {
    this.basePath = config.basePath;
    this.createBackup = config.createBackup ?? true;
    this.extension = config.extension ?? '.json';
    this.logger = config.logger;
  }

  /**
   * Get the full path for a key.
   */
  pathFor(key: string): string {
    return join(this.basePath, `${key}${this.extension}`);
  }

  private backupPathFor(key: string): string {
    return join(this.basePath, `${key}.backup${this.extension}`);
  }

  private tempPathFor(key: string): string {
    return join(this.basePath, `${key}.tmp${this.extension}`);
  }

  async load(key: string): Promise<unknown> {
    const path = this.pathFor(key);

    let content: string;
    try {
      content = await readFile(path, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    try {
      return JSON.parse(content);
    } catch (error) {
      if (!(error instanceof SyntaxError)) throw error;

      const backup = await this.loadBackup(key);
      if (backup === null) throw error;

      this.logger?.warn({ key, path }, 'Primary file unreadable, loaded backup');
      return backup;
    }
  }

  private async loadBackup(key: string): Promise<unknown> {
    try {
      const content = await readFile(this.backupPathFor(key), 'utf-8');
      return JSON.parse(content);
    } catch {
      return null;
    }
  }

  async save(key: string, data: unknown): Promise<void> {
    await mkdir(this.basePath, { recursive: true });

    const path = this.pathFor(key);
    const tempPath = this.tempPathFor(key);
    const content = JSON.stringify(data, null, 2);

    const handle = await open(tempPath, 'w');
    try {
      await handle.writeFile(content, 'utf-8');
      await handle.sync();
    } finally {
      await handle.close();
    }

    if (this.createBackup && (await this.exists(key))) {
      try {
        await copyFile(path, this.backupPathFor(key));
      } catch (error) {
        this.logger?.warn({ key, error }, 'Backup copy failed, continuing with save');
      }
    }

    await rename(tempPath, path);
  }

  async exists(key: string): Promise<boolean> {
    try {
      await access(this.pathFor(key));
      return true;
    } catch {
      return false;
    }
  }
}

/**
 * Factory function for creating JSON storage.
 */
export function createJSONStorage(
  basePath: string,
  options?: Partial<Omit<JSONStorageConfig, 'basePath'>>
): JSONStorage {
  return new JSONStorage({
    basePath,
    ...options,
  });
}
