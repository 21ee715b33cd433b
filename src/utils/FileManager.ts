import fs from 'fs/promises';
import path from 'path';
import { logger } from './logger';
import { errorMessage } from './errors';

/**
 * FileManager - Owns the download directory.
 * Each job writes only inside its own subdirectory, named after the job id.
 */
export class FileManager {
  private readonly rootDir: string;

  constructor(rootDirectory: string) {
    this.rootDir = path.resolve(rootDirectory);
  }

  get root(): string {
    return this.rootDir;
  }

  /**
   * Initialize download directory (create if doesn't exist)
   */
  async initialize(): Promise<void> {
    try {
      await fs.mkdir(this.rootDir, { recursive: true });
      logger.info('📁 Download directory initialized', { path: this.rootDir });
    } catch (error) {
      logger.error('Failed to create download directory', {
        error: errorMessage(error),
      });
      throw error;
    }
  }

  /**
   * Directory owned by a job. Rejects ids that would escape the root.
   */
  getJobDir(jobId: string): string {
    if (!/^[A-Za-z0-9_-]+$/.test(jobId)) {
      throw new Error(`Invalid job id: ${jobId}`);
    }
    return path.join(this.rootDir, jobId);
  }

  async createJobDir(jobId: string): Promise<string> {
    const jobDir = this.getJobDir(jobId);
    await fs.mkdir(jobDir, { recursive: true });
    return jobDir;
  }

  /**
   * Remove a job directory with everything in it, partial files included
   */
  async cleanupJob(jobId: string): Promise<void> {
    const jobDir = this.getJobDir(jobId);
    try {
      await fs.rm(jobDir, { recursive: true, force: true });
      logger.debug('🗑️ Job directory removed', { jobId });
    } catch (error: unknown) {
      if (!(error instanceof Error && 'code' in error && error.code === 'ENOENT')) {
        logger.error('Failed to remove job directory', {
          jobId,
          error: errorMessage(error),
        });
      }
    }
  }

  /**
   * Check if file exists
   */
  async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * List files directly inside a job directory, newest first
   */
  async listJobFiles(jobId: string): Promise<string[]> {
    const jobDir = this.getJobDir(jobId);
    let entries: string[];
    try {
      entries = await fs.readdir(jobDir);
    } catch {
      return [];
    }

    const files: Array<{ filePath: string; mtime: number }> = [];
    for (const entry of entries) {
      const filePath = path.join(jobDir, entry);
      const stats = await fs.stat(filePath);
      if (stats.isFile()) {
        files.push({ filePath, mtime: stats.mtimeMs });
      }
    }
    return files.sort((a, b) => b.mtime - a.mtime).map((f) => f.filePath);
  }

  /**
   * Find the first file in a job directory with one of the given extensions
   */
  async findOutputFile(jobId: string, extensions: string[]): Promise<string | undefined> {
    const files = await this.listJobFiles(jobId);
    const wanted = extensions.map((ext) => ext.toLowerCase());
    return files.find((file) => wanted.includes(path.extname(file).toLowerCase()));
  }

  /**
   * Clean up job directories older than maxAgeMinutes that no live job owns
   */
  async cleanupOldFiles(maxAgeMinutes: number, keep: ReadonlySet<string> = new Set()): Promise<number> {
    let removed = 0;
    try {
      const entries = await fs.readdir(this.rootDir);
      const now = Date.now();

      const cleanupPromises = entries.map(async (entry) => {
        if (keep.has(entry) || entry.startsWith('.')) return;
        const entryPath = path.join(this.rootDir, entry);
        try {
          const stats = await fs.stat(entryPath);
          const ageMinutes = (now - stats.mtimeMs) / 1000 / 60;

          if (ageMinutes > maxAgeMinutes) {
            await fs.rm(entryPath, { recursive: true, force: true });
            removed++;
            logger.info('🗑️ Old download cleaned', {
              path: entryPath,
              ageMinutes: ageMinutes.toFixed(1),
            });
          }
        } catch (err: unknown) {
          logger.warn('Failed to process entry for cleanup', {
            entryPath,
            error: errorMessage(err),
          });
        }
      });

      await Promise.allSettled(cleanupPromises);
    } catch (error: unknown) {
      logger.error('Failed to cleanup old downloads', {
        error: errorMessage(error),
      });
    }
    return removed;
  }

  /**
   * Remove empty job directories left behind by served or failed jobs
   */
  async removeEmptyDirectories(keep: ReadonlySet<string> = new Set()): Promise<number> {
    let removed = 0;
    let entries: string[];
    try {
      entries = await fs.readdir(this.rootDir);
    } catch {
      return 0;
    }

    for (const entry of entries) {
      if (keep.has(entry)) continue;
      const entryPath = path.join(this.rootDir, entry);
      try {
        const stats = await fs.stat(entryPath);
        if (stats.isDirectory() && (await fs.readdir(entryPath)).length === 0) {
          await fs.rmdir(entryPath);
          removed++;
        }
      } catch (err: unknown) {
        logger.debug('Skipping directory during empty sweep', {
          entryPath,
          error: errorMessage(err),
        });
      }
    }
    return removed;
  }
}
