import { execFile } from 'child_process';
import { logger } from './logger';
import { ExtractorConfig } from '../types';

export type DependencyName = 'yt-dlp' | 'ffmpeg';

const DEPENDENCIES: readonly DependencyName[] = ['yt-dlp', 'ffmpeg'];

export interface DependencyCheckResult {
  success: boolean;
  available: Record<DependencyName, boolean>;
  missingDependencies: DependencyName[];
}

export type VersionProbe = (command: string, args: string[]) => Promise<string>;

const defaultProbe: VersionProbe = (command, args) =>
  new Promise((resolve, reject) => {
    execFile(command, args, { timeout: 10000 }, (error, stdout) => {
      if (error) reject(error);
      else resolve(stdout);
    });
  });

/**
 * Verifies the external executables the pipelines shell out to.
 * Results are cached after the first check.
 */
export class DependencyChecker {
  private readonly config: ExtractorConfig;
  private readonly probe: VersionProbe;
  private readonly cache = new Map<DependencyName, Promise<boolean>>();

  constructor(config: ExtractorConfig, probe: VersionProbe = defaultProbe) {
    this.config = config;
    this.probe = probe;
  }

  hasYtDlp(): Promise<boolean> {
    return this.check('yt-dlp', this.config.ytDlpPath, ['--version']);
  }

  hasFfmpeg(): Promise<boolean> {
    return this.check('ffmpeg', this.config.ffmpegPath ?? 'ffmpeg', ['-version']);
  }

  async checkAllDependencies(): Promise<DependencyCheckResult> {
    const [ytDlp, ffmpeg] = await Promise.all([this.hasYtDlp(), this.hasFfmpeg()]);
    const available: Record<DependencyName, boolean> = { 'yt-dlp': ytDlp, ffmpeg };
    const missingDependencies = DEPENDENCIES.filter((name) => !available[name]);

    for (const name of missingDependencies) {
      logger.error(`✗ ${name} check failed`);
    }

    return { success: missingDependencies.length === 0, available, missingDependencies };
  }

  private check(name: DependencyName, command: string, args: string[]): Promise<boolean> {
    let pending = this.cache.get(name);
    if (!pending) {
      pending = this.probe(command, args).then(
        (output) => {
          logger.info(`✓ ${name} check passed`, { version: output.split('\n')[0].trim() });
          return true;
        },
        (error: Error) => {
          logger.warn(`${name} not available`, { command, error: error.message });
          return false;
        },
      );
      this.cache.set(name, pending);
    }
    return pending;
  }
}
