import { AppConfig, ClientConfig } from '../types';
import fs from 'fs';
import path from 'path';
import { logger } from './logger';
import { errorMessage } from './errors';

/**
 * Write yt-dlp cookies from the environment to a file the engine can read.
 * Accepts Netscape cookie text or the same text base64-encoded.
 */
export function initializeCookies(
  cookiesContent: string | undefined,
  directory: string,
): string | undefined {
  if (!cookiesContent) {
    return undefined;
  }

  try {
    if (!fs.existsSync(directory)) {
      fs.mkdirSync(directory, { recursive: true });
    }

    const cookiesPath = path.join(directory, '.ytdlp_cookies.txt');

    let decodedContent: string;
    if (cookiesContent.includes('\t') || cookiesContent.includes('youtube.com')) {
      // Already plaintext cookies
      decodedContent = cookiesContent;
    } else {
      decodedContent = Buffer.from(cookiesContent, 'base64').toString('utf-8');
    }

    fs.writeFileSync(cookiesPath, decodedContent, { encoding: 'utf-8', mode: 0o600 });
    return cookiesPath;
  } catch (error) {
    logger.error('Failed to initialize yt-dlp cookies', {
      error: errorMessage(error),
    });
    return undefined;
  }
}

function parseInteger(value: string | undefined, fallback: number, name: string): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`Invalid value for ${name}: ${value}`);
  }
  return parsed;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const downloadDirectory = path.resolve(env.DOWNLOAD_DIRECTORY || './downloads');
  const cookiesPath = initializeCookies(env.YTDLP_COOKIES_CONTENT, downloadDirectory);

  if (!env.YOUTUBE_API_KEY) {
    logger.warn('YOUTUBE_API_KEY not set, metadata will come from the extraction engine only');
  }

  return {
    port: parseInteger(env.PORT, 5000, 'PORT'),
    downloadDirectory,
    youtubeApiKey: env.YOUTUBE_API_KEY || undefined,
    extractor: {
      ytDlpPath: env.YTDLP_PATH || 'yt-dlp',
      ffmpegPath: env.FFMPEG_PATH || undefined,
      proxyUrl: env.YTDLP_PROXY_URL || undefined,
      cookiesPath,
    },
    maxConcurrentJobs: Math.max(1, parseInteger(env.MAX_CONCURRENT_JOBS, 2, 'MAX_CONCURRENT_JOBS')),
    metadataTimeout: parseInteger(env.METADATA_TIMEOUT, 30000, 'METADATA_TIMEOUT'), // 30s
    jobRetentionMs: parseInteger(env.JOB_RETENTION_MS, 3600000, 'JOB_RETENTION_MS'), // 1 hour
    progressIntervalMs: parseInteger(env.PROGRESS_INTERVAL_MS, 500, 'PROGRESS_INTERVAL_MS'),
    deleteAfterServeMs: parseInteger(env.DELETE_AFTER_SERVE_MS, 5000, 'DELETE_AFTER_SERVE_MS'),
  };
}

/**
 * Load the command-line client's configuration
 */
export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  return {
    serviceUrl: env.SERVICE_URL || `http://localhost:${parseInteger(env.PORT, 5000, 'PORT')}`,
    chromePath: env.CHROME_PATH || undefined,
    probeTimeoutMs: parseInteger(env.PROBE_TIMEOUT, 15000, 'PROBE_TIMEOUT'),
    metadataTimeout: parseInteger(env.METADATA_TIMEOUT, 30000, 'METADATA_TIMEOUT'),
  };
}
