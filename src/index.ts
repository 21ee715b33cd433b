import 'dotenv/config';
import * as Sentry from '@sentry/node';
import { loadConfig } from './utils/config';
import { logger, logError } from './utils/logger';
import { errorMessage } from './utils/errors';
import { FileManager } from './utils/FileManager';
import { DependencyChecker } from './utils/DependencyChecker';
import { YtDlpClient } from './extractor/YtDlpClient';
import { YouTubeDataApiClient } from './metadata/YouTubeDataApiClient';
import { MetadataService } from './metadata/MetadataService';
import { JobRegistry } from './jobs/JobRegistry';
import { JobRunner } from './jobs/JobRunner';
import { YtDlpPipeline } from './jobs/pipelines/YtDlpPipeline';
import { ThumbnailPipeline } from './jobs/pipelines/ThumbnailPipeline';
import { JobQueue } from './queue/JobQueue';
import { Server } from './server';
import { AppConfig, JobEvent } from './types';

// Directories older than this are swept at startup and hourly
const STALE_DOWNLOAD_MINUTES = 120;
const DISK_SWEEP_INTERVAL_MS = 60 * 60 * 1000;
const SHUTDOWN_DRAIN_MS = 5000;

function initializeSentry(): void {
  Sentry.init({
    dsn: process.env.SENTRY_DSN || '',
    tracesSampleRate: 1.0,
  });
}

interface AppContext {
  config: AppConfig;
  fileManager: FileManager;
  registry: JobRegistry;
  queue: JobQueue;
  server: Server;
}

async function initializeComponents(config: AppConfig): Promise<AppContext> {
  const fileManager = new FileManager(config.downloadDirectory);
  await fileManager.initialize();

  const dependencies = new DependencyChecker(config.extractor);
  const check = await dependencies.checkAllDependencies();
  if (!check.available['yt-dlp']) {
    throw new Error('yt-dlp is required but was not found; set YTDLP_PATH');
  }
  if (!check.success) {
    logger.warn('⚠️ Some dependencies are missing', { missing: check.missingDependencies });
  }

  const engine = new YtDlpClient(config.extractor);
  const metadata = new MetadataService({
    engine,
    api: config.youtubeApiKey ? new YouTubeDataApiClient(config.youtubeApiKey) : undefined,
    timeoutMs: config.metadataTimeout,
  });

  const registry = new JobRegistry({ retentionMs: config.jobRetentionMs, fileManager });
  const queue = new JobQueue(config.maxConcurrentJobs);
  const mediaPipeline = new YtDlpPipeline(engine, dependencies);
  const runner = new JobRunner(
    registry,
    fileManager,
    {
      video: mediaPipeline,
      audio: mediaPipeline,
      thumbnail: new ThumbnailPipeline(engine),
    },
    { progressIntervalMs: config.progressIntervalMs },
  );

  registry.setDispatcher((jobId) => queue.enqueue(jobId));
  registry.on('job:terminal', (event: JobEvent) => queue.remove(event.jobId));
  queue.setProcessor((jobId) => runner.run(jobId));
  registry.startSweep();

  const server = new Server({
    registry,
    queue,
    metadata,
    fileManager,
    deleteAfterServeMs: config.deleteAfterServeMs,
  });

  return { config, fileManager, registry, queue, server };
}

function startDiskSweep(app: AppContext): NodeJS.Timeout {
  const sweep = async () => {
    const keep = app.registry.liveJobIds();
    const removed = await app.fileManager.cleanupOldFiles(STALE_DOWNLOAD_MINUTES, keep);
    const empty = await app.fileManager.removeEmptyDirectories(keep);
    if (removed + empty > 0) {
      logger.info('🧹 Disk sweep finished', { removed, empty });
    }
  };

  sweep().catch((error: Error) => logger.error('Disk sweep failed', { error: error.message }));
  const timer = setInterval(() => {
    sweep().catch((error: Error) => logger.error('Disk sweep failed', { error: error.message }));
  }, DISK_SWEEP_INTERVAL_MS);
  timer.unref();
  return timer;
}

function registerShutdown(app: AppContext, diskSweep: NodeJS.Timeout): void {
  let shuttingDown = false;

  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info(`Received ${signal}, shutting down gracefully...`);

    clearInterval(diskSweep);
    app.registry.shutdown();
    try {
      // Let aborted runners kill their processes and remove partial files
      if (!(await app.queue.drain(SHUTDOWN_DRAIN_MS))) {
        logger.warn('Jobs still running after shutdown deadline', app.queue.stats());
      }
      await app.server.stop();
      await Sentry.close(2000);
    } catch (error) {
      logger.error('Error during shutdown', { error: errorMessage(error) });
    }
    process.exit(0);
  };

  process.once('SIGINT', () => void shutdown('SIGINT'));
  process.once('SIGTERM', () => void shutdown('SIGTERM'));
}

function registerEmergencyHandlers(): void {
  process.on('uncaughtException', (error: Error) => {
    logError(error, { type: 'uncaughtException' });
    process.exit(1);
  });

  process.on('unhandledRejection', (reason: unknown) => {
    const error = reason instanceof Error ? reason : new Error(String(reason));
    logError(error, { type: 'unhandledRejection' });
  });
}

async function main(): Promise<void> {
  initializeSentry();
  registerEmergencyHandlers();

  const config = loadConfig();
  logger.info('🚀 Starting media service...', {
    port: config.port,
    downloadDirectory: config.downloadDirectory,
    maxConcurrentJobs: config.maxConcurrentJobs,
  });

  const app = await initializeComponents(config);
  const diskSweep = startDiskSweep(app);
  registerShutdown(app, diskSweep);

  await app.server.start(config.port);
}

main().catch((error: Error) => {
  logError(error, { phase: 'startup' });
  process.exit(1);
});
