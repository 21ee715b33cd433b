import express, { NextFunction, Request, Response } from 'express';
import fs from 'fs';
import http from 'http';
import { z } from 'zod';
import { logger, logError } from './utils/logger';
import { AppError, ErrorCategory, errorMessage } from './utils/errors';
import { formatDuration } from './utils/format';
import { isSupportedVideoUrl } from './utils/VideoIdExtractor';
import { BEST_AUDIO_OPTION_VALUE, BEST_OPTION_VALUE } from './quality/QualityResolver';
import { JobRegistry } from './jobs/JobRegistry';
import { JobQueue } from './queue/JobQueue';
import { FileManager } from './utils/FileManager';
import { DownloadKind, JobSnapshot, VideoMetadata } from './types';

export interface MetadataProvider {
  fetchMetadata(url: string): Promise<VideoMetadata>;
}

export interface ServerDependencies {
  registry: JobRegistry;
  queue: JobQueue;
  metadata: MetadataProvider;
  fileManager: Pick<FileManager, 'cleanupJob'>;
  deleteAfterServeMs: number;
}

const MetadataBodySchema = z.object({
  url: z.string().trim().min(1, 'URL is required'),
});

const DownloadBodySchema = z.object({
  url: z.string().trim().min(1, 'URL is required'),
  media_kind: z.enum(['video', 'audio', 'thumbnail']),
  selected_format_id: z.string().trim().optional(),
});

const DEFAULT_SELECTION: Record<DownloadKind, string> = {
  video: BEST_OPTION_VALUE,
  audio: BEST_AUDIO_OPTION_VALUE,
  thumbnail: '',
};

/**
 * HTTP status for a request-level failure
 */
export function statusForError(error: unknown): number {
  if (error instanceof AppError) {
    switch (error.category) {
      case ErrorCategory.USER_INPUT:
        return 400;
      case ErrorCategory.EXTRACTION_FAILURE:
      case ErrorCategory.UPSTREAM_UNAVAILABLE:
        return 502;
      default:
        return 500;
    }
  }
  return 500;
}

/**
 * Public view of a job for progress polling
 */
export function progressView(job: JobSnapshot, now: number = Date.now()) {
  const startedAt = (job.started_at ?? job.created_at).getTime();
  const endedAt = job.completed_at ? job.completed_at.getTime() : now;

  return {
    status: job.state,
    progress: Math.round(job.progress_percent * 10) / 10,
    speed: job.transfer_rate ?? null,
    eta: job.eta_seconds !== undefined ? formatDuration(job.eta_seconds) : null,
    eta_seconds: job.eta_seconds ?? null,
    elapsed: Math.max(0, Math.round((endedAt - startedAt) / 1000)),
    filename: job.filename ?? null,
    ...(job.error ? { error: job.error } : {}),
  };
}

/**
 * Express server exposing metadata, job control and file retrieval
 */
export class Server {
  private app: express.Application;
  private readonly deps: ServerDependencies;
  private httpServer: http.Server | null = null;
  private readonly deletionTimers = new Set<NodeJS.Timeout>();

  constructor(deps: ServerDependencies) {
    this.app = express();
    this.deps = deps;

    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandler();
  }

  get application(): express.Application {
    return this.app;
  }

  /**
   * Setup Express middleware
   */
  private setupMiddleware(): void {
    this.app.use(express.json({ limit: '16kb' }));
  }

  /**
   * Setup Express routes
   */
  private setupRoutes(): void {
    const { registry, queue, metadata } = this.deps;

    // Health check endpoint
    this.app.get('/health', (_req: Request, res: Response) => {
      const uptime = process.uptime();
      const memoryUsage = process.memoryUsage();

      res.status(200).json({
        status: 'ok',
        uptime: Math.floor(uptime),
        memory: {
          heapUsed: `${(memoryUsage.heapUsed / 1024 / 1024).toFixed(2)}MB`,
          heapTotal: `${(memoryUsage.heapTotal / 1024 / 1024).toFixed(2)}MB`,
        },
        jobs: registry.counts(),
        queue: queue.stats(),
        timestamp: new Date().toISOString(),
      });
    });

    this.app.post('/metadata', async (req: Request, res: Response) => {
      const body = MetadataBodySchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ error: body.error.issues[0]?.message ?? 'Invalid request' });
        return;
      }

      try {
        res.status(200).json(await metadata.fetchMetadata(body.data.url));
      } catch (error: unknown) {
        const status = statusForError(error);
        if (status === 500) {
          logError(error instanceof Error ? error : new Error(String(error)), { route: '/metadata' });
          res.status(500).json({ error: 'Internal server error' });
          return;
        }
        res.status(status).json({ error: errorMessage(error) });
      }
    });

    this.app.post('/download', (req: Request, res: Response) => {
      const body = DownloadBodySchema.safeParse(req.body);
      if (!body.success) {
        res.status(400).json({ error: body.error.issues[0]?.message ?? 'Invalid request' });
        return;
      }
      if (!isSupportedVideoUrl(body.data.url)) {
        res.status(400).json({ error: 'Invalid YouTube URL' });
        return;
      }

      const { url, media_kind } = body.data;
      const selected = body.data.selected_format_id || DEFAULT_SELECTION[media_kind];
      const jobId = registry.create({ url, media_kind, selected_format_id: selected });
      res.status(200).json({ job_id: jobId });
    });

    this.app.get('/progress/:jobId', (req: Request, res: Response) => {
      const job = registry.getStatus(req.params.jobId);
      if (!job) {
        res.status(404).json({ error: 'Job not found' });
        return;
      }
      res.status(200).json(progressView(job));
    });

    this.app.post('/cancel/:jobId', (req: Request, res: Response) => {
      if (registry.cancel(req.params.jobId) === 'not_found') {
        res.status(404).json({ error: 'Job not found' });
        return;
      }
      res.status(200).json({ ok: true });
    });

    this.app.get('/file/:jobId', (req: Request, res: Response) => {
      const jobId = req.params.jobId;
      const output = registry.resolveOutput(jobId);

      if (output.kind === 'not_found') {
        res.status(404).json({ error: 'File not found' });
        return;
      }
      if (output.kind === 'not_ready') {
        res.status(409).json({ error: `Job is not complete (status: ${output.state})` });
        return;
      }
      if (!fs.existsSync(output.path)) {
        registry.releaseOutput(jobId);
        res.status(404).json({ error: 'File not found' });
        return;
      }

      res.type(output.mimeType);
      res.download(output.path, output.filename, (error) => {
        if (error) {
          logger.warn('File transfer did not complete', { jobId, error: error.message });
          return;
        }
        this.scheduleDeletion(jobId);
      });
    });
  }

  private setupErrorHandler(): void {
    // Malformed JSON bodies and anything a route let through
    this.app.use((error: Error, _req: Request, res: Response, _next: NextFunction) => {
      if (error instanceof SyntaxError) {
        res.status(400).json({ error: 'Malformed JSON body' });
        return;
      }
      logError(error, { route: 'unhandled' });
      res.status(500).json({ error: 'Internal server error' });
    });
  }

  private scheduleDeletion(jobId: string): void {
    const timer = setTimeout(() => {
      this.deletionTimers.delete(timer);
      this.deps.fileManager
        .cleanupJob(jobId)
        .then(() => this.deps.registry.releaseOutput(jobId))
        .catch((error: Error) => {
          logger.error('Failed to delete served file', { jobId, error: error.message });
        });
    }, this.deps.deleteAfterServeMs);
    timer.unref();
    this.deletionTimers.add(timer);
  }

  /**
   * Start listening. Resolves with the bound port.
   */
  async start(port: number): Promise<number> {
    return new Promise((resolve, reject) => {
      const server = this.app.listen(port, () => {
        const address = server.address();
        const boundPort = typeof address === 'object' && address !== null ? address.port : port;
        logger.info(`🚀 Server running on port ${boundPort}`);
        resolve(boundPort);
      });
      server.on('error', reject);
      this.httpServer = server;
    });
  }

  /**
   * Stop the server
   */
  async stop(): Promise<void> {
    logger.info('🛑 Server shutting down...');
    this.deletionTimers.forEach((timer) => clearTimeout(timer));
    this.deletionTimers.clear();

    const server = this.httpServer;
    this.httpServer = null;
    if (!server) return;
    await new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
      server.closeAllConnections();
    });
  }
}
