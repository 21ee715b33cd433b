/**
 * JobRunner - Executes one job through its pipeline and reports through the registry
 */

import path from 'path';
import { logError, logger } from '../utils/logger';
import { FileManager } from '../utils/FileManager';
import {
    CancellationRequestedError,
    errorMessage,
    isCancellation,
    PipelineFailureError,
    sanitizeErrorMessage,
} from '../utils/errors';
import { DownloadKind, isTerminal, JobSnapshot, JobState } from '../types';
import { JobRegistry } from './JobRegistry';
import { ProgressTracker } from './ProgressTracker';
import { mimeTypeFor } from './mimeTypes';
import { MediaPipeline } from './pipelines/types';

export type PipelineMap = Record<DownloadKind, MediaPipeline>;

export type RunnerFiles = Pick<FileManager, 'createJobDir' | 'cleanupJob' | 'fileExists' | 'findOutputFile'>;

export interface JobRunnerOptions {
    progressIntervalMs: number;
}

export class JobRunner {
    private readonly registry: JobRegistry;
    private readonly files: RunnerFiles;
    private readonly pipelines: PipelineMap;
    private readonly progressIntervalMs: number;

    constructor(registry: JobRegistry, files: RunnerFiles, pipelines: PipelineMap, options: JobRunnerOptions) {
        this.registry = registry;
        this.files = files;
        this.pipelines = pipelines;
        this.progressIntervalMs = options.progressIntervalMs;
    }

    /**
     * Run a job to a terminal state. Never rejects.
     */
    async run(jobId: string): Promise<void> {
        const job = this.registry.getStatus(jobId);
        const signal = this.registry.signalFor(jobId);
        if (!job || !signal || isTerminal(job.state)) {
            logger.debug('Skipping job that is no longer runnable', { jobId, state: job?.state });
            return;
        }

        const pipeline = this.pipelines[job.request.media_kind];
        const startedAt = Date.now();
        this.registry.update(jobId, { state: JobState.DOWNLOADING, started_at: new Date(startedAt) });
        logger.info('▶️ Job started', { jobId, kind: job.request.media_kind, pipeline: pipeline.name });

        const tracker = new ProgressTracker({
            passes: pipeline.expectedPasses(job.request),
            intervalMs: this.progressIntervalMs,
            startedAt,
            write: (patch) => {
                this.registry.update(jobId, patch);
            },
        });

        try {
            const jobDir = await this.files.createJobDir(jobId);
            const result = await pipeline.run({
                jobId,
                request: job.request,
                jobDir,
                signal,
                emit: (event) => {
                    if (!signal.aborted) tracker.handle(event);
                },
            });

            if (signal.aborted) throw new CancellationRequestedError();
            tracker.flush();

            const outputPath = await this.locateOutput(job, jobDir, result.outputPath, pipeline);
            if (!outputPath) {
                throw new PipelineFailureError('Download finished but no output file was found');
            }
            if (signal.aborted) throw new CancellationRequestedError();

            this.registry.update(jobId, {
                state: JobState.COMPLETED,
                progress_percent: 100,
                output_path: outputPath,
                filename: path.basename(outputPath),
                mime_type: mimeTypeFor(outputPath),
            });
            logger.info('✅ Job completed', { jobId, seconds: Math.round((Date.now() - startedAt) / 1000) });
        } catch (error) {
            tracker.stop();
            await this.files.cleanupJob(jobId);

            if (isCancellation(error) || signal.aborted) {
                this.registry.update(jobId, { state: JobState.CANCELED });
                logger.info('🛑 Job canceled', { jobId });
                return;
            }

            const message = sanitizeErrorMessage(errorMessage(error));
            this.registry.update(jobId, { state: JobState.FAILED, error: message });
            logError(error instanceof Error ? error : new Error(message), { jobId, url: job.request.url });
        }
    }

    private async locateOutput(
        job: JobSnapshot,
        jobDir: string,
        reported: string | undefined,
        pipeline: MediaPipeline,
    ): Promise<string | undefined> {
        if (reported) {
            const resolved = path.resolve(jobDir, reported);
            if (resolved.startsWith(jobDir + path.sep) && (await this.files.fileExists(resolved))) {
                return resolved;
            }
        }
        return this.files.findOutputFile(job.id, pipeline.outputExtensions(job.request));
    }
}
