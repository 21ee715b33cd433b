/**
 * JobRegistry - Owns every job record for the lifetime of the process.
 *
 * All writes go through update(), which enforces the forward-only lifecycle
 * and monotonic progress. Readers only ever receive frozen snapshots.
 */

import { EventEmitter } from 'events';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';
import { FileManager } from '../utils/FileManager';
import {
    CancelResult,
    isTerminal,
    Job,
    JobEvent,
    JobEventType,
    JobPatch,
    JobRequest,
    JobSnapshot,
    JobState,
    OutputResolution,
    STATE_ORDER,
} from '../types';

export interface JobRegistryOptions {
    retentionMs: number;
    sweepIntervalMs?: number;
    fileManager?: Pick<FileManager, 'cleanupJob'>;
}

const DEFAULT_SWEEP_INTERVAL_MS = 60 * 1000;

export class JobRegistry extends EventEmitter {
    private readonly jobs = new Map<string, Job>();
    private readonly controllers = new Map<string, AbortController>();
    private readonly retentionMs: number;
    private readonly sweepIntervalMs: number;
    private readonly fileManager?: Pick<FileManager, 'cleanupJob'>;
    private sweepTimer: NodeJS.Timeout | null = null;
    private dispatcher?: (jobId: string) => void;

    constructor(options: JobRegistryOptions) {
        super();
        this.retentionMs = options.retentionMs;
        this.sweepIntervalMs = options.sweepIntervalMs ?? DEFAULT_SWEEP_INTERVAL_MS;
        this.fileManager = options.fileManager;
    }

    /**
     * Set the callback that hands new jobs to the queue
     */
    setDispatcher(dispatcher: (jobId: string) => void): void {
        this.dispatcher = dispatcher;
    }

    /**
     * Register a job in the queued state and dispatch it.
     * The job is visible to getStatus() before this returns.
     */
    create(request: JobRequest): string {
        const id = uuidv4();
        const now = new Date();
        const job: Job = {
            id,
            request: Object.freeze({ ...request }),
            state: JobState.QUEUED,
            progress_percent: 0,
            output_released: false,
            created_at: now,
            updated_at: now,
        };

        this.jobs.set(id, job);
        this.controllers.set(id, new AbortController());
        logger.info('📥 Job created', { jobId: id, kind: request.media_kind });
        this.emitEvent('job:created', job);

        this.dispatcher?.(id);
        return id;
    }

    getStatus(jobId: string): JobSnapshot | null {
        const job = this.jobs.get(jobId);
        return job ? this.snapshot(job) : null;
    }

    /**
     * Abort signal the runner watches for this job
     */
    signalFor(jobId: string): AbortSignal | null {
        return this.controllers.get(jobId)?.signal ?? null;
    }

    /**
     * Request cancellation. Queued jobs are canceled at once; running jobs
     * are signalled and reach 'canceled' once their runner has cleaned up.
     */
    cancel(jobId: string): CancelResult {
        const job = this.jobs.get(jobId);
        if (!job) return 'not_found';
        if (isTerminal(job.state)) return 'ack';

        if (job.state === JobState.QUEUED) {
            this.update(jobId, { state: JobState.CANCELED });
        } else {
            logger.info('🛑 Cancellation requested', { jobId, state: job.state });
            this.controllers.get(jobId)?.abort();
        }
        return 'ack';
    }

    resolveOutput(jobId: string): OutputResolution {
        const job = this.jobs.get(jobId);
        if (!job) return { kind: 'not_found' };
        if (job.state !== JobState.COMPLETED) return { kind: 'not_ready', state: job.state };
        if (job.output_released || !job.output_path) return { kind: 'not_found' };

        return {
            kind: 'ready',
            path: job.output_path,
            filename: job.filename ?? 'download',
            mimeType: job.mime_type ?? 'application/octet-stream',
        };
    }

    /**
     * Single mutation point. Returns false when the patch was rejected.
     */
    update(jobId: string, patch: JobPatch): boolean {
        const job = this.jobs.get(jobId);
        if (!job) return false;

        if (isTerminal(job.state)) {
            logger.debug('Ignoring update to terminal job', { jobId, state: job.state });
            return false;
        }
        if (patch.state !== undefined && STATE_ORDER[patch.state] < STATE_ORDER[job.state]) {
            logger.warn('Rejected backward state transition', { jobId, from: job.state, to: patch.state });
            return false;
        }

        const { progress_percent: progress, ...rest } = patch;
        Object.assign(job, rest);

        if (progress !== undefined) {
            job.progress_percent = Math.max(job.progress_percent, Math.min(100, progress));
        }
        if (job.state === JobState.COMPLETED) {
            job.progress_percent = 100;
        }
        job.updated_at = new Date();

        if (isTerminal(job.state)) {
            job.completed_at = job.completed_at ?? job.updated_at;
            job.eta_seconds = undefined;
            job.transfer_rate = undefined;
            this.controllers.delete(jobId);
            logger.info('🏁 Job finished', { jobId, state: job.state, error: job.error });
            this.emitEvent('job:updated', job);
            this.emitEvent('job:terminal', job);
        } else {
            this.emitEvent('job:updated', job);
        }
        return true;
    }

    /**
     * Mark a served artifact as removed from disk
     */
    releaseOutput(jobId: string): void {
        const job = this.jobs.get(jobId);
        if (!job) return;
        job.output_released = true;
        job.updated_at = new Date();
    }

    counts(): Record<JobState, number> {
        const counts: Record<JobState, number> = {
            [JobState.QUEUED]: 0,
            [JobState.DOWNLOADING]: 0,
            [JobState.PROCESSING]: 0,
            [JobState.COMPLETED]: 0,
            [JobState.FAILED]: 0,
            [JobState.CANCELED]: 0,
        };
        for (const job of this.jobs.values()) {
            counts[job.state]++;
        }
        return counts;
    }

    /**
     * Ids of jobs whose directories must survive a disk sweep
     */
    liveJobIds(): Set<string> {
        const ids = new Set<string>();
        for (const job of this.jobs.values()) {
            if (!isTerminal(job.state) || !job.output_released) ids.add(job.id);
        }
        return ids;
    }

    startSweep(): void {
        if (this.sweepTimer) return;
        this.sweepTimer = setInterval(() => {
            this.sweep().catch((error: Error) => {
                logger.error('Job retention sweep failed', { error: error.message });
            });
        }, this.sweepIntervalMs);
        this.sweepTimer.unref();
    }

    /**
     * Evict terminal jobs older than the retention window and drop their files
     */
    async sweep(now: number = Date.now()): Promise<number> {
        const expired: string[] = [];
        for (const job of this.jobs.values()) {
            if (isTerminal(job.state) && job.completed_at && now - job.completed_at.getTime() >= this.retentionMs) {
                expired.push(job.id);
            }
        }

        for (const jobId of expired) {
            this.jobs.delete(jobId);
            await this.fileManager?.cleanupJob(jobId);
        }

        if (expired.length > 0) {
            logger.info('🧹 Evicted expired jobs', { count: expired.length });
        }
        return expired.length;
    }

    /**
     * Stop the sweep and cancel every job that has not finished
     */
    shutdown(): void {
        if (this.sweepTimer) {
            clearInterval(this.sweepTimer);
            this.sweepTimer = null;
        }
        for (const job of this.jobs.values()) {
            if (!isTerminal(job.state)) this.cancel(job.id);
        }
    }

    private snapshot(job: Job): JobSnapshot {
        return Object.freeze({ ...job });
    }

    private emitEvent(type: JobEventType, job: Job): void {
        const event: JobEvent = {
            type,
            jobId: job.id,
            state: job.state,
            timestamp: job.updated_at,
        };
        this.emit(type, event);
    }
}
