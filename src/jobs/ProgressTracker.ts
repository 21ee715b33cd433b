/**
 * ProgressTracker - Folds pipeline events into coalesced job patches.
 *
 * Transfer passes share the 0-90% band, post-processing holds at 90% and
 * only completion reaches 100%. Writes are throttled to one per interval;
 * stage changes and flush() bypass the throttle.
 */

import { formatRate } from '../utils/format';
import { JobPatch, JobState } from '../types';
import { deriveEta, etaFromBytes, PipelineEvent, ProgressUpdate } from './ProgressParser';

export const TRANSFER_CEILING = 90;

export interface ProgressTrackerOptions {
    passes: number;
    intervalMs: number;
    startedAt: number;
    write: (patch: JobPatch) => void;
    now?: () => number;
}

export class ProgressTracker {
    private readonly passes: number;
    private readonly intervalMs: number;
    private readonly startedAt: number;
    private readonly write: (patch: JobPatch) => void;
    private readonly now: () => number;
    private downloadDestinations = 0;
    private processing = false;
    private lastWrite = 0;
    private pending: JobPatch | null = null;
    private timer: NodeJS.Timeout | null = null;

    constructor(options: ProgressTrackerOptions) {
        this.passes = Math.max(1, options.passes);
        this.intervalMs = options.intervalMs;
        this.startedAt = options.startedAt;
        this.write = options.write;
        this.now = options.now ?? Date.now;
    }

    get currentPass(): number {
        return Math.min(Math.max(this.downloadDestinations - 1, 0), this.passes - 1);
    }

    handle(event: PipelineEvent): void {
        switch (event.type) {
            case 'destination':
                if (event.phase === 'download') this.downloadDestinations++;
                break;
            case 'stage':
                this.enterProcessing();
                break;
            case 'progress':
                if (!this.processing) this.push(this.progressPatch(event));
                break;
        }
    }

    /**
     * Overall percent for a within-pass percent
     */
    overallPercent(passPercent: number): number {
        const clamped = Math.min(100, Math.max(0, passPercent));
        return ((this.currentPass + clamped / 100) / this.passes) * TRANSFER_CEILING;
    }

    enterProcessing(): void {
        if (this.processing) return;
        this.processing = true;
        this.pending = {
            ...this.pending,
            state: JobState.PROCESSING,
            progress_percent: TRANSFER_CEILING,
            transfer_rate: undefined,
            eta_seconds: undefined,
        };
        this.flush();
    }

    flush(): void {
        this.clearTimer();
        if (!this.pending) return;
        const patch = this.pending;
        this.pending = null;
        this.lastWrite = this.now();
        this.write(patch);
    }

    /**
     * Drop anything pending without writing it
     */
    stop(): void {
        this.clearTimer();
        this.pending = null;
    }

    private progressPatch(event: ProgressUpdate): JobPatch {
        const overall = this.overallPercent(event.percent);
        const elapsedSeconds = (this.now() - this.startedAt) / 1000;

        let eta: number | null = event.etaSeconds ?? null;
        if (eta === null && event.totalBytes && event.downloadedBytes !== undefined && event.bytesPerSecond) {
            eta = etaFromBytes(event.totalBytes, event.downloadedBytes, event.bytesPerSecond);
        }
        if (eta === null) {
            eta = deriveEta(elapsedSeconds, (overall / TRANSFER_CEILING) * 100);
        }

        return {
            progress_percent: overall,
            transfer_rate: event.bytesPerSecond !== undefined ? formatRate(event.bytesPerSecond) : event.speed,
            eta_seconds: eta ?? undefined,
        };
    }

    private push(patch: JobPatch): void {
        this.pending = { ...this.pending, ...patch };
        const wait = this.intervalMs - (this.now() - this.lastWrite);
        if (wait <= 0) {
            this.flush();
        } else if (!this.timer) {
            this.timer = setTimeout(() => this.flush(), wait);
        }
    }

    private clearTimer(): void {
        if (this.timer) {
            clearTimeout(this.timer);
            this.timer = null;
        }
    }
}
