import { DownloadKind } from './media';

export enum JobState {
    QUEUED = 'queued',
    DOWNLOADING = 'downloading',
    PROCESSING = 'processing',
    COMPLETED = 'completed',
    FAILED = 'failed',
    CANCELED = 'canceled',
}

export const TERMINAL_STATES: ReadonlySet<JobState> = new Set([
    JobState.COMPLETED,
    JobState.FAILED,
    JobState.CANCELED,
]);

// Position of each state in the forward-only lifecycle
export const STATE_ORDER: Record<JobState, number> = {
    [JobState.QUEUED]: 0,
    [JobState.DOWNLOADING]: 1,
    [JobState.PROCESSING]: 2,
    [JobState.COMPLETED]: 3,
    [JobState.FAILED]: 3,
    [JobState.CANCELED]: 3,
};

export function isTerminal(state: JobState): boolean {
    return TERMINAL_STATES.has(state);
}

export interface JobRequest {
    url: string;
    media_kind: DownloadKind;
    selected_format_id: string;
}

export interface Job {
    readonly id: string;
    readonly request: Readonly<JobRequest>;
    state: JobState;
    progress_percent: number;
    transfer_rate?: string;
    eta_seconds?: number;
    output_path?: string;
    filename?: string;
    mime_type?: string;
    output_released: boolean;
    error?: string;
    readonly created_at: Date;
    updated_at: Date;
    started_at?: Date;
    completed_at?: Date;
}

/**
 * Immutable read of a job, handed out by the registry
 */
export type JobSnapshot = Readonly<Omit<Job, 'request'>> & {
    readonly request: Readonly<JobRequest>;
};

/**
 * Fields a runner may write through the registry's mutation point
 */
export type JobPatch = Partial<
    Pick<
        Job,
        | 'state'
        | 'progress_percent'
        | 'transfer_rate'
        | 'eta_seconds'
        | 'output_path'
        | 'filename'
        | 'mime_type'
        | 'error'
        | 'started_at'
        | 'completed_at'
    >
>;

export type CancelResult = 'ack' | 'not_found';

export type OutputResolution =
    | { kind: 'ready'; path: string; filename: string; mimeType: string }
    | { kind: 'not_ready'; state: JobState }
    | { kind: 'not_found' };

export type JobEventType = 'job:created' | 'job:updated' | 'job:terminal';

export interface JobEvent {
    type: JobEventType;
    jobId: string;
    state: JobState;
    timestamp: Date;
}
