/**
 * MediaClient - Typed client for the service.
 *
 * Loads a video by running the player probe alongside the metadata request,
 * then starts and tracks jobs through explicit JobHandle objects.
 */

import { z } from 'zod';
import { logger } from '../utils/logger';
import {
    ExtractionFailureError,
    UpstreamUnavailableError,
    UserInputError,
} from '../utils/errors';
import { delay, withTimeout } from '../utils/retryHelper';
import { extractVideoId } from '../utils/VideoIdExtractor';
import { resolveQuality, ResolvedQuality } from '../quality/QualityResolver';
import { PlayerProbe, PlayerProbeResult } from '../probe/PlayerProbe';
import { DownloadKind, isTerminal, JobRequest, JobState, VideoMetadata } from '../types';

export const DEFAULT_METADATA_TIMEOUT_MS = 30000;
export const DEFAULT_POLL_INTERVAL_MS = 500;

const FormatSchema = z.object({
    format_id: z.string(),
    media_kind: z.enum(['video', 'audio', 'video+audio']),
    resolution: z.object({ width: z.number(), height: z.number() }).optional(),
    frame_rate: z.number().optional(),
    container: z.string(),
    note: z.string().optional(),
    filesize: z.number().optional(),
    bitrate: z.number().optional(),
});

const VideoMetadataSchema = z.object({
    video_id: z.string(),
    original_url: z.string(),
    title: z.string(),
    uploader: z.string(),
    description: z.string().optional(),
    duration_seconds: z.number().optional(),
    channel_logo_url: z.string().optional(),
    thumbnail_url: z.string().optional(),
    view_count: z.number().optional(),
    like_count: z.number().optional(),
    subscriber_count: z.number().optional(),
    formats: z.array(FormatSchema),
    info_source: z.enum(['primary_api', 'extraction_engine', 'extraction_engine_degraded']),
    degraded: z.boolean(),
    engine_error: z.string().optional(),
});

const JobCreatedSchema = z.object({ job_id: z.string() });

const JobProgressSchema = z.object({
    status: z.nativeEnum(JobState),
    progress: z.number(),
    speed: z.string().nullable(),
    eta: z.string().nullable(),
    eta_seconds: z.number().nullable(),
    elapsed: z.number(),
    filename: z.string().nullable(),
    error: z.string().optional(),
});

const ErrorBodySchema = z.object({ error: z.string() });

export type JobProgress = z.infer<typeof JobProgressSchema>;

export interface LoadedVideo {
    metadata: VideoMetadata;
    quality: ResolvedQuality;
    probe: PlayerProbeResult | null;
}

export interface MediaClientOptions {
    baseUrl: string;
    probe?: Pick<PlayerProbe, 'probe'>;
    metadataTimeoutMs?: number;
    fetchFn?: typeof fetch;
}

export interface WaitOptions {
    intervalMs?: number;
    onProgress?: (progress: JobProgress) => void;
}

async function errorFrom(response: Response): Promise<string> {
    const body: unknown = await response.json().catch(() => null);
    const parsed = ErrorBodySchema.safeParse(body);
    return parsed.success ? parsed.data.error : `HTTP ${response.status}`;
}

export class MediaClient {
    private readonly baseUrl: string;
    private readonly probe?: Pick<PlayerProbe, 'probe'>;
    private readonly metadataTimeoutMs: number;
    private readonly fetchFn: typeof fetch;

    constructor(options: MediaClientOptions) {
        this.baseUrl = options.baseUrl.replace(/\/+$/, '');
        this.probe = options.probe;
        this.metadataTimeoutMs = options.metadataTimeoutMs ?? DEFAULT_METADATA_TIMEOUT_MS;
        this.fetchFn = options.fetchFn ?? fetch;
    }

    /**
     * Fetch metadata and probe the player concurrently, then merge both signals
     */
    async loadVideo(url: string, kind: DownloadKind = 'video'): Promise<LoadedVideo> {
        const videoId = extractVideoId(url);
        if (!videoId) {
            throw new UserInputError('Invalid YouTube URL');
        }

        const [probe, metadata] = await Promise.all([this.runProbe(videoId), this.fetchMetadata(url)]);
        const quality = resolveQuality({
            kind,
            playerLevel: probe?.kind === 'level' ? probe.level : null,
            formats: metadata.formats,
        });

        return { metadata, quality, probe };
    }

    async fetchMetadata(url: string): Promise<VideoMetadata> {
        const body = await withTimeout(
            async (signal): Promise<unknown> => {
                const response = await this.request('POST', '/metadata', { url }, signal);
                if (!response.ok) {
                    const message = await errorFrom(response);
                    if (response.status === 400) throw new UserInputError(message);
                    if (response.status === 502) throw new ExtractionFailureError(message);
                    throw new UpstreamUnavailableError(message, response.status);
                }
                return response.json();
            },
            this.metadataTimeoutMs,
            () => new UpstreamUnavailableError(`Metadata request timed out after ${this.metadataTimeoutMs}ms`),
        );
        return VideoMetadataSchema.parse(body);
    }

    async startDownload(request: JobRequest): Promise<JobHandle> {
        const response = await this.request('POST', '/download', request);
        if (!response.ok) {
            const message = await errorFrom(response);
            throw response.status === 400
                ? new UserInputError(message)
                : new UpstreamUnavailableError(message, response.status);
        }
        const { job_id } = JobCreatedSchema.parse(await response.json());
        logger.debug('Job started', { jobId: job_id, kind: request.media_kind });
        return new JobHandle(this, job_id);
    }

    /** @internal */
    async request(method: 'GET' | 'POST', path: string, body?: unknown, signal?: AbortSignal): Promise<Response> {
        return this.fetchFn(`${this.baseUrl}${path}`, {
            method,
            headers: body === undefined ? undefined : { 'Content-Type': 'application/json' },
            body: body === undefined ? undefined : JSON.stringify(body),
            signal,
        });
    }

    url(path: string): string {
        return `${this.baseUrl}${path}`;
    }

    private async runProbe(videoId: string): Promise<PlayerProbeResult | null> {
        if (!this.probe) return null;
        const result = await this.probe.probe(videoId);
        if (result.kind !== 'level') {
            logger.info('Player probe gave no quality signal', { videoId, result: result.kind });
        }
        return result;
    }
}

/**
 * Handle on one server-side job
 */
export class JobHandle {
    readonly id: string;
    private readonly client: MediaClient;

    constructor(client: MediaClient, id: string) {
        this.client = client;
        this.id = id;
    }

    async poll(): Promise<JobProgress> {
        const response = await this.client.request('GET', `/progress/${encodeURIComponent(this.id)}`);
        if (!response.ok) {
            throw new UpstreamUnavailableError(await errorFrom(response), response.status);
        }
        return JobProgressSchema.parse(await response.json());
    }

    /**
     * Poll until the job reaches a terminal state
     */
    async waitForCompletion(options: WaitOptions = {}): Promise<JobProgress> {
        const intervalMs = options.intervalMs ?? DEFAULT_POLL_INTERVAL_MS;

        for (;;) {
            const progress = await this.poll();
            options.onProgress?.(progress);
            if (isTerminal(progress.status)) return progress;
            await delay(intervalMs);
        }
    }

    /**
     * Request cancellation. False when the server no longer knows the job.
     */
    async cancel(): Promise<boolean> {
        const response = await this.client.request('POST', `/cancel/${encodeURIComponent(this.id)}`);
        return response.ok;
    }

    fileUrl(): string {
        return this.client.url(`/file/${encodeURIComponent(this.id)}`);
    }
}
