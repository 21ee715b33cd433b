/**
 * YtDlpClient - Thin process wrapper around the yt-dlp executable.
 * Used for format enumeration (metadata) and by the download pipelines.
 */

import { spawn } from 'child_process';
import { EventEmitter } from 'events';
import { Readable } from 'stream';
import { z } from 'zod';
import { logger } from '../utils/logger';
import { CancellationRequestedError, ExtractionFailureError, UserInputError } from '../utils/errors';
import { ExtractorConfig, FormatDescriptor, MediaKind } from '../types';

// Grace period between SIGTERM and SIGKILL
const KILL_GRACE_MS = 3000;

// URL validation schema
const UrlSchema = z
    .string()
    .url()
    .refine(
        (url) => !url.includes(';') && !url.includes('|') && !url.includes('&&'),
        { message: 'Invalid URL format' },
    );

// ============================================================================
// yt-dlp JSON
// ============================================================================

const YtDlpFormatSchema = z.object({
    format_id: z.string(),
    ext: z.string().nullish(),
    url: z.string().nullish(),
    width: z.number().nullish(),
    height: z.number().nullish(),
    fps: z.number().nullish(),
    vcodec: z.string().nullish(),
    acodec: z.string().nullish(),
    format_note: z.string().nullish(),
    filesize: z.number().nullish(),
    filesize_approx: z.number().nullish(),
    abr: z.number().nullish(),
    tbr: z.number().nullish(),
});

const YtDlpThumbnailSchema = z.object({
    url: z.string(),
    preference: z.number().nullish(),
    width: z.number().nullish(),
    height: z.number().nullish(),
});

export const YtDlpInfoSchema = z.object({
    id: z.string().nullish(),
    title: z.string().nullish(),
    uploader: z.string().nullish(),
    channel: z.string().nullish(),
    description: z.string().nullish(),
    duration: z.number().nullish(),
    thumbnail: z.string().nullish(),
    thumbnails: z.array(YtDlpThumbnailSchema).nullish(),
    view_count: z.number().nullish(),
    like_count: z.number().nullish(),
    channel_follower_count: z.number().nullish(),
    channel_thumbnail_url: z.string().nullish(),
    formats: z.array(YtDlpFormatSchema).nullish(),
});

export type YtDlpFormat = z.infer<typeof YtDlpFormatSchema>;
export type YtDlpInfo = z.infer<typeof YtDlpInfoSchema>;

// ============================================================================
// Process plumbing
// ============================================================================

export interface EngineProcess extends EventEmitter {
    stdout: Readable | null;
    stderr: Readable | null;
    kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnEngine = (command: string, args: readonly string[]) => EngineProcess;

const defaultSpawn: SpawnEngine = (command, args) =>
    spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });

export interface RunOptions {
    signal?: AbortSignal;
    timeoutMs?: number;
    onLine?: (line: string) => void;
}

export class EngineTimeoutError extends Error {
    constructor(timeoutMs: number) {
        super(`yt-dlp timed out after ${Math.round(timeoutMs / 1000)}s`);
        this.name = 'EngineTimeoutError';
    }
}

export function validateUrl(url: string): string {
    const result = UrlSchema.safeParse(url);
    if (!result.success) {
        throw new UserInputError(`Invalid URL: ${result.error.issues[0]?.message ?? 'rejected'}`);
    }
    return result.data;
}

export class YtDlpClient {
    private readonly config: ExtractorConfig;
    private readonly spawnEngine: SpawnEngine;

    constructor(config: ExtractorConfig, spawnEngine: SpawnEngine = defaultSpawn) {
        this.config = config;
        this.spawnEngine = spawnEngine;
    }

    /**
     * Arguments every invocation shares: proxy, cookies, ffmpeg location
     */
    commonArgs(): string[] {
        const args: string[] = [];
        if (this.config.proxyUrl) {
            args.push('--proxy', this.config.proxyUrl);
        }
        if (this.config.cookiesPath) {
            args.push('--cookies', this.config.cookiesPath);
        }
        if (this.config.ffmpegPath) {
            args.push('--ffmpeg-location', this.config.ffmpegPath);
        }
        return args;
    }

    /**
     * Dump the engine's JSON description of a video without downloading it
     */
    async fetchInfo(url: string, options: Omit<RunOptions, 'onLine'> = {}): Promise<YtDlpInfo> {
        const validUrl = validateUrl(url);
        const args = [
            '--dump-json',
            '--no-playlist',
            '--skip-download',
            '--no-warnings',
            '--socket-timeout', '10',
            ...this.commonArgs(),
            validUrl,
        ];

        const output = await this.run(args, options);
        let parsed: unknown;
        try {
            parsed = JSON.parse(output);
        } catch {
            throw new Error('yt-dlp returned malformed JSON');
        }
        const info = YtDlpInfoSchema.safeParse(parsed);
        if (!info.success) {
            const issue = info.error.issues[0];
            throw new ExtractionFailureError(
                `yt-dlp returned unexpected JSON${issue ? ` at ${issue.path.join('.') || 'root'}: ${issue.message}` : ''}`,
            );
        }
        return info.data;
    }

    /**
     * Run yt-dlp to completion. Resolves with stdout; every stdout/stderr line
     * is forwarded to onLine as it arrives. The promise settles only after the
     * process has exited, aborted runs included.
     */
    run(args: readonly string[], options: RunOptions = {}): Promise<string> {
        const { signal, timeoutMs, onLine } = options;

        return new Promise((resolve, reject) => {
            if (signal?.aborted) {
                reject(new CancellationRequestedError());
                return;
            }

            let output = '';
            let errorOutput = '';
            let settled = false;
            let aborted = false;
            let timedOut = false;
            let timer: NodeJS.Timeout | undefined;
            let killTimer: NodeJS.Timeout | undefined;

            const proc = this.spawnEngine(this.config.ytDlpPath, args);

            const terminate = () => {
                proc.kill('SIGTERM');
                killTimer = setTimeout(() => proc.kill('SIGKILL'), KILL_GRACE_MS);
            };

            const onAbort = () => {
                aborted = true;
                logger.debug('Terminating yt-dlp after abort');
                terminate();
            };

            const finish = (error: Error | null) => {
                if (settled) return;
                settled = true;
                if (timer) clearTimeout(timer);
                if (killTimer) clearTimeout(killTimer);
                signal?.removeEventListener('abort', onAbort);
                if (error) reject(error);
                else resolve(output);
            };

            signal?.addEventListener('abort', onAbort, { once: true });

            const lineSplitter = (sink: (chunk: string) => void) => {
                let carry = '';
                const emit = (lines: string[]) => {
                    if (!onLine || aborted) return;
                    for (const line of lines) {
                        if (line.trim().length > 0) onLine(line);
                    }
                };
                return {
                    push: (data: Buffer) => {
                        const chunk = data.toString();
                        sink(chunk);
                        const lines = (carry + chunk).split(/\r?\n|\r/);
                        carry = lines.pop() ?? '';
                        emit(lines);
                    },
                    flush: () => {
                        emit([carry]);
                        carry = '';
                    },
                };
            };

            const stdoutLines = lineSplitter((chunk) => { output += chunk; });
            const stderrLines = lineSplitter((chunk) => { errorOutput += chunk; });
            proc.stdout?.on('data', stdoutLines.push);
            proc.stderr?.on('data', stderrLines.push);

            proc.on('close', (code: number | null) => {
                stdoutLines.flush();
                stderrLines.flush();
                if (aborted) {
                    finish(new CancellationRequestedError());
                } else if (timedOut) {
                    finish(new EngineTimeoutError(timeoutMs ?? 0));
                } else if (code === 0) {
                    finish(null);
                } else {
                    finish(new Error(errorOutput.trim() || `yt-dlp exited with code ${code}`));
                }
            });

            proc.on('error', (error: Error) => {
                finish(new Error(`Failed to start yt-dlp: ${error.message}`));
            });

            if (timeoutMs) {
                timer = setTimeout(() => {
                    timedOut = true;
                    terminate();
                }, timeoutMs);
            }
        });
    }
}

// ============================================================================
// Format conversion
// ============================================================================

function mediaKindOf(format: YtDlpFormat): MediaKind | null {
    const hasVideo = format.vcodec ? format.vcodec !== 'none' : Boolean(format.height);
    const hasAudio = Boolean(format.acodec) && format.acodec !== 'none';
    if (hasVideo && hasAudio) return 'video+audio';
    if (hasVideo) return 'video';
    if (hasAudio) return 'audio';
    return null;
}

/**
 * Convert engine formats into frozen descriptors, dropping entries with no
 * container, no download URL, or neither audio nor video.
 */
export function toFormatDescriptors(formats: readonly YtDlpFormat[]): FormatDescriptor[] {
    const descriptors: FormatDescriptor[] = [];

    for (const f of formats) {
        if (!f.ext || !f.url) continue;
        const mediaKind = mediaKindOf(f);
        if (!mediaKind) continue;

        const height = mediaKind !== 'audio' && f.height ? f.height : undefined;
        const filesize = f.filesize ?? f.filesize_approx ?? undefined;
        const bitrate = (mediaKind === 'audio' ? f.abr : f.tbr) ?? undefined;

        descriptors.push(
            Object.freeze({
                format_id: f.format_id,
                media_kind: mediaKind,
                resolution: height ? Object.freeze({ width: f.width ?? 0, height }) : undefined,
                frame_rate: f.fps ?? undefined,
                container: f.ext,
                note: f.format_note ?? undefined,
                filesize,
                bitrate,
            }),
        );
    }

    return descriptors;
}

/**
 * Pick the best thumbnail URL: highest preference, then largest area
 */
export function bestThumbnailUrl(info: YtDlpInfo): string | undefined {
    const thumbnails = info.thumbnails ?? [];
    if (thumbnails.length === 0) return info.thumbnail ?? undefined;

    const ranked = [...thumbnails].sort(
        (a, b) =>
            (b.preference ?? 0) - (a.preference ?? 0) ||
            (b.width ?? 0) * (b.height ?? 0) - (a.width ?? 0) * (a.height ?? 0),
    );
    return ranked[0]?.url ?? info.thumbnail ?? undefined;
}
