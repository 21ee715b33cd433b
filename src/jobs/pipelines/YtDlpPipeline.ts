/**
 * YtDlpPipeline - Video and audio jobs: yt-dlp downloads, ffmpeg converts.
 */

import path from 'path';
import { logger } from '../../utils/logger';
import { PipelineFailureError } from '../../utils/errors';
import { YtDlpClient } from '../../extractor/YtDlpClient';
import { BEST_AUDIO_OPTION_VALUE, BEST_OPTION_VALUE } from '../../quality/QualityResolver';
import { toWatchUrl } from '../../utils/VideoIdExtractor';
import { JobRequest } from '../../types';
import { parseLine } from '../ProgressParser';
import { MediaPipeline, PipelineContext, PipelineResult } from './types';

// Cap for the "best" entry; higher tiers are only fetched when picked explicitly
const DEFAULT_MAX_HEIGHT = 1440;

const OUTPUT_TEMPLATE = '%(title).80B [%(id)s].%(ext)s';

export type EngineRunner = Pick<YtDlpClient, 'run' | 'commonArgs'>;

export interface FfmpegCheck {
    hasFfmpeg(): Promise<boolean>;
}

function heightCapped(height: number): string {
    return `bestvideo[height<=${height}]+bestaudio/best[height<=${height}]`;
}

/**
 * Translate a selected option value into a yt-dlp format selector
 */
export function buildVideoSelector(selected: string): string {
    const value = selected.trim();
    if (value === '' || value === BEST_OPTION_VALUE) {
        return heightCapped(DEFAULT_MAX_HEIGHT);
    }

    const byHeight = /^(\d+)p$/i.exec(value);
    if (byHeight) return heightCapped(parseInt(byHeight[1], 10));

    const bySize = /^(\d+)x(\d+)$/i.exec(value);
    if (bySize) return heightCapped(parseInt(bySize[2], 10));

    // Already a selector expression
    if (/[+/[\]]/.test(value)) return value;

    return `${value}+bestaudio/best`;
}

export function buildAudioSelector(selected: string): string {
    const value = selected.trim();
    if (value === '' || value === BEST_AUDIO_OPTION_VALUE || value === BEST_OPTION_VALUE) {
        return 'bestaudio/best';
    }
    return `${value}/bestaudio/best`;
}

export class YtDlpPipeline implements MediaPipeline {
    readonly name = 'yt-dlp';
    private readonly engine: EngineRunner;
    private readonly ffmpeg: FfmpegCheck;

    constructor(engine: EngineRunner, ffmpeg: FfmpegCheck) {
        this.engine = engine;
        this.ffmpeg = ffmpeg;
    }

    expectedPasses(request: Readonly<JobRequest>): number {
        if (request.media_kind !== 'video') return 1;
        return buildVideoSelector(request.selected_format_id).includes('+') ? 2 : 1;
    }

    outputExtensions(request: Readonly<JobRequest>): string[] {
        return request.media_kind === 'audio' ? ['.mp3', '.m4a', '.opus'] : ['.mp4', '.mkv', '.webm'];
    }

    buildArgs(request: Readonly<JobRequest>, jobDir: string): string[] {
        const formatArgs =
            request.media_kind === 'audio'
                ? ['-f', buildAudioSelector(request.selected_format_id), '-x', '--audio-format', 'mp3', '--audio-quality', '0']
                : ['-f', buildVideoSelector(request.selected_format_id), '--merge-output-format', 'mp4', '--recode-video', 'mp4'];

        return [
            ...formatArgs,
            '--newline',
            '--no-playlist',
            '--no-warnings',
            '--no-part',
            '-o', path.join(jobDir, OUTPUT_TEMPLATE),
            ...this.engine.commonArgs(),
            toWatchUrl(request.url),
        ];
    }

    async run(context: PipelineContext): Promise<PipelineResult> {
        const { request, jobDir, signal, emit } = context;

        if (!(await this.ffmpeg.hasFfmpeg())) {
            throw new PipelineFailureError('ffmpeg is required to convert downloads but was not found');
        }

        let outputPath: string | undefined;
        const args = this.buildArgs(request, jobDir);
        logger.debug('Starting yt-dlp pipeline', { jobId: context.jobId, kind: request.media_kind });

        await this.engine.run(args, {
            signal,
            onLine: (line) => {
                for (const event of parseLine(line)) {
                    if (event.type === 'destination') {
                        // Post-processor targets supersede the raw download path
                        outputPath = event.path;
                    }
                    emit(event);
                }
            },
        });

        return { outputPath };
    }
}
