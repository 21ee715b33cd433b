/**
 * MetadataService - Resolves a video URL into VideoMetadata.
 *
 * The Data API (when configured) supplies the descriptive fields, the
 * extraction engine always supplies the formats and fills whatever the API
 * left out. Both lookups run concurrently.
 */

import { logger } from '../utils/logger';
import {
    errorMessage,
    ExtractionFailureError,
    sanitizeErrorMessage,
    UpstreamUnavailableError,
    UserInputError,
} from '../utils/errors';
import { withTimeout } from '../utils/retryHelper';
import { canonicalWatchUrl, extractVideoId } from '../utils/VideoIdExtractor';
import { bestThumbnailUrl, toFormatDescriptors, YtDlpClient, YtDlpInfo } from '../extractor/YtDlpClient';
import { ApiVideoMetadata, YouTubeDataApiClient } from './YouTubeDataApiClient';
import { FormatDescriptor, InfoSource, VideoMetadata } from '../types';

export type InfoFetcher = Pick<YtDlpClient, 'fetchInfo'>;
export type VideoLookup = Pick<YouTubeDataApiClient, 'getVideo'>;

export interface MetadataServiceOptions {
    engine: InfoFetcher;
    api?: VideoLookup;
    timeoutMs: number;
}

const NO_FORMATS_MESSAGE = 'No downloadable formats found';

type EngineOutcome =
    | { ok: true; info: YtDlpInfo; formats: FormatDescriptor[] }
    | { ok: false; error: string };

export class MetadataService {
    private readonly engine: InfoFetcher;
    private readonly api?: VideoLookup;
    private readonly timeoutMs: number;

    constructor(options: MetadataServiceOptions) {
        this.engine = options.engine;
        this.api = options.api;
        this.timeoutMs = options.timeoutMs;
    }

    async fetchMetadata(url: string): Promise<VideoMetadata> {
        const videoId = extractVideoId(url);
        if (!videoId) {
            throw new UserInputError('Invalid YouTube URL');
        }

        const [apiData, engine] = await Promise.all([
            this.lookupApi(videoId),
            this.lookupEngine(videoId),
        ]);

        if (!apiData && !engine.ok) {
            logger.warn('Both metadata sources failed', { videoId, error: engine.error });
            throw new ExtractionFailureError(engine.error);
        }

        const info = engine.ok ? engine.info : undefined;
        const formats = engine.ok ? engine.formats : [];
        let engineError: string | undefined;
        if (!engine.ok) {
            engineError = engine.error;
        } else if (formats.length === 0) {
            engineError = NO_FORMATS_MESSAGE;
        }

        let infoSource: InfoSource;
        if (engineError) {
            infoSource = 'extraction_engine_degraded';
        } else {
            infoSource = apiData ? 'primary_api' : 'extraction_engine';
        }

        const metadata: VideoMetadata = Object.freeze({
            video_id: videoId,
            original_url: url,
            title: apiData?.title ?? info?.title ?? 'Unknown Title',
            uploader: apiData?.uploader ?? info?.uploader ?? info?.channel ?? 'Unknown',
            description: apiData?.description ?? info?.description ?? undefined,
            duration_seconds: apiData?.durationSeconds ?? info?.duration ?? undefined,
            channel_logo_url: apiData?.channelLogoUrl ?? info?.channel_thumbnail_url ?? undefined,
            thumbnail_url: apiData?.thumbnailUrl ?? (info ? bestThumbnailUrl(info) : undefined),
            view_count: apiData?.viewCount ?? info?.view_count ?? undefined,
            like_count: apiData?.likeCount ?? info?.like_count ?? undefined,
            subscriber_count: apiData?.subscriberCount ?? info?.channel_follower_count ?? undefined,
            formats: Object.freeze(formats),
            info_source: infoSource,
            degraded: infoSource === 'extraction_engine_degraded',
            engine_error: engineError,
        });

        logger.info('Metadata resolved', {
            videoId,
            infoSource,
            formats: formats.length,
        });
        return metadata;
    }

    private async lookupApi(videoId: string): Promise<ApiVideoMetadata | null> {
        const api = this.api;
        if (!api) return null;

        try {
            return await withTimeout(
                (signal) => api.getVideo(videoId, signal),
                this.timeoutMs,
                () => new UpstreamUnavailableError(`Data API timed out after ${this.timeoutMs}ms`),
            );
        } catch (error) {
            logger.warn('Data API lookup failed, relying on extraction engine', {
                videoId,
                error: errorMessage(error),
            });
            return null;
        }
    }

    private async lookupEngine(videoId: string): Promise<EngineOutcome> {
        try {
            const info = await this.engine.fetchInfo(canonicalWatchUrl(videoId), {
                timeoutMs: this.timeoutMs,
            });
            return { ok: true, info, formats: toFormatDescriptors(info.formats ?? []) };
        } catch (error) {
            const message = sanitizeErrorMessage(errorMessage(error));
            logger.warn('Extraction engine lookup failed', { videoId, error: message });
            return { ok: false, error: message };
        }
    }
}
