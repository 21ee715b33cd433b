/**
 * YouTubeDataApiClient - Primary structured metadata source (Data API v3).
 * Optional: only consulted when an API key is configured.
 */

import { z } from 'zod';
import { logger } from '../utils/logger';
import { errorMessage, UpstreamUnavailableError } from '../utils/errors';

const API_BASE = 'https://www.googleapis.com/youtube/v3';

const ThumbnailSchema = z.object({ url: z.string() });

const ThumbnailsSchema = z
    .object({
        maxres: ThumbnailSchema.optional(),
        standard: ThumbnailSchema.optional(),
        high: ThumbnailSchema.optional(),
        medium: ThumbnailSchema.optional(),
        default: ThumbnailSchema.optional(),
    })
    .optional();

// The API returns counts as decimal strings
const CountSchema = z
    .string()
    .regex(/^\d+$/)
    .transform((value) => parseInt(value, 10))
    .optional();

const VideoListSchema = z.object({
    items: z
        .array(
            z.object({
                id: z.string(),
                snippet: z
                    .object({
                        title: z.string().optional(),
                        description: z.string().optional(),
                        channelId: z.string().optional(),
                        channelTitle: z.string().optional(),
                        thumbnails: ThumbnailsSchema,
                    })
                    .optional(),
                statistics: z
                    .object({
                        viewCount: CountSchema,
                        likeCount: CountSchema,
                    })
                    .optional(),
                contentDetails: z.object({ duration: z.string().optional() }).optional(),
            }),
        )
        .default([]),
});

const ChannelListSchema = z.object({
    items: z
        .array(
            z.object({
                snippet: z.object({ thumbnails: ThumbnailsSchema }).optional(),
                statistics: z.object({ subscriberCount: CountSchema }).optional(),
            }),
        )
        .default([]),
});

export interface ApiVideoMetadata {
    title?: string;
    uploader?: string;
    description?: string;
    thumbnailUrl?: string;
    viewCount?: number;
    likeCount?: number;
    durationSeconds?: number;
    channelLogoUrl?: string;
    subscriberCount?: number;
}

export type FetchFn = typeof fetch;

/**
 * Parse an ISO 8601 duration such as PT1H2M3S into seconds
 */
export function parseIsoDuration(value: string | undefined): number | undefined {
    if (!value) return undefined;
    const match = /^P(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/.exec(value);
    if (!match) return undefined;
    const [, days, hours, minutes, seconds] = match.map((part) => (part ? parseInt(part, 10) : 0));
    return days * 86400 + hours * 3600 + minutes * 60 + seconds;
}

export class YouTubeDataApiClient {
    private readonly apiKey: string;
    private readonly fetchFn: FetchFn;

    constructor(apiKey: string, fetchFn: FetchFn = fetch) {
        this.apiKey = apiKey;
        this.fetchFn = fetchFn;
    }

    /**
     * Fetch video metadata. Returns null when the API knows no such video.
     */
    async getVideo(videoId: string, signal?: AbortSignal): Promise<ApiVideoMetadata | null> {
        const videos = VideoListSchema.parse(
            await this.request('videos', { part: 'snippet,statistics,contentDetails', id: videoId }, signal),
        );

        const item = videos.items[0];
        if (!item) {
            logger.warn('Data API returned no items', { videoId });
            return null;
        }

        const snippet = item.snippet;
        const thumbs = snippet?.thumbnails;
        const result: ApiVideoMetadata = {
            title: snippet?.title,
            uploader: snippet?.channelTitle,
            description: snippet?.description,
            thumbnailUrl: (thumbs?.maxres ?? thumbs?.high ?? thumbs?.standard ?? thumbs?.medium ?? thumbs?.default)?.url,
            viewCount: item.statistics?.viewCount,
            likeCount: item.statistics?.likeCount,
            durationSeconds: parseIsoDuration(item.contentDetails?.duration),
        };

        if (snippet?.channelId) {
            // Channel details are decoration; a failure here keeps the video data
            try {
                const channels = ChannelListSchema.parse(
                    await this.request('channels', { part: 'snippet,statistics', id: snippet.channelId }, signal),
                );
                const channel = channels.items[0];
                result.channelLogoUrl = channel?.snippet?.thumbnails?.default?.url;
                result.subscriberCount = channel?.statistics?.subscriberCount;
            } catch (error) {
                logger.warn('Failed to fetch channel details', {
                    channelId: snippet.channelId,
                    error: errorMessage(error),
                });
            }
        }

        return result;
    }

    private async request(
        resource: string,
        params: Record<string, string>,
        signal?: AbortSignal,
    ): Promise<unknown> {
        const query = new URLSearchParams({ ...params, key: this.apiKey });
        const response = await this.fetchFn(`${API_BASE}/${resource}?${query.toString()}`, {
            headers: { Accept: 'application/json' },
            signal,
        });

        if (!response.ok) {
            const body = await response.text();
            if (response.status === 403 && /quotaExceeded|keyInvalid|forbidden/i.test(body)) {
                logger.error('Data API quota exceeded or API key invalid');
            }
            throw new UpstreamUnavailableError(`Data API ${resource} request failed with HTTP ${response.status}`, response.status);
        }

        return response.json();
    }
}
