/**
 * Extracts the 11-character video identifier from the URL shapes we accept.
 * Patterns are tried in order and the first capture wins.
 */

import { UserInputError } from './errors';

const ID = '([A-Za-z0-9_-]{11})(?![A-Za-z0-9_-])';
const HOST = '(?:https?:\\/\\/)?(?:(?:www|m|music)\\.)?';

const VIDEO_ID_PATTERNS: readonly RegExp[] = [
    // watch?v=ID, with v anywhere in the query string
    new RegExp(`^${HOST}youtube(?:-nocookie)?\\.com\\/watch\\?(?:[^#\\s]*&)?v=${ID}`),
    // youtu.be/ID
    new RegExp(`^${HOST}youtu\\.be\\/${ID}`),
    // /embed/ID and legacy /v/ID
    new RegExp(`^${HOST}youtube(?:-nocookie)?\\.com\\/(?:embed|v)\\/${ID}`),
    // /shorts/ID
    new RegExp(`^${HOST}youtube\\.com\\/shorts\\/${ID}`),
    // /live/ID
    new RegExp(`^${HOST}youtube\\.com\\/live\\/${ID}`),
];

export function extractVideoId(url: string): string | null {
    const input = url.trim();
    if (input.length === 0) return null;

    for (const pattern of VIDEO_ID_PATTERNS) {
        const match = pattern.exec(input);
        if (match?.[1]) {
            return match[1];
        }
    }
    return null;
}

export function isSupportedVideoUrl(url: string): boolean {
    return extractVideoId(url) !== null;
}

export function canonicalWatchUrl(videoId: string): string {
    return `https://www.youtube.com/watch?v=${videoId}`;
}

/**
 * Canonical watch URL for any accepted URL shape, scheme-less ones included
 */
export function toWatchUrl(url: string): string {
    const videoId = extractVideoId(url);
    if (!videoId) {
        throw new UserInputError('Invalid YouTube URL');
    }
    return canonicalWatchUrl(videoId);
}
